import { eng, removeStopwords } from 'stopword';

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export const tokenize = (text: string): string[] => {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return removeStopwords(tokens, eng);
};
