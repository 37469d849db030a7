import type { Corpus } from './corpus';
import { tokenize } from './tokenizer';

/** Column index → weight. Columns absent from the map weigh zero. */
export type SparseVector = ReadonlyMap<number, number>;

export interface TfIdfIndex {
  vocabulary: ReadonlyMap<string, number>;
  idf: readonly number[];
  /** One L2-normalized vector per corpus row, in row order. */
  vectors: readonly SparseVector[];
}

const countTerms = (tokens: readonly string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
};

const normalize = (weights: Map<number, number>): SparseVector => {
  let sumSquares = 0;
  for (const weight of weights.values()) {
    sumSquares += weight * weight;
  }
  if (sumSquares === 0) return weights;
  const norm = Math.sqrt(sumSquares);
  for (const [column, weight] of weights) {
    weights.set(column, weight / norm);
  }
  return weights;
};

/** Smoothed inverse document frequency: ln((1 + n) / (1 + df)) + 1. */
export const smoothedIdf = (documentCount: number, documentFrequency: number): number =>
  Math.log((1 + documentCount) / (1 + documentFrequency)) + 1;

const weigh = (counts: Map<string, number>, vocabulary: ReadonlyMap<string, number>, idf: readonly number[]): SparseVector => {
  const weights = new Map<number, number>();
  for (const [term, count] of counts) {
    const column = vocabulary.get(term);
    if (column === undefined) continue;
    weights.set(column, count * idf[column]);
  }
  return normalize(weights);
};

/**
 * Fits term weights over the corpus search text. Vocabulary columns follow
 * the alphabetical order of terms so the same corpus always yields the same index.
 */
export const fitIndex = (corpus: Corpus): TfIdfIndex => {
  const rowCounts = corpus.map((entry) => countTerms(tokenize(entry.searchText)));

  const documentFrequency = new Map<string, number>();
  for (const counts of rowCounts) {
    for (const term of counts.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const terms = Array.from(documentFrequency.keys()).sort();
  const vocabulary = new Map(terms.map((term, column) => [term, column] as const));
  const idf = terms.map((term) => smoothedIdf(corpus.length, documentFrequency.get(term) ?? 0));

  return {
    vocabulary,
    idf,
    vectors: rowCounts.map((counts) => weigh(counts, vocabulary, idf)),
  };
};

/** Projects free text into the fitted space; unknown terms are dropped. */
export const transformQuery = (index: TfIdfIndex, text: string): SparseVector =>
  weigh(countTerms(tokenize(text)), index.vocabulary, index.idf);

export const dot = (a: SparseVector, b: SparseVector): number => {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [column, weight] of small) {
    const other = large.get(column);
    if (other !== undefined) sum += weight * other;
  }
  return sum;
};
