import { MAX_TOP_N } from '../../shared/config';
import { ABORTED_MESSAGE } from '../utils/async';
import type { Corpus } from './corpus';
import { dot, transformQuery, type TfIdfIndex } from './tfidf';

export const SIMILARITY_WEIGHT = 0.7;
export const POPULARITY_WEIGHT = 0.3;
/** Popularity given to every row when all rows have the same claps. */
export const NEUTRAL_POPULARITY = 0.5;

export interface ScoredArticle {
  row: number;
  title: string;
  url: string;
  claps: number;
  /** Fused score rounded to 4 decimals. */
  score: number;
  similarity: number;
  popularity: number;
}

export interface RankOptions {
  signal?: AbortSignal;
}

const roundScore = (value: number): number => Math.round(value * 10_000) / 10_000;

/** Min-max scaled claps per row, in [0, 1]. */
export const normalizePopularity = (claps: readonly number[]): number[] => {
  if (!claps.length) return [];
  let min = Infinity;
  let max = -Infinity;
  for (const value of claps) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (max === min) return claps.map(() => NEUTRAL_POPULARITY);
  const span = max - min;
  return claps.map((value) => (value - min) / span);
};

export const fuseScore = (similarity: number, popularity: number): number =>
  SIMILARITY_WEIGHT * similarity + POPULARITY_WEIGHT * popularity;

/**
 * Scores every row against the query and returns the best `topN`, highest
 * first. Equal scores keep corpus order.
 */
export const rankArticles = (
  query: string,
  index: TfIdfIndex,
  corpus: Corpus,
  topN: number,
  options: RankOptions = {},
): ScoredArticle[] => {
  if (!Number.isInteger(topN) || topN < 1 || topN > MAX_TOP_N) {
    throw new RangeError(`topN must be an integer between 1 and ${MAX_TOP_N}, got ${topN}`);
  }
  if (index.vectors.length !== corpus.length) {
    throw new Error(`Index has ${index.vectors.length} rows but corpus has ${corpus.length}`);
  }
  if (options.signal?.aborted) {
    throw new Error(ABORTED_MESSAGE);
  }

  const queryVector = transformQuery(index, query);
  const popularity = normalizePopularity(corpus.map((entry) => entry.claps));

  const scored = corpus.map((entry, row) => {
    const similarity = dot(queryVector, index.vectors[row]);
    return {
      row,
      similarity,
      popularity: popularity[row],
      fused: fuseScore(similarity, popularity[row]),
    };
  });

  scored.sort((a, b) => b.fused - a.fused || a.row - b.row);

  return scored.slice(0, topN).map(({ row, similarity, popularity: rowPopularity, fused }) => ({
    row,
    title: corpus[row].title,
    url: corpus[row].url,
    claps: corpus[row].claps,
    score: roundScore(fused),
    similarity,
    popularity: rowPopularity,
  }));
};
