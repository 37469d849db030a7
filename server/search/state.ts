import path from 'node:path';
import type { SnapshotRecord } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../utils/errors';
import { readSnapshot } from '../persistence/csvSnapshot';
import { buildCorpus, type Corpus, type CorpusInput } from './corpus';
import { fitIndex, type TfIdfIndex } from './tfidf';

export interface ReadySearchState {
  ready: true;
  corpus: Corpus;
  index: TfIdfIndex;
  loadedAt: string;
}

export interface UnavailableSearchState {
  ready: false;
  reason: string;
}

export type SearchState = ReadySearchState | UnavailableSearchState;

/** Builds the immutable corpus and index that every request reads. */
export const createSearchState = (articles: readonly CorpusInput[], loadedAt = new Date()): ReadySearchState => {
  const corpus = buildCorpus(articles);
  const index = fitIndex(corpus);
  return Object.freeze({
    ready: true as const,
    corpus,
    index,
    loadedAt: loadedAt.toISOString(),
  });
};

export const notLoadedReason = (snapshotFile: string): string =>
  `Data not loaded. Check if ${path.basename(snapshotFile)} exists.`;

export const loadSearchState = async (args: { snapshotFile: string; logger: Logger }): Promise<SearchState> => {
  const { snapshotFile, logger } = args;
  let records: SnapshotRecord[];
  try {
    records = await readSnapshot(snapshotFile);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      logger.error('Snapshot file not found', { snapshotFile });
    } else {
      logger.error('Failed to read snapshot', { snapshotFile, error: errorMessage(error) });
    }
    return { ready: false, reason: notLoadedReason(snapshotFile) };
  }

  if (!records.length) {
    logger.error('Snapshot has no articles', { snapshotFile });
    return { ready: false, reason: notLoadedReason(snapshotFile) };
  }

  const state = createSearchState(records);
  logger.info('Data loaded and index prepared', {
    snapshotFile,
    articles: records.length,
    vocabulary: state.index.vocabulary.size,
  });
  return state;
};
