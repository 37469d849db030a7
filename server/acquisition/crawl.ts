import fs from 'node:fs/promises';
import type { AppConfig } from '../../shared/config';
import type { Article } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../utils/errors';
import { writeSnapshot } from '../persistence/csvSnapshot';
import { ABORTED_MESSAGE, isAbortError, sleep as defaultSleep, type Sleep } from '../utils/async';
import { extractArticle } from './extractor';
import { fetchPage, type FetchFailure } from './fetcher';

export type CrawlStatus = 'written' | 'missing-input' | 'empty-input' | 'corpus-empty' | 'aborted';

export interface CrawlReport {
  status: CrawlStatus;
  attempted: number;
  succeeded: number;
  failures: Array<{ url: string; failure: FetchFailure }>;
  snapshotFile?: string;
}

export interface RunCrawlArgs {
  config: Pick<AppConfig, 'crawl' | 'fetch' | 'persistence'>;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  fetchImpl?: typeof fetch;
}

/** Non-blank, trimmed lines of the URL list, or null when the file does not exist. */
export const readUrlList = async (filePath: string): Promise<string[] | null> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
};

/**
 * Fetches and extracts every listed URL one after another, waiting the
 * politeness delay after each, then writes the snapshot in one go.
 */
export const runCrawl = async ({ config, logger, signal, sleep = defaultSleep, fetchImpl }: RunCrawlArgs): Promise<CrawlReport> => {
  const urlsFile = config.crawl.urlsFile;
  const urls = await readUrlList(urlsFile);
  if (urls === null) {
    logger.error('URL file not found', { urlsFile });
    return { status: 'missing-input', attempted: 0, succeeded: 0, failures: [] };
  }
  if (!urls.length) {
    logger.error('URL file is empty', { urlsFile });
    return { status: 'empty-input', attempted: 0, succeeded: 0, failures: [] };
  }

  const articles: Article[] = [];
  const failures: CrawlReport['failures'] = [];
  let attempted = 0;

  for (const [i, url] of urls.entries()) {
    if (signal?.aborted) break;
    attempted += 1;
    logger.info('Scraping', { progress: `${i + 1}/${urls.length}`, url });

    const outcome = await fetchPage(url, {
      ...config.fetch,
      logger,
      signal,
      sleep,
      fetchImpl,
    });

    if (outcome.ok) {
      const article = extractArticle(outcome.page.body, url);
      articles.push(article);
      logger.info('Scraped', { url, title: article.title });
    } else {
      failures.push({ url, failure: outcome.failure });
      logger.warn('Failed to scrape', { url, reason: outcome.failure.kind, error: outcome.failure.message });
    }

    try {
      await sleep(config.crawl.politenessDelayMs, signal);
    } catch (error) {
      if (!isAbortError(error)) throw error;
    }
  }

  if (signal?.aborted) {
    logger.warn('Crawl aborted', { attempted, succeeded: articles.length, reason: ABORTED_MESSAGE });
    return { status: 'aborted', attempted, succeeded: articles.length, failures };
  }

  if (!articles.length) {
    logger.error('No articles were successfully scraped', { attempted, failed: failures.length });
    return { status: 'corpus-empty', attempted, succeeded: 0, failures };
  }

  const snapshotFile = config.persistence.snapshotFile;
  try {
    await writeSnapshot(snapshotFile, articles);
  } catch (error) {
    logger.error('Failed to write snapshot', { snapshotFile, error: errorMessage(error) });
    throw error;
  }
  logger.info('Snapshot written', { snapshotFile, articles: articles.length, failed: failures.length });
  return { status: 'written', attempted, succeeded: articles.length, failures, snapshotFile };
};
