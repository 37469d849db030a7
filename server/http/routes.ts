import cors from 'cors';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { MAX_TOP_N, getPublicConfig, type AppConfig } from '../../shared/config';
import type { ErrorPayload, HealthStatus, SearchResultRow } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../utils/errors';
import { rankArticles, type ScoredArticle } from '../search/ranker';
import type { SearchState } from '../search/state';

export interface CreateAppArgs {
  state: SearchState;
  config: AppConfig;
  logger: Logger;
}

const buildSearchParamsSchema = (defaultTopN: number) =>
  z.object({
    query: z.string({ required_error: 'query is required', invalid_type_error: 'query must be a single string' }),
    top_n: z.coerce.number().int().min(1).max(MAX_TOP_N).default(defaultTopN),
  });

export const toResultRow = (result: ScoredArticle): SearchResultRow => ({
  Title: result.title,
  URL: result.url,
  Claps: result.claps,
  Relevance_Score: result.score,
});

export const createApp = ({ state, config, logger }: CreateAppArgs): Express => {
  const app = express();
  const searchParamsSchema = buildSearchParamsSchema(config.search.defaultTopN);

  app.use(cors());

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/health', (_req: Request, res: Response<HealthStatus>) => {
    res.json({
      status: 'ok',
      data_loaded: state.ready,
      article_count: state.ready ? state.corpus.length : 0,
    });
  });

  app.get('/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/search_articles', (req: Request, res: Response<SearchResultRow[] | ErrorPayload>) => {
    const params = searchParamsSchema.safeParse(req.query);
    if (!params.success) {
      res.status(422).json({ error: 'Invalid search parameters', details: params.error.flatten().fieldErrors });
      return;
    }
    if (!state.ready) {
      res.status(503).json({ error: state.reason });
      return;
    }

    const { query, top_n: topN } = params.data;
    const results = rankArticles(query, state.index, state.corpus, topN);
    logger.debug('Search served', { query, topN, returned: results.length });
    res.json(results.map(toResultRow));
  });

  app.use((_req: Request, res: Response<ErrorPayload>) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: Response<ErrorPayload>, _next: NextFunction) => {
    logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, error: errorMessage(error) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};
