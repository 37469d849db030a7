import 'dotenv/config';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { errorMessage } from './utils/errors';
import { runCrawl } from './acquisition/crawl';

const config = loadConfig();
const logger = createLogger(config);

const controller = new AbortController();
process.once('SIGINT', () => {
  logger.warn('Interrupt received, stopping crawl');
  controller.abort();
});

runCrawl({ config, logger, signal: controller.signal })
  .then((report) => {
    logger.info('Crawl finished', {
      status: report.status,
      attempted: report.attempted,
      succeeded: report.succeeded,
      failed: report.failures.length,
    });
    if (report.status !== 'written') {
      process.exitCode = 1;
    }
  })
  .catch((error: unknown) => {
    logger.error('Crawl crashed', { error: errorMessage(error) });
    process.exitCode = 1;
  });
