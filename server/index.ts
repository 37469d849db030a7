import 'dotenv/config';
import { loadConfig } from './config/config';
import { createApp } from './http/routes';
import { createLogger } from './obs/logger';
import { loadSearchState } from './search/state';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  snapshotFile: config.persistence.snapshotFile,
  defaultTopN: config.search.defaultTopN,
});

const state = await loadSearchState({ snapshotFile: config.persistence.snapshotFile, logger });
if (!state.ready) {
  logger.warn('Serving without data; search requests will be rejected', { reason: state.reason });
}

const app = createApp({ state, config, logger });
const { port, host } = config.server;

app.listen(port, host, () => {
  logger.info('Server listening', { url: `http://${host}:${port}` });
});
