import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { createAcquisitionService } from './retrieval/acquisition';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  allowedSchemes: config.security.allowedSchemes,
  allowlistDomains: config.security.allowlistDomains.length,
  blockPrivateIps: config.security.blockPrivateIps,
  redirects: config.security.allowRedirects ? config.security.maxRedirects : 0,
  feeds: config.feeds.urls.length,
  itemLinkPolicy: config.feeds.itemLinkPolicy,
});
if (!config.feeds.urls.length) {
  logger.warn('No feeds configured; keyword topics will fail until RSS_FEED_URLS or the feeds file is set');
}

const service = createAcquisitionService({ config, logger });
const app = createApp({ config, logger, service });

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
