import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { logger } from './infrastructure/logging/Logger.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.server;

app.listen(port, () => {
  logger.info('Statement Ledger API listening', {
    port,
    environment: process.env.NODE_ENV || 'development',
    extractors: container.registry.list().map((extractor) => `${extractor.id}@${extractor.version}`),
  });
});
