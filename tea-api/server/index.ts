import { createApp } from './app';
import { config } from './config';
import logger from './logger';

// Global uncaught exception handler
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
  process.exit(1);
});

const app = createApp({ config });

app.listen(config.port, config.host, () => {
  logger.info(`Tea Brewing API starting on port ${config.port} (${config.nodeEnv} mode)`);
  logger.info(`Signature endpoint: http://localhost:${config.port}/brew`);
});
