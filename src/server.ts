import config from './config/index.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { CareerAdvisor } from './services/career-advisor.js';

const advisor = CareerAdvisor.fromDataDir(config.paths.dataDir);
const app = createApp(advisor);

const server = app.listen(config.app.port, () => {
  logger.info(`🚀 ${config.app.name} listening on port ${config.app.port}`, {
    environment: config.app.env,
    dataDir: config.paths.dataDir,
  });
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, closing HTTP server`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
