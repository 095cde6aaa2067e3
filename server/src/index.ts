import { config } from './config/index.js';
import { createAppContext } from './context.js';
import { createApp } from './app.js';
import logger from './utils/logger.js';

async function main(): Promise<void> {
  const context = await createAppContext(config);
  const app = createApp(context, config.clientUrl);

  app.listen(config.port, () => {
    logger.info('Startup', `Quiz API listening on port ${config.port} (${config.nodeEnv})`);
    console.log(`Quiz API running on http://localhost:${config.port} (logs: ${logger.getLogPath()})`);
  });
}

main().catch(error => {
  logger.error('Startup', 'Failed to start server', error);
  process.exit(1);
});
