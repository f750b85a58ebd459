import { createApp } from './app';
import { buildDialogueService } from './container';
import { config, ENVIRONMENT } from './config/environment';
import { logger } from './utils/logger';

async function startServer(): Promise<void> {
  try {
    const service = await buildDialogueService(config);
    const app = createApp(service);

    app.listen(config.PORT, () => {
      logger.info(`🚀 Server running on port ${config.PORT} (${ENVIRONMENT})`);
      logger.info(`💬 Chat endpoint: http://localhost:${config.PORT}/api/chat`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
