import express from 'express';
import { createChatRouter } from './routes/chat';
import type { DialogueService } from './services/dialogue/DialogueService';
import { logger } from './utils/logger';

export function createApp(service: DialogueService): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/chat', createChatRouter(service));

  // Error handling middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
