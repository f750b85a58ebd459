import { randomUUID } from 'node:crypto';
import express, { type Request, type Response } from 'express';
import type { DialogueService, TurnReply } from '../services/dialogue/DialogueService';
import { ChatRequestSchema, ConversationIdParamSchema } from '../types/schema';
import { logger } from '../utils/logger';

export interface HttpReply {
  status: number;
  body: TurnReply | { error: string; details?: string[] } | { conversationId: string; reset: true };
}

/**
 * Validate a chat body and run the turn; kept free of express so it can be called directly
 */
export async function handleChat(service: DialogueService, body: unknown): Promise<HttpReply> {
  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        details: parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      },
    };
  }

  const { text, isSpeech } = parsed.data;
  const conversationId = parsed.data.conversationId ?? randomUUID();
  const result = await service.handleTurn({ text, conversationId, isSpeech });

  return { status: result.status === 'busy' ? 429 : 200, body: result.reply };
}

export async function handleReset(service: DialogueService, params: unknown): Promise<HttpReply> {
  const parsed = ConversationIdParamSchema.safeParse(params);
  if (!parsed.success) {
    return { status: 400, body: { error: 'Invalid conversation id' } };
  }
  const { conversationId } = parsed.data;
  if ((await service.reset(conversationId)) === 'busy') {
    return { status: 429, body: service.busyReply(conversationId) };
  }
  return { status: 200, body: { conversationId, reset: true } };
}

export function createChatRouter(service: DialogueService): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: express.NextFunction) => {
    try {
      const reply = await handleChat(service, req.body);
      res.status(reply.status).json(reply.body);
    } catch (error) {
      logger.error('Error handling chat turn:', error);
      next(error);
    }
  });

  router.post('/:conversationId/reset', async (req: Request, res: Response, next: express.NextFunction) => {
    try {
      const reply = await handleReset(service, req.params);
      res.status(reply.status).json(reply.body);
    } catch (error) {
      logger.error('Error resetting conversation:', error);
      next(error);
    }
  });

  return router;
}
