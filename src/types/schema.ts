import { z } from 'zod';

/**
 * Zod schemas for request validation
 */

export const ChatRequestSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty').max(2000),
  conversationId: z.string().trim().min(1).max(128).optional(),
  isSpeech: z.boolean().default(false),
});

export const ConversationIdParamSchema = z.object({
  conversationId: z.string().trim().min(1).max(128),
});
