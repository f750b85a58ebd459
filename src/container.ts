import { createPool, fromPool, testConnection } from './config/database';
import type { AppConfig } from './config/environment';
import { createOpenAIClient } from './config/openai';
import { DialogueManager } from './core/dialogue/DialogueManager';
import { InMemoryContextStore } from './core/memory/ContextStore';
import type { AppointmentStore } from './services/appointments/AppointmentStore';
import { InMemoryAppointmentStore } from './services/appointments/InMemoryAppointmentStore';
import { PgAppointmentStore } from './services/appointments/PgAppointmentStore';
import { DialogueService } from './services/dialogue/DialogueService';
import { CommandDispatcher } from './services/dispatch/CommandDispatcher';
import { OpenAIKnowledgeOracle } from './services/knowledge/KnowledgeOracle';
import { logger } from './utils/logger';

/**
 * Wire the dialogue service from configuration
 */
export async function buildDialogueService(config: AppConfig): Promise<DialogueService> {
  const store = await createAppointmentStore(config);
  const contextStore = new InMemoryContextStore({ maxAgeMs: config.CONVERSATION_MAX_AGE_MS, logger });
  const oracle = new OpenAIKnowledgeOracle(createOpenAIClient(config), config.OPENAI_MODEL, logger);

  const manager = new DialogueManager({ contextStore, availability: store, lookup: store, logger });
  const dispatcher = new CommandDispatcher({ store, oracle, logger });

  return new DialogueService({ manager, contextStore, dispatcher, logger });
}

async function createAppointmentStore(config: AppConfig): Promise<AppointmentStore> {
  if (config.APPOINTMENT_STORE === 'memory') {
    logger.info('🗂️ Using in-memory appointment store');
    return new InMemoryAppointmentStore();
  }

  const client = fromPool(createPool(config));
  const store = new PgAppointmentStore(client, logger);
  if (await testConnection(client)) {
    await store.ensureSchema();
    logger.info('✅ Database connected successfully');
  } else {
    logger.warn('⚠️  Database connection failed - appointment commands will report the store as unavailable');
  }
  return store;
}
