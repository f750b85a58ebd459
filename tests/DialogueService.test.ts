import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DialogueManager } from '../src/core/dialogue/DialogueManager';
import { InMemoryContextStore } from '../src/core/memory/ContextStore';
import { InMemoryAppointmentStore } from '../src/services/appointments/InMemoryAppointmentStore';
import { DialogueService } from '../src/services/dialogue/DialogueService';
import { CommandDispatcher } from '../src/services/dispatch/CommandDispatcher';
import type { KnowledgeOracle } from '../src/services/knowledge/KnowledgeOracle';

const MONDAY = new Date(2025, 5, 16, 10, 0);
const ID = 'conv-1';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('DialogueService', () => {
  let contextStore: InMemoryContextStore;
  let appointments: InMemoryAppointmentStore;
  let oracle: KnowledgeOracle;

  const createService = () =>
    new DialogueService({
      manager: new DialogueManager({ contextStore, availability: appointments, lookup: appointments }),
      contextStore,
      dispatcher: new CommandDispatcher({
        store: appointments,
        oracle,
        retry: { maxRetries: 1, delayMs: 0 },
      }),
    });

  const say = (service: DialogueService, text: string, isSpeech = false) =>
    service.handleTurn({ text, conversationId: ID, isSpeech, now: MONDAY });

  beforeEach(() => {
    contextStore = new InMemoryContextStore();
    appointments = new InMemoryAppointmentStore();
    oracle = {
      answer: async () => 'Rome was founded in 753 BC.',
      summarize: async history => `Summary of ${history.length} turns`,
    };
  });

  // ==========================================================================
  // Delivery
  // ==========================================================================

  it('should book the appointment and confirm it', async () => {
    const service = createService();

    const result = await say(service, 'Schedule an appointment with John tomorrow at 3pm');

    expect(result.status).toBe('ok');
    expect(result.reply.response).toBe(
      'Great! Your appointment with **John** has been scheduled for Tuesday, June 17, 2025 at 3:00 PM.'
    );
    expect(result.reply.retryable).toBe(false);
    expect(result.reply.outcome?.kind).toBe('Dispatch');
    expect(await appointments.findAppointments('John', '2025-06-17')).toHaveLength(1);
    expect(contextStore.get(ID)?.lastAppointmentReference).toEqual({
      person: 'John',
      date: '2025-06-17',
      time: '15:00',
    });
  });

  it('should reply without markdown for speech', async () => {
    const service = createService();

    const result = await say(service, 'Schedule an appointment with John tomorrow at 3pm', true);

    expect(result.reply.response).toBe(
      'Great! Your appointment with John has been scheduled for Tuesday, June 17, 2025 at 3:00 PM.'
    );
  });

  it('should pass clarifying questions through', async () => {
    const service = createService();

    const result = await say(service, 'I want to schedule an appointment');

    expect(result.reply).toEqual({
      conversationId: ID,
      response: 'Who would you like to schedule an appointment with?',
      outcome: {
        kind: 'Clarify',
        missingSlots: ['person', 'date', 'time'],
        missingIntent: false,
        promptText: 'Who would you like to schedule an appointment with?',
      },
      retryable: false,
    });
  });

  it('should let a single listed appointment be cancelled by reference', async () => {
    appointments = new InMemoryAppointmentStore({
      appointments: [{ person: 'John', date: '2025-06-20', time: '15:00' }],
    });
    const service = createService();

    const listed = await say(service, 'show my appointments with John');
    expect(listed.reply.response).toBe(
      'Here are your appointments with John:\n- **John** on Friday, June 20, 2025 at 3:00 PM'
    );

    const cancelled = await say(service, 'cancel it');
    expect(cancelled.reply.response).toBe(
      "I've cancelled your appointment with **John** on Friday, June 20, 2025 at 3:00 PM. Is there anything else I can help you with?"
    );
    expect(await appointments.findAppointments('John', null)).toEqual([]);
  });

  // ==========================================================================
  // Failures and retry
  // ==========================================================================

  describe('collaborator failures', () => {
    it('should keep an undelivered command and send it again on retry', async () => {
      vi.spyOn(appointments, 'addAppointment').mockRejectedValueOnce(new Error('connection refused'));
      const service = createService();

      const failed = await say(service, 'Schedule an appointment with John tomorrow at 3pm');
      expect(failed.reply.response).toBe(
        "I'm sorry, I couldn't reach the appointment system right now. Say **retry** to try again."
      );
      expect(failed.reply.retryable).toBe(true);
      expect(contextStore.get(ID)?.undeliveredCommand).toEqual({
        intent: 'ScheduleAppointment',
        person: 'John',
        date: '2025-06-17',
        time: '15:00',
        recurrence: null,
      });
      expect(contextStore.get(ID)?.lastAppointmentReference).toBeNull();

      const retried = await say(service, 'retry');
      expect(retried.reply.response).toBe(
        'Great! Your appointment with **John** has been scheduled for Tuesday, June 17, 2025 at 3:00 PM.'
      );
      expect(contextStore.get(ID)?.undeliveredCommand).toBeNull();
    });

    it('should restore the slots collected before the failed turn', async () => {
      vi.spyOn(appointments, 'addAppointment').mockRejectedValueOnce(new Error('connection refused'));
      const service = createService();

      await say(service, 'Schedule an appointment with John tomorrow');
      await say(service, '3pm');

      expect(contextStore.get(ID)?.partialSlots).toEqual({ person: 'John', date: '2025-06-17' });
    });

    it('should drop the undelivered command when the user moves on', async () => {
      vi.spyOn(appointments, 'addAppointment').mockRejectedValueOnce(new Error('connection refused'));
      const service = createService();

      await say(service, 'Schedule an appointment with John tomorrow at 3pm');
      const next = await say(service, '3 PM');

      expect(next.reply.outcome?.kind).toBe('Clarify');
      expect(contextStore.get(ID)?.undeliveredCommand).toBeNull();
    });

    it('should name the knowledge service when it fails', async () => {
      oracle = { ...oracle, answer: async () => Promise.reject(new Error('rate limited')) };
      const service = createService();

      const result = await say(service, 'switch to knowledge mode and tell me about rome');

      expect(result.reply.response).toBe(
        "I'm sorry, I couldn't retrieve that information right now. Say **retry** to try again."
      );
      expect(result.reply.retryable).toBe(true);
    });
  });

  // ==========================================================================
  // Conversation control
  // ==========================================================================

  it('should reject a turn while the previous one is still running', async () => {
    const answer = deferred<string>();
    oracle = { ...oracle, answer: () => answer.promise };
    const service = createService();

    const first = say(service, 'switch to knowledge mode and tell me about rome');
    const second = await say(service, 'hello?');

    expect(second).toEqual({
      status: 'busy',
      reply: {
        conversationId: ID,
        response: "I'm still working on your previous message. Please wait a moment.",
        outcome: null,
        retryable: true,
      },
    });

    answer.resolve('Rome is the capital of Italy.');
    expect((await first).reply.response).toBe('Rome is the capital of Italy.');
  });

  it('should refuse a reset while a turn is running and keep the turn result', async () => {
    const answer = deferred<string>();
    oracle = { ...oracle, answer: () => answer.promise };
    const service = createService();

    const first = say(service, 'switch to knowledge mode and tell me about rome');

    expect(await service.reset(ID)).toBe('busy');

    answer.resolve('Rome is the capital of Italy.');
    await first;
    expect(contextStore.get(ID)?.activeMode).toBe('Knowledge');

    expect(await service.reset(ID)).toBe('reset');
    expect(contextStore.get(ID)).toBeNull();
  });

  it('should keep a history of the exchanges and summarize it on request', async () => {
    const service = createService();
    await say(service, 'Schedule an appointment with John tomorrow at 3pm');

    const result = await say(service, 'What have we talked about?');

    expect(result.reply.response).toBe('Summary of 2 turns');
    expect(contextStore.get(ID)?.history).toEqual([
      { role: 'user', text: 'Schedule an appointment with John tomorrow at 3pm' },
      {
        role: 'assistant',
        text: 'Great! Your appointment with **John** has been scheduled for Tuesday, June 17, 2025 at 3:00 PM.',
      },
      { role: 'user', text: 'What have we talked about?' },
      { role: 'assistant', text: 'Summary of 2 turns' },
    ]);
  });

  it('should start over on request', async () => {
    const service = createService();
    await say(service, 'I want to schedule an appointment');

    const result = await say(service, 'start over');

    expect(result.reply.response).toBe("Okay, let's start over. What would you like to do?");
    expect(result.reply.outcome).toBeNull();
    expect(contextStore.get(ID)).toBeNull();
  });
});
