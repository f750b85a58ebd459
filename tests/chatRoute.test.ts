import { beforeEach, describe, expect, it } from 'vitest';
import { DialogueManager } from '../src/core/dialogue/DialogueManager';
import { InMemoryContextStore } from '../src/core/memory/ContextStore';
import { handleChat, handleReset } from '../src/routes/chat';
import { InMemoryAppointmentStore } from '../src/services/appointments/InMemoryAppointmentStore';
import { DialogueService } from '../src/services/dialogue/DialogueService';
import { CommandDispatcher } from '../src/services/dispatch/CommandDispatcher';

describe('chat route handlers', () => {
  let contextStore: InMemoryContextStore;
  let service: DialogueService;

  beforeEach(() => {
    contextStore = new InMemoryContextStore();
    const store = new InMemoryAppointmentStore();
    service = new DialogueService({
      manager: new DialogueManager({ contextStore }),
      contextStore,
      dispatcher: new CommandDispatcher({ store, oracle: { answer: async () => 'test answer', summarize: async () => 'test summary' } }),
    });
  });

  it('should reject an empty message', async () => {
    const reply = await handleChat(service, { text: '   ', conversationId: 'c-1' });

    expect(reply).toEqual({
      status: 400,
      body: { error: 'Invalid request', details: ['text: text must not be empty'] },
    });
  });

  it('should reject a body that is not an object', async () => {
    const reply = await handleChat(service, null);

    expect(reply.status).toBe(400);
  });

  it('should answer a turn for the given conversation', async () => {
    const reply = await handleChat(service, { text: 'I want to schedule an appointment', conversationId: 'c-1' });

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      conversationId: 'c-1',
      response: 'Who would you like to schedule an appointment with?',
      retryable: false,
    });
    expect(contextStore.get('c-1')?.pendingIntent).toBe('ScheduleAppointment');
  });

  it('should start a new conversation when no id is sent', async () => {
    const reply = await handleChat(service, { text: 'I want to schedule an appointment' });

    expect(reply.status).toBe(200);
    expect(reply.body).toHaveProperty('conversationId', expect.stringMatching(/^[0-9a-f-]{36}$/));
  });

  it('should forget a conversation on reset', async () => {
    await handleChat(service, { text: 'I want to schedule an appointment', conversationId: 'c-1' });

    const reply = await handleReset(service, { conversationId: 'c-1' });

    expect(reply).toEqual({ status: 200, body: { conversationId: 'c-1', reset: true } });
    expect(contextStore.get('c-1')).toBeNull();
  });

  it('should answer 429 to a reset while a turn is in flight', async () => {
    let release: (value: string) => void = () => undefined;
    const held = new Promise<string>(resolve => {
      release = resolve;
    });
    contextStore = new InMemoryContextStore();
    service = new DialogueService({
      manager: new DialogueManager({ contextStore }),
      contextStore,
      dispatcher: new CommandDispatcher({ store: new InMemoryAppointmentStore(), oracle: { answer: () => held, summarize: async () => 'test summary' } }),
    });

    const turn = handleChat(service, { text: 'switch to knowledge mode and tell me about rome', conversationId: 'c-1' });
    const reply = await handleReset(service, { conversationId: 'c-1' });

    expect(reply).toEqual({
      status: 429,
      body: {
        conversationId: 'c-1',
        response: "I'm still working on your previous message. Please wait a moment.",
        outcome: null,
        retryable: true,
      },
    });

    release('test answer');
    expect((await turn).status).toBe(200);
    expect(contextStore.get('c-1')?.activeMode).toBe('Knowledge');
  });

  it('should reject a blank conversation id on reset', async () => {
    expect((await handleReset(service, { conversationId: ' ' })).status).toBe(400);
  });
});
