import { describe, expect, it } from 'vitest';
import { ContextInvariantViolationError } from '../src/core/errors';
import { InMemoryContextStore } from '../src/core/memory/ContextStore';
import {
  applyDispatched,
  assertContextInvariants,
  clearPending,
  createConversationContext,
  recordTurns,
  setPending,
} from '../src/core/memory/conversationContext';
import type { ConversationTurn } from '../src/types';

const T0 = new Date(2025, 5, 16, 10, 0).getTime();

describe('InMemoryContextStore', () => {
  it('should create a fresh idle context for an unknown conversation', () => {
    const store = new InMemoryContextStore();
    const context = store.getOrCreate('c-1', T0);

    expect(context).toEqual({
      conversationId: 'c-1',
      activeMode: 'Appointment',
      pendingIntent: null,
      partialSlots: {},
      lastAppointmentReference: null,
      pendingSwitchOffer: null,
      undeliveredCommand: null,
      history: [],
      createdAt: T0,
      updatedAt: T0,
    });
    expect(store.get('c-1')).toBeNull();
  });

  it('should hand out copies so unsaved changes never leak', () => {
    const store = new InMemoryContextStore();
    const context = store.getOrCreate('c-1', T0);
    setPending(context, 'ScheduleAppointment', { person: 'John' });
    store.save(context, T0);

    const copy = store.getOrCreate('c-1', T0);
    copy.partialSlots.person = 'Mary';

    expect(store.get('c-1')?.partialSlots).toEqual({ person: 'John' });
  });

  it('should stamp the save time', () => {
    const store = new InMemoryContextStore();
    store.save(createConversationContext('c-1', T0), T0 + 5000);

    expect(store.get('c-1')?.updatedAt).toBe(T0 + 5000);
  });

  it('should keep conversations isolated', () => {
    const store = new InMemoryContextStore();
    const first = store.getOrCreate('c-1', T0);
    setPending(first, 'CancelAppointment', { person: 'John' });
    store.save(first, T0);

    expect(store.getOrCreate('c-2', T0).pendingIntent).toBeNull();
  });

  it('should discard a conversation on reset', () => {
    const store = new InMemoryContextStore();
    store.save(createConversationContext('c-1', T0), T0);
    store.reset('c-1');

    expect(store.get('c-1')).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('should drop conversations idle past the maximum age', () => {
    const store = new InMemoryContextStore({ maxAgeMs: 1000 });
    store.save(createConversationContext('old', T0), T0);
    store.save(createConversationContext('recent', T0), T0 + 4500);

    expect(store.cleanup(T0 + 5000)).toBe(1);
    expect(store.get('old')).toBeNull();
    expect(store.get('recent')).not.toBeNull();
  });
});

describe('conversation context helpers', () => {
  it('should set and clear the pending intent with its slots', () => {
    const context = createConversationContext('c-1', T0);

    setPending(context, 'ScheduleAppointment', { person: 'John', date: '2025-06-20' });
    expect(context.pendingIntent).toBe('ScheduleAppointment');
    expect(context.partialSlots).toEqual({ person: 'John', date: '2025-06-20' });

    clearPending(context);
    expect(context.pendingIntent).toBeNull();
    expect(context.partialSlots).toEqual({});
  });

  it('should remember the appointment a dispatched command concerned', () => {
    const context = createConversationContext('c-1', T0);
    setPending(context, 'ScheduleAppointment', { person: 'John' });

    applyDispatched(context, {
      intent: 'ScheduleAppointment',
      person: 'John',
      date: '2025-06-20',
      time: '15:00',
      recurrence: null,
    });

    expect(context.pendingIntent).toBeNull();
    expect(context.lastAppointmentReference).toEqual({ person: 'John', date: '2025-06-20', time: '15:00' });
  });

  it('should move to knowledge mode after a knowledge query is delivered', () => {
    const context = createConversationContext('c-1', T0);
    applyDispatched(context, { intent: 'KnowledgeQuery', question: 'what is gravity?' });

    expect(context.activeMode).toBe('Knowledge');
  });

  it('should leave a pending request alone after a summary is delivered', () => {
    const context = createConversationContext('c-1', T0);
    setPending(context, 'ScheduleAppointment', { person: 'John' });

    applyDispatched(context, { intent: 'SummarizeConversation', history: [] });

    expect(context.pendingIntent).toBe('ScheduleAppointment');
    expect(context.partialSlots).toEqual({ person: 'John' });
    expect(context.activeMode).toBe('Appointment');
  });

  it('should keep only the latest twenty turns', () => {
    const context = createConversationContext('c-1', T0);
    for (let i = 1; i <= 12; i++) {
      recordTurns(context, { role: 'user', text: `question ${i}` }, { role: 'assistant', text: `answer ${i}` });
    }

    expect(context.history).toHaveLength(20);
    expect(context.history[0]).toEqual({ role: 'user', text: 'question 3' });
    expect(context.history[19]).toEqual({ role: 'assistant', text: 'answer 12' });
  });

  describe('assertContextInvariants', () => {
    it('should reject a history past the cap', () => {
      const context = createConversationContext('c-1', T0);
      const turn: ConversationTurn = { role: 'user', text: 'hello' };
      context.history = Array.from({ length: 21 }, () => turn);

      expect(() => assertContextInvariants(context)).toThrow('history holds 21 turns');
    });

    it('should accept a consistent context', () => {
      const context = createConversationContext('c-1', T0);
      setPending(context, 'ScheduleAppointment', { person: 'John', date: '2025-06-20', time: '15:00' });

      expect(() => assertContextInvariants(context)).not.toThrow();
    });

    it('should reject slots without a pending intent', () => {
      const context = createConversationContext('c-1', T0);
      context.partialSlots = { person: 'John' };

      expect(() => assertContextInvariants(context)).toThrow(ContextInvariantViolationError);
    });

    it('should reject a malformed time slot', () => {
      const context = createConversationContext('c-1', T0);
      setPending(context, 'ScheduleAppointment', { time: '25:00' });

      expect(() => assertContextInvariants(context)).toThrow('malformed time slot "25:00"');
    });

    it('should reject a pending intent outside appointment mode', () => {
      const context = createConversationContext('c-1', T0, 'Knowledge');
      context.pendingIntent = 'ListAppointments';

      expect(() => assertContextInvariants(context)).toThrow(ContextInvariantViolationError);
    });

    it('should reject a switch offer for the active mode', () => {
      const context = createConversationContext('c-1', T0);
      context.pendingSwitchOffer = 'Appointment';

      expect(() => assertContextInvariants(context)).toThrow('switch offer targets the active mode');
    });
  });
});
