import { DialogueConfig } from '../../config/dialogue';
import type {
  AppointmentIntent,
  ConversationContext,
  ConversationTurn,
  Mode,
  PartialSlots,
  StructuredCommand,
} from '../../types';
import { TimeFormatter } from '../../utils/time';
import { ContextInvariantViolationError } from '../errors';

export function createConversationContext(
  conversationId: string,
  now: number = Date.now(),
  activeMode: Mode = 'Appointment'
): ConversationContext {
  return {
    conversationId,
    activeMode,
    pendingIntent: null,
    partialSlots: {},
    lastAppointmentReference: null,
    pendingSwitchOffer: null,
    undeliveredCommand: null,
    history: [],
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Set the pending intent together with its slots
 */
export function setPending(
  context: ConversationContext,
  intent: AppointmentIntent,
  slots: PartialSlots
): void {
  context.pendingIntent = intent;
  context.partialSlots = { ...slots };
}

/**
 * Clear the pending intent and its slots in one step
 */
export function clearPending(context: ConversationContext): void {
  context.pendingIntent = null;
  context.partialSlots = {};
}

/**
 * Append turns, dropping the oldest past the history cap
 */
export function recordTurns(context: ConversationContext, ...turns: ConversationTurn[]): void {
  context.history = [...context.history, ...turns].slice(-DialogueConfig.MAX_HISTORY_TURNS);
}

export function hasSlots(slots: PartialSlots): boolean {
  return Object.values(slots).some(value => value !== undefined);
}

/**
 * Throws ContextInvariantViolationError when the context is inconsistent
 */
export function assertContextInvariants(context: ConversationContext): void {
  const fail = (detail: string): never => {
    throw new ContextInvariantViolationError(context.conversationId, detail);
  };

  if (context.pendingIntent === null && hasSlots(context.partialSlots)) {
    fail('partial slots present without a pending intent');
  }
  if (context.pendingIntent !== null && context.activeMode !== 'Appointment') {
    fail(`pending ${context.pendingIntent} outside appointment mode`);
  }
  if (context.pendingSwitchOffer !== null && context.pendingSwitchOffer === context.activeMode) {
    fail('switch offer targets the active mode');
  }

  const { date, time } = context.partialSlots;
  if (date !== undefined && !TimeFormatter.isCalendarDate(date)) {
    fail(`malformed date slot "${date}"`);
  }
  if (time !== undefined && !TimeFormatter.isWallClock(time)) {
    fail(`malformed time slot "${time}"`);
  }

  if (context.history.length > DialogueConfig.MAX_HISTORY_TURNS) {
    fail(`history holds ${context.history.length} turns`);
  }

  const reference = context.lastAppointmentReference;
  if (
    reference !== null &&
    (!reference.person || !TimeFormatter.isCalendarDate(reference.date) || !TimeFormatter.isWallClock(reference.time))
  ) {
    fail('malformed appointment reference');
  }
}

/**
 * Settle the context after a command reached its collaborator
 */
export function applyDispatched(context: ConversationContext, command: StructuredCommand): void {
  context.undeliveredCommand = null;
  context.pendingSwitchOffer = null;
  // A summary leaves any request in progress as it was
  if (command.intent === 'SummarizeConversation') return;
  clearPending(context);

  if (command.intent === 'KnowledgeQuery') {
    context.activeMode = 'Knowledge';
    return;
  }
  context.activeMode = 'Appointment';
  if (command.intent === 'ScheduleAppointment' || command.intent === 'CancelAppointment') {
    context.lastAppointmentReference = { person: command.person, date: command.date, time: command.time };
  }
}
