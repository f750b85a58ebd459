/**
 * Shared dialogue types.
 *
 * Intent and Mode are closed unions; every switch over them must be exhaustive
 * (see assertNever in utils/helpers).
 */

// ============================================================================
// INTENTS & MODES
// ============================================================================

export const INTENTS = [
  'ScheduleAppointment',
  'CheckAvailability',
  'CancelAppointment',
  'ListAppointments',
  'KnowledgeQuery',
  'SwitchMode',
  'Unknown',
] as const;

export type Intent = (typeof INTENTS)[number];

/** Intents that are completed by filling slots */
export type AppointmentIntent = Extract<
  Intent,
  'ScheduleAppointment' | 'CheckAvailability' | 'CancelAppointment' | 'ListAppointments'
>;

export const APPOINTMENT_INTENTS: readonly AppointmentIntent[] = [
  'ScheduleAppointment',
  'CheckAvailability',
  'CancelAppointment',
  'ListAppointments',
];

export type Mode = 'Appointment' | 'Knowledge';

export interface Classification {
  intent: Intent;
  confidence: number; // 0-1
  /** Mode named by an explicit "switch to X mode" phrase, if any */
  switchTarget: Mode | null;
  /** Intents that scored within the competitor margin of the winner (winner included) */
  competitors: Intent[];
}

// ============================================================================
// ENTITIES
// ============================================================================

export type EntityKind = 'Person' | 'DateExpr' | 'TimeExpr' | 'Recurrence';

export interface Span {
  start: number;
  end: number; // exclusive
}

export interface Entity {
  kind: EntityKind;
  rawText: string;
  span: Span;
  /** Title-cased name for Person entities */
  value?: string;
  /** Every kind this span could be; more than one means the slot context decides */
  candidateKinds: EntityKind[];
  /** Word that introduced the entity ("with" in "with John"), if any */
  cue?: string;
}

// ============================================================================
// DATES & TIMES
// ============================================================================

/** yyyy-MM-dd */
export type CalendarDate = string;

/** HH:mm, 24-hour */
export type WallClockTime = string;

export interface ResolvedDateTime {
  date: CalendarDate | null;
  time: WallClockTime | null;
}

// ============================================================================
// SLOTS & CONTEXT
// ============================================================================

export type SlotName = 'person' | 'date' | 'time' | 'recurrence';

export interface PartialSlots {
  person?: string;
  date?: CalendarDate;
  time?: WallClockTime;
  recurrence?: string;
}

export interface AppointmentReference {
  person: string;
  date: CalendarDate;
  time: WallClockTime;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface ConversationContext {
  conversationId: string;
  activeMode: Mode;
  pendingIntent: AppointmentIntent | null;
  /** Non-empty only while pendingIntent is set */
  partialSlots: PartialSlots;
  lastAppointmentReference: AppointmentReference | null;
  /** Mode offered on the previous turn and not yet answered */
  pendingSwitchOffer: Mode | null;
  /** Command whose dispatch failed and can be retried as-is */
  undeliveredCommand: StructuredCommand | null;
  /** Latest turns, oldest first, capped at DialogueConfig.MAX_HISTORY_TURNS */
  history: ConversationTurn[];
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// COMMANDS & OUTCOMES
// ============================================================================

export type StructuredCommand =
  | {
      intent: 'ScheduleAppointment';
      person: string;
      date: CalendarDate;
      time: WallClockTime;
      recurrence: string | null;
    }
  | {
      intent: 'CheckAvailability';
      person: string;
      date: CalendarDate;
      /** null means any time that day */
      time: WallClockTime | null;
    }
  | {
      intent: 'CancelAppointment';
      person: string;
      date: CalendarDate;
      time: WallClockTime;
    }
  | {
      intent: 'ListAppointments';
      person: string | null;
      date: CalendarDate | null;
    }
  | {
      intent: 'KnowledgeQuery';
      question: string;
    }
  | {
      intent: 'SummarizeConversation';
      /** Turns before the request, oldest first */
      history: ConversationTurn[];
    };

export type DialogueOutcome =
  | { kind: 'Dispatch'; command: StructuredCommand; promptText: string }
  | {
      kind: 'Clarify';
      missingSlots: SlotName[];
      missingIntent: boolean;
      promptText: string;
    }
  | { kind: 'ModeSwitchOffer'; targetMode: Mode; promptText: string }
  | { kind: 'ModeSwitched'; newMode: Mode; promptText: string };

// ============================================================================
// COLLABORATOR RECORDS
// ============================================================================

export interface Appointment {
  id: string;
  person: string;
  date: CalendarDate;
  time: WallClockTime;
  description: string;
  recurrence: string | null;
}

export type AvailabilityResult = 'available' | 'conflict';
