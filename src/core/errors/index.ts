import type { Intent, StructuredCommand } from '../../types';

export type DialogueErrorCode =
  | 'UNRESOLVABLE'
  | 'LOW_CONFIDENCE'
  | 'CONTEXT_INVARIANT_VIOLATION'
  | 'COLLABORATOR_UNAVAILABLE';

export abstract class DialogueError extends Error {
  abstract readonly code: DialogueErrorCode;
  /** Recoverable errors are answered with a follow-up question */
  abstract readonly recoverable: boolean;
}

/** A date/time fragment that could not be interpreted */
export class UnresolvableError extends DialogueError {
  readonly code = 'UNRESOLVABLE';
  readonly recoverable = true;

  constructor(public readonly fragment: string) {
    super(fragment ? `Could not resolve date/time from "${fragment}"` : 'No date or time to resolve');
    this.name = 'UnresolvableError';
  }
}

/** Intent ambiguity below the confidence threshold */
export class LowConfidenceError extends DialogueError {
  readonly code = 'LOW_CONFIDENCE';
  readonly recoverable = true;

  constructor(
    public readonly confidence: number,
    public readonly competitors: Intent[]
  ) {
    super(`Intent confidence ${confidence.toFixed(2)} is below threshold`);
    this.name = 'LowConfidenceError';
  }
}

/** Conversation memory is internally inconsistent; the conversation is reset */
export class ContextInvariantViolationError extends DialogueError {
  readonly code = 'CONTEXT_INVARIANT_VIOLATION';
  readonly recoverable = false;

  constructor(
    public readonly conversationId: string,
    public readonly detail: string
  ) {
    super(`Context invariant violated for ${conversationId}: ${detail}`);
    this.name = 'ContextInvariantViolationError';
  }
}

/** Appointment store or knowledge oracle could not be reached */
export class CollaboratorUnavailableError extends DialogueError {
  readonly code = 'COLLABORATOR_UNAVAILABLE';
  readonly recoverable = false;

  constructor(
    public readonly collaborator: 'appointment-store' | 'knowledge-oracle',
    public readonly command: StructuredCommand | null,
    public readonly cause?: unknown
  ) {
    super(`${collaborator} is unavailable`);
    this.name = 'CollaboratorUnavailableError';
  }
}
