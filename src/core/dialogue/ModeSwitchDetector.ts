import { DialogueConfig } from '../../config/dialogue';
import type { Classification, Intent, Mode } from '../../types';
import { assertNever } from '../../utils/helpers';

const AFFIRMATION = /^(?:yes|yeah|yep|yup|sure|ok|okay|please|switch|go ahead|do it|sounds good)\b/;
const NEGATION = /^(?:no|nope|nah|stay|don'?t|do not|not now)\b/;

export type SwitchDecision =
  | { kind: 'none' }
  | { kind: 'offer'; target: Mode }
  | { kind: 'switch'; target: Mode; silent: boolean }
  | { kind: 'already'; mode: Mode };

export type OfferReply = 'accept' | 'decline' | 'ignore';

/**
 * Mode each intent belongs to; null for intents that belong to no mode
 */
export function naturalModeOf(intent: Intent): Mode | null {
  switch (intent) {
    case 'ScheduleAppointment':
    case 'CheckAvailability':
    case 'CancelAppointment':
    case 'ListAppointments':
      return 'Appointment';
    case 'KnowledgeQuery':
      return 'Knowledge';
    case 'SwitchMode':
    case 'Unknown':
      return null;
    default:
      return assertNever(intent, 'intent');
  }
}

/**
 * Mode Switch Detector
 *
 * An explicit switch phrase switches at once. A confident intent from the other mode
 * only produces an offer, answered on the next turn.
 */
export class ModeSwitchDetector {
  decide(classification: Classification, activeMode: Mode): SwitchDecision {
    const { intent, confidence, switchTarget } = classification;

    if (switchTarget !== null) {
      if (switchTarget === activeMode) {
        return intent === 'SwitchMode' ? { kind: 'already', mode: activeMode } : { kind: 'none' };
      }
      return { kind: 'switch', target: switchTarget, silent: intent !== 'SwitchMode' };
    }

    const natural = naturalModeOf(intent);
    if (natural !== null && natural !== activeMode && confidence >= DialogueConfig.CONFIDENCE_THRESHOLD) {
      return { kind: 'offer', target: natural };
    }

    return { kind: 'none' };
  }

  readOfferReply(text: string): OfferReply {
    const lower = text.toLowerCase().trim();
    if (AFFIRMATION.test(lower)) return 'accept';
    if (NEGATION.test(lower)) return 'decline';
    return 'ignore';
  }
}
