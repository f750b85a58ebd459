import { DialogueConfig } from '../../config/dialogue';
import type { AppointmentIntent, Mode } from '../../types';

export interface TriggerPattern {
  pattern: RegExp;
  strength: number;
}

const { STRONG_PHRASE, KEYWORD } = DialogueConfig.STRENGTH;

/** "the schedule", "a good book": after a determiner these words are nouns */
const NOT_AFTER_DETERMINER = "(?<!\\b(?:the|my|a|an|your|his|her|its|our|their|this|that|good|new)\\s|(?<!\\blet)'s\\s)";

function verbPhrase(verbs: string, rest = ''): RegExp {
  return new RegExp(`${NOT_AFTER_DETERMINER}\\b(?:${verbs})\\b${rest}`);
}

/**
 * Trigger phrases per appointment intent, matched against lowercased text
 */
export const INTENT_PATTERNS: Record<AppointmentIntent, TriggerPattern[]> = {
  ScheduleAppointment: [
    {
      pattern: verbPhrase('schedule|book|set up|make|arrange|create', '.*\\b(?:appointment|meeting|session|consultation|visit)\\b'),
      strength: STRONG_PHRASE,
    },
    { pattern: verbPhrase('schedule|book|set up|arrange', '.*\\b(?:with|for)\\b'), strength: STRONG_PHRASE },
    { pattern: /\b(?:new|another) appointment\b/, strength: STRONG_PHRASE },
    { pattern: verbPhrase('schedule|book|set up|arrange|reserve'), strength: KEYWORD },
    { pattern: /\b(?:see|need) (?:a|the) doctor\b/, strength: KEYWORD },
  ],
  CheckAvailability: [
    { pattern: /\b(?:check|see)\b.*\bavailab(?:le|ility)\b/, strength: STRONG_PHRASE },
    { pattern: /\b(?:is|are)\b.*\b(?:available|free)\b/, strength: STRONG_PHRASE },
    { pattern: /\bwhen can\b.*\bmeet\b/, strength: STRONG_PHRASE },
    { pattern: /\bavailab(?:le|ility)\b/, strength: KEYWORD },
    { pattern: /\b(?:free slots?|openings?)\b/, strength: KEYWORD },
  ],
  CancelAppointment: [
    { pattern: /\b(?:cancel|delete|remove|call off)\b.*\b(?:appointment|meeting|booking|it|this|that|one)\b/, strength: STRONG_PHRASE },
    { pattern: /\bdon'?t want the appointment\b/, strength: STRONG_PHRASE },
    { pattern: /\b(?:cancel|delete|call off)\b/, strength: KEYWORD },
  ],
  ListAppointments: [
    { pattern: /\b(?:show|list|view|see)\b.*\b(?:appointments|schedule|bookings|calendar)\b/, strength: STRONG_PHRASE },
    { pattern: /\b(?:what|which) appointments\b/, strength: STRONG_PHRASE },
    { pattern: /\bmy (?:appointments|schedule|bookings)\b/, strength: STRONG_PHRASE },
    { pattern: /\b(?:what|how)(?:'s|\s+(?:is|does))\b.*\b(?:the|[a-z]+'s) (?:schedule|calendar)\b/, strength: STRONG_PHRASE },
    { pattern: /\b(?!let's)[a-z]+'s (?:schedule|calendar|appointments)\b/, strength: STRONG_PHRASE },
  ],
};

/**
 * Misspelling-prone keywords matched fuzzily, token by token
 */
export const FUZZY_KEYWORDS: ReadonlyArray<{ keyword: string; intent: AppointmentIntent }> = [
  { keyword: 'schedule', intent: 'ScheduleAppointment' },
  { keyword: 'availability', intent: 'CheckAvailability' },
  { keyword: 'available', intent: 'CheckAvailability' },
];

/** Winner among equally strong intents */
export const INTENT_PRIORITY: readonly AppointmentIntent[] = [
  'CheckAvailability',
  'CancelAppointment',
  'ScheduleAppointment',
  'ListAppointments',
];

/** "switch to knowledge mode", "go back to appointments" */
export const SWITCH_PATTERN =
  /\b(?:switch|change|go|move|return|get)\s+(?:back\s+)?(?:to|into)\s+(?:the\s+)?(knowledge|general|questions?|appointments?|scheduling|booking)(?:\s+mode)?\b|\b(?:enter|use|activate)\s+(?:the\s+)?(knowledge|appointments?)\s+mode\b/;

export function switchTargetFor(word: string): Mode {
  return /^(?:appointments?|scheduling|booking)$/.test(word) ? 'Appointment' : 'Knowledge';
}

/** "summarize our conversation", "what have we discussed" */
export const SUMMARY_PATTERN =
  /\b(?:conversation|chat) summary\b|\bsummari[sz]e (?:our|this|the) (?:conversation|chat|discussion)\b|\bgive me a summary(?: of (?:our|this|the) (?:conversation|chat|discussion))?\s*[.!?]*$|\bwhat have we (?:talked|discussed|been talking)(?: about)?\b|\brecap (?:our|this|the) (?:conversation|chat)\b|\bsum ?up (?:our|this|the) (?:conversation|chat|discussion)\b/i;

/** Question form: leading question word or trailing question mark */
export const QUESTION_FORM =
  /^(?:what|who|whom|whose|when|where|why|how|which|is|are|was|were|do|does|did|can|could|would|should|explain|define|describe|tell me)\b|\?\s*$|\b(?:meaning of|definition of)\b/;

/**
 * Utterance with any switch phrase removed
 */
export function stripSwitchPhrase(text: string): string {
  return text.replace(new RegExp(SWITCH_PATTERN.source, 'i'), ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^(?:and|then|,)\s*/i, '');
}
