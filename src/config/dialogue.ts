/**
 * Dialogue Configuration
 * Tunable constants for classification, slot filling and time defaults
 */

export const DialogueConfig = {
  /**
   * Minimum classifier confidence to commit to an intent.
   * Below this the user is asked what they meant.
   */
  CONFIDENCE_THRESHOLD: 0.6,

  /**
   * Intents scoring within this distance of the best score count as competitors.
   * confidence = best / number of competitors
   */
  COMPETITOR_MARGIN: 0.15,

  /** Pattern strengths */
  STRENGTH: {
    STRONG_PHRASE: 0.9,
    KEYWORD: 0.7,
    FUZZY_KEYWORD: 0.65,
    QUESTION_FORM: 0.8,
    KNOWLEDGE_MODE_DEFAULT: 0.7,
    EXPLICIT_SWITCH: 0.95,
  },

  /** Named periods → wall-clock time */
  PERIOD_DEFAULTS: {
    morning: '09:00',
    noon: '12:00',
    afternoon: '14:00',
    evening: '18:00',
    night: '20:00',
    midnight: '00:00',
  },

  /** User and assistant turns kept per conversation for summaries */
  MAX_HISTORY_TURNS: 20,

  /** Weekday-based "this week" / "next week" arithmetic starts on Monday */
  WEEK_STARTS_ON: 1,
} as const;

export type NamedPeriod = keyof typeof DialogueConfig.PERIOD_DEFAULTS;
