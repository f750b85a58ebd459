import { DialogueConfig } from '../../config/dialogue';
import type { AppointmentIntent, Classification, Intent, Mode } from '../../types';
import { APPOINTMENT_INTENTS } from '../../types';
import { FuzzyMatcher } from '../../utils/fuzzy';
import { TextUtils } from '../../utils/text';
import { EntityExtractor } from './EntityExtractor';
import {
  FUZZY_KEYWORDS,
  INTENT_PATTERNS,
  INTENT_PRIORITY,
  QUESTION_FORM,
  SWITCH_PATTERN,
  switchTargetFor,
} from './intentPatterns';

/**
 * Pluggable intent classification
 */
export interface IntentClassifier {
  name: string;
  classify(text: string, activeMode: Mode): Classification;
}

const FUZZY_KEYWORD_LIST = FUZZY_KEYWORDS.map(k => k.keyword);

/**
 * Lexical-pattern classifier.
 * Confidence drops in proportion to the number of intents that match about as strongly.
 */
export class PatternIntentClassifier implements IntentClassifier {
  name = 'pattern';

  constructor(private readonly extractor: EntityExtractor = new EntityExtractor()) {}

  classify(text: string, activeMode: Mode): Classification {
    const lower = TextUtils.normalize(text);

    const switchMatch = lower.match(SWITCH_PATTERN);
    if (switchMatch) {
      const target = switchTargetFor(switchMatch[1] ?? switchMatch[2] ?? '');
      const remainder = lower.replace(switchMatch[0], ' ');
      const hasContent = TextUtils.tokenize(remainder).some(word => !TextUtils.isReservedWord(word));

      if (!hasContent) {
        return {
          intent: 'SwitchMode',
          confidence: DialogueConfig.STRENGTH.EXPLICIT_SWITCH,
          switchTarget: target,
          competitors: ['SwitchMode'],
        };
      }
      return { ...this.classifyContent(remainder.trim(), target), switchTarget: target };
    }

    return this.classifyContent(lower, activeMode);
  }

  private classifyContent(lower: string, activeMode: Mode): Classification {
    const strengths = this.scoreAppointmentIntents(lower);
    const best = Math.max(0, ...strengths.values());

    if (best > 0) {
      const competitors = INTENT_PRIORITY.filter(
        intent => (strengths.get(intent) ?? 0) >= best - DialogueConfig.COMPETITOR_MARGIN
      );
      const winner =
        INTENT_PRIORITY.find(intent => strengths.get(intent) === best) ?? competitors[0];
      return {
        intent: winner,
        confidence: best / competitors.length,
        switchTarget: null,
        competitors,
      };
    }

    if (!this.hasAppointmentEntities(lower)) {
      if (QUESTION_FORM.test(lower)) {
        return knowledge(DialogueConfig.STRENGTH.QUESTION_FORM);
      }
      if (activeMode === 'Knowledge') {
        return knowledge(DialogueConfig.STRENGTH.KNOWLEDGE_MODE_DEFAULT);
      }
    }

    return { intent: 'Unknown', confidence: 0, switchTarget: null, competitors: [] };
  }

  private scoreAppointmentIntents(lower: string): Map<AppointmentIntent, number> {
    const strengths = new Map<AppointmentIntent, number>();

    for (const intent of APPOINTMENT_INTENTS) {
      const matched = INTENT_PATTERNS[intent]
        .filter(trigger => trigger.pattern.test(lower))
        .map(trigger => trigger.strength);
      if (matched.length > 0) {
        strengths.set(intent, Math.max(...matched));
      }
    }

    for (const token of TextUtils.tokenize(lower)) {
      if (FUZZY_KEYWORD_LIST.includes(token)) continue;
      const match = FuzzyMatcher.matchKeyword(token, FUZZY_KEYWORD_LIST);
      const entry = match ? FUZZY_KEYWORDS.find(k => k.keyword === match.item) : undefined;
      if (entry) {
        const current = strengths.get(entry.intent) ?? 0;
        strengths.set(entry.intent, Math.max(current, DialogueConfig.STRENGTH.FUZZY_KEYWORD));
      }
    }

    return strengths;
  }

  private hasAppointmentEntities(text: string): boolean {
    return this.extractor.extract(text).some(entity => entity.kind !== 'Person');
  }
}

function knowledge(confidence: number): Classification {
  const intent: Intent = 'KnowledgeQuery';
  return { intent, confidence, switchTarget: null, competitors: [intent] };
}
