import type { Entity, EntityKind, Span } from '../../types';
import { toTitleCase } from '../../utils/helpers';
import { TextUtils } from '../../utils/text';

const MONTHS =
  'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';
const WEEKDAYS = 'monday|tuesday|wednesday|thursday|friday|saturday|sunday';
const COUNT = '\\d+|an?|one|two|three|four|five|six|seven|eight|nine|ten';
const UNIT = '(?:day|week|month)s?';
/** Anything an offset can count from: "from today", "after Friday", "from June 20" */
const OFFSET_BASE = [
  'today|now|tomorrow',
  `(?:(?:next|this|coming)\\s+)?(?:${WEEKDAYS})`,
  `(?:${MONTHS})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s*\\d{4})?`,
  `\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?(?:${MONTHS})(?:,?\\s*\\d{4})?`,
  '\\d{4}-\\d{2}-\\d{2}',
].join('|');

/**
 * Date patterns, highest priority first.
 * A lower-priority match overlapping a kept one is dropped.
 */
const DATE_PATTERNS: RegExp[] = [
  new RegExp(`\\b(?:${COUNT})\\s+${UNIT}\\s+(?:from|after)\\s+(?:${OFFSET_BASE})\\b`, 'gi'),
  /\b\d{4}-\d{2}-\d{2}\b/gi,
  new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?\\b(?:,?\\s*\\d{4}\\b)?`, 'gi'),
  new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?(?:${MONTHS})\\b(?:,?\\s*\\d{4}\\b)?`, 'gi'),
  /\b\d{1,2}\/\d{1,2}\/\d{4}\b/gi,
  /\bday after tomorrow\b/gi,
  new RegExp(`\\b(?:in|after)\\s+(?:${COUNT})\\s+${UNIT}\\b`, 'gi'),
  /\b(?:end|beginning|start)\s+of\s+(?:the\s+)?(?:next\s+)?month\b/gi,
  /\bnext\s+(?:week|month)\b/gi,
  new RegExp(`\\b(?:(?:next|this|coming)\\s+)?(?:${WEEKDAYS})\\b`, 'gi'),
  /\b(?:today|tomorrow|tonight)\b/gi,
];

/** Time patterns, highest priority first */
const TIME_PATTERNS: RegExp[] = [
  /\b\d{1,2}(?:[:.]\d{2})?\s*(?:a\.?m\.?|p\.?m\.?)(?![a-z])/gi,
  /\b(?:[01]\d|2[0-3]):[0-5]\d\b/gi,
  /\b\d{1,2}:[0-5]\d\b/gi,
  /\b\d{1,2}\s*o'?clock\b/gi,
  /\bat\s+\d{1,2}(?::[0-5]\d)?(?![\d:/.\-]|\s*(?:st|nd|rd|th)\b)/gi,
  /\b(?:morning|afternoon|evening|noon|midday|midnight|night)\b/gi,
];

/** The whole reply is a clock reading ("3", "3:30") */
const BARE_TIME_REPLY = /^\s*\d{1,2}(?::[0-5]\d)?\s*$/;

const RECURRENCE_PATTERNS: RegExp[] = [
  new RegExp(`\\bevery\\s+(?:other\\s+)?(?:day|week|month|weekday|${WEEKDAYS})s?\\b`, 'gi'),
  /\b(?:daily|weekly|biweekly|fortnightly|monthly)\b/gi,
];

/** "with John", "for Dr. Smith", "see Mary Jones", "availability of John" */
const CONTEXTUAL_PERSON =
  /\b(?:with|for|see|meet|of)\s+(?!(?:with|for|see|meet|of)\b)((?:(?:dr|mr|mrs|ms|miss|prof)\.?\s+)?[a-z][a-z'-]*(?:\s+[a-z][a-z'-]*)?)/gi;

const WORD = /(?<![\w'])[a-z][a-z'-]*/gi;

/** Longer utterances never yield a residual bare name */
const MAX_WORDS_FOR_RESIDUAL_NAME = 6;

interface Match {
  rawText: string;
  span: Span;
}

/**
 * Entity Extractor
 *
 * Finds person names, date expressions, time expressions and recurrence markers.
 * Never throws: fragments that match nothing are left out.
 */
export class EntityExtractor {
  extract(text: string): Entity[] {
    const dates = this.collect(text, DATE_PATTERNS);
    const times = BARE_TIME_REPLY.test(text) ? [wholeReply(text)] : this.collect(text, TIME_PATTERNS);
    const recurrences = this.collect(text, RECURRENCE_PATTERNS);

    const entities: Entity[] = [
      ...dates.map(m => this.toEntity('DateExpr', m)),
      ...times.map(m => this.toEntity('TimeExpr', m)),
      ...recurrences.map(m => this.toEntity('Recurrence', m)),
    ];

    const occupied = [...dates, ...times, ...recurrences].map(m => m.span);
    entities.push(...this.extractPersons(text, occupied));

    return entities.sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
  }

  /**
   * Run patterns in priority order, keeping matches that do not overlap earlier ones
   */
  private collect(text: string, patterns: RegExp[]): Match[] {
    const kept: Match[] = [];

    for (const pattern of patterns) {
      for (const found of text.matchAll(pattern)) {
        const start = found.index ?? 0;
        const span = { start, end: start + found[0].length };
        if (!kept.some(k => overlaps(k.span, span))) {
          kept.push({ rawText: found[0], span });
        }
      }
    }

    return kept;
  }

  private toEntity(kind: EntityKind, match: Match): Entity {
    return { kind, rawText: match.rawText, span: match.span, candidateKinds: [kind] };
  }

  private extractPersons(text: string, occupied: Span[]): Entity[] {
    const contextual = this.extractContextualPersons(text, occupied);
    if (contextual.length > 0) {
      return contextual;
    }
    const residual = this.extractResidualPerson(text, occupied);
    return residual ? [residual] : [];
  }

  private extractContextualPersons(text: string, occupied: Span[]): Entity[] {
    const persons: Entity[] = [];

    for (const found of text.matchAll(CONTEXTUAL_PERSON)) {
      const phrase = found[1];
      const phraseStart = (found.index ?? 0) + found[0].length - phrase.length;
      const words = [...phrase.matchAll(/\S+/g)].map(w => ({
        word: w[0],
        start: phraseStart + (w.index ?? 0),
      }));

      const accepted: typeof words = [];
      let sawName = false;
      for (const w of words) {
        if (!sawName && TextUtils.isTitle(w.word)) {
          accepted.push(w);
          continue;
        }
        if (!this.isNameWord(w.word, text, w.start + w.word.length)) break;
        accepted.push(w);
        sawName = true;
      }

      if (!sawName) continue;

      const last = accepted[accepted.length - 1];
      const span = { start: accepted[0].start, end: last.start + last.word.length };
      if (occupied.some(o => overlaps(o, span))) continue;

      const cue = found[0].split(/\s+/)[0].toLowerCase();
      persons.push({ ...this.toPerson(text.slice(span.start, span.end), span), cue });
    }

    return persons;
  }

  /**
   * A short reply whose only non-reserved words are one or two adjacent words
   * ("John", "Mary Jones", "John at 3pm")
   */
  private extractResidualPerson(text: string, occupied: Span[]): Entity | null {
    const allWords = [...text.matchAll(/\S+/g)];
    if (allWords.length === 0 || allWords.length > MAX_WORDS_FOR_RESIDUAL_NAME) {
      return null;
    }

    const candidates: Array<{ word: string; span: Span }> = [];
    for (const found of text.matchAll(WORD)) {
      const start = found.index ?? 0;
      const span = { start, end: start + found[0].length };
      if (occupied.some(o => overlaps(o, span))) continue;
      if (TextUtils.isReservedWord(found[0]) && !TextUtils.isMonthNameGivenName(found[0])) continue;
      if (!this.isNameWord(found[0], text, span.end)) return null;
      candidates.push({ word: found[0], span });
    }

    if (candidates.length === 0 || candidates.length > 2) {
      return null;
    }

    if (candidates.length === 2) {
      const gap = text.slice(candidates[0].span.end, candidates[1].span.start);
      if (!/^\s+$/.test(gap)) return null;
    }

    const span = { start: candidates[0].span.start, end: candidates[candidates.length - 1].span.end };
    return this.toPerson(text.slice(span.start, span.end), span);
  }

  /**
   * Month names that are also given names stay candidates unless a day number follows
   */
  private isNameWord(word: string, text: string, end: number): boolean {
    if (!/^[a-z][a-z'-]*$/i.test(word)) return false;
    if (TextUtils.isMonthNameGivenName(word)) {
      return !/^\s*\d/.test(text.slice(end));
    }
    return !TextUtils.isReservedWord(word);
  }

  private toPerson(rawText: string, span: Span): Entity {
    const words = rawText.split(/\s+/);
    const ambiguous = words.some(w => TextUtils.isMonthNameGivenName(w));
    return {
      kind: 'Person',
      rawText,
      span,
      value: toTitleCase(rawText),
      candidateKinds: ambiguous ? ['Person', 'DateExpr'] : ['Person'],
    };
  }
}

function wholeReply(text: string): Match {
  const rawText = text.trim();
  const start = text.indexOf(rawText);
  return { rawText, span: { start, end: start + rawText.length } };
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}
