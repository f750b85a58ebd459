import lexicon from '../config/lexicon.json';

const STOP_WORDS: ReadonlySet<string> = new Set(lexicon.stopWords);
const TEMPORAL_WORDS: ReadonlySet<string> = new Set(lexicon.temporalWords);
const DOMAIN_WORDS: ReadonlySet<string> = new Set(lexicon.domainWords);
const MONTH_NAME_GIVEN_NAMES: ReadonlySet<string> = new Set(lexicon.monthNameGivenNames);
const TITLES: ReadonlySet<string> = new Set(lexicon.titles);

/**
 * Text utilities for tokenizing and normalizing utterances
 */
export class TextUtils {
  /**
   * Normalize text for comparison
   */
  static normalize(text: string): string {
    return text.toLowerCase().trim().replace(/\s+/g, ' ');
  }

  /**
   * Lowercase word tokens with punctuation removed (apostrophes kept)
   */
  static tokenize(text: string): string[] {
    return this.normalize(text)
      .replace(/[^\p{L}\p{N}'\s]/gu, ' ')
      .split(/\s+/)
      .filter(Boolean);
  }

  static isTitle(word: string): boolean {
    return TITLES.has(word.toLowerCase().replace(/\.$/, ''));
  }

  /** Month names that are also given names (April, May, June, August) */
  static isMonthNameGivenName(word: string): boolean {
    return MONTH_NAME_GIVEN_NAMES.has(word.toLowerCase());
  }

  /**
   * True when a word cannot be part of a person's name
   */
  static isReservedWord(word: string): boolean {
    const lower = word.toLowerCase();
    return STOP_WORDS.has(lower) || TEMPORAL_WORDS.has(lower) || DOMAIN_WORDS.has(lower);
  }

  /**
   * Remove markdown so text can be spoken
   */
  static stripMarkdown(text: string): string {
    return text
      .replace(/```[\s\S]*?```/g, '')
      .replace(/`([^`]*)`/g, '$1')
      .replace(/\*\*([^*]+)\*\*/g, '$1')
      .replace(/__([^_]+)__/g, '$1')
      .replace(/\*([^*]+)\*/g, '$1')
      .replace(/_([^_]+)_/g, '$1')
      .replace(/^\s*#{1,6}\s+/gm, '')
      .replace(/^\s*[-*+]\s+/gm, '')
      .replace(/^\s*\d+\.\s+/gm, '')
      .replace(/^\s*>\s+/gm, '')
      .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
      .replace(/<[^>]*>/g, '')
      .replace(/[ \t]{2,}/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}
