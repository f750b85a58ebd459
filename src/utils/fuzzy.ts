import Fuse from 'fuse.js';
import { FuzzyConfig, toFuseThreshold } from '../config/fuzzy';

/**
 * Fuzzy matching utilities for typo-tolerant keyword detection
 * Uses Fuse.js to shortlist candidates and Levenshtein similarity to score them
 */

export interface FuzzyMatch<T> {
  item: T;
  score: number; // 0-1, higher is better
}

export class FuzzyMatcher {
  /**
   * Find keywords similar to a single token
   * @param token - Word from the utterance
   * @param keywords - Keywords to compare against
   * @param threshold - Minimum similarity (0-1)
   */
  static matchKeyword(
    token: string,
    keywords: readonly string[],
    threshold: number = FuzzyConfig.KEYWORD_SIMILARITY_THRESHOLD
  ): FuzzyMatch<string> | null {
    if (token.length < FuzzyConfig.MIN_FUZZY_TOKEN_LENGTH) {
      return null;
    }

    const fuse = new Fuse([...keywords], {
      threshold: toFuseThreshold(threshold),
      includeScore: FuzzyConfig.FUSE_CONFIG.INCLUDE_SCORE,
      ignoreLocation: FuzzyConfig.FUSE_CONFIG.IGNORE_LOCATION,
    });

    const matches = fuse
      .search(token)
      .map(result => ({ item: result.item, score: this.similarity(token, result.item) }))
      .filter(match => match.score >= threshold)
      .sort((a, b) => b.score - a.score);

    return matches.length > 0 ? matches[0] : null;
  }

  /**
   * Levenshtein distance between two strings
   */
  static levenshteinDistance(str1: string, str2: string): number {
    const matrix: number[][] = [];

    for (let i = 0; i <= str2.length; i++) {
      matrix[i] = [i];
    }

    for (let j = 0; j <= str1.length; j++) {
      matrix[0][j] = j;
    }

    for (let i = 1; i <= str2.length; i++) {
      for (let j = 1; j <= str1.length; j++) {
        if (str2.charAt(i - 1) === str1.charAt(j - 1)) {
          matrix[i][j] = matrix[i - 1][j - 1];
        } else {
          matrix[i][j] = Math.min(
            matrix[i - 1][j - 1] + 1, // substitution
            matrix[i][j - 1] + 1,     // insertion
            matrix[i - 1][j] + 1      // deletion
          );
        }
      }
    }

    return matrix[str2.length][str1.length];
  }

  /**
   * Similarity score (0-1) from Levenshtein distance
   */
  static similarity(str1: string, str2: string): number {
    const distance = this.levenshteinDistance(str1.toLowerCase(), str2.toLowerCase());
    const maxLength = Math.max(str1.length, str2.length);
    return maxLength === 0 ? 1 : 1 - distance / maxLength;
  }
}
