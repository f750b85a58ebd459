/**
 * Fuzzy Matching Configuration
 * Constants for typo-tolerant trigger keyword matching
 */

export const FuzzyConfig = {
  /**
   * Minimum similarity (0-1) between an utterance token and a trigger keyword.
   * 0.8 accepts one or two typos in words of eight letters or more.
   */
  KEYWORD_SIMILARITY_THRESHOLD: 0.8,

  /**
   * Tokens shorter than this never fuzzy-match
   * Short words produce too many accidental matches
   */
  MIN_FUZZY_TOKEN_LENGTH: 7,

  /**
   * Fuse.js configuration
   */
  FUSE_CONFIG: {
    /** true = match anywhere in the string, not just at the start */
    IGNORE_LOCATION: true,
    INCLUDE_SCORE: true,
  },
} as const;

/**
 * Convert similarity score to Fuse.js distance threshold
 * Fuse uses distance (lower is better), we use similarity (higher is better)
 */
export function toFuseThreshold(similarityThreshold: number): number {
  return 1 - similarityThreshold;
}
