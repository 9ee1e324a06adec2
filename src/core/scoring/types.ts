/**
 * Usage Classification Types
 */

/**
 * How the learner's token measures up against the expected usage.
 */
export interface UsageClassification {
  /** The token plays the role the WordEntry expects */
  matchesExpectedRole: boolean;

  /**
   * The word immediately before the token fits the simple collocation rule
   * for the token's role (a linking verb before an adjective, a subject
   * pronoun before a verb, a determiner before a noun).
   */
  natural: boolean;
}
