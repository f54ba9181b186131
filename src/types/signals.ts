/**
 * The keyword/regex table behind persona analysis.
 *
 * Each rule maps a trigger (any of a keyword group, or a pattern)
 * to one canonical label in one category. Rules are checked against
 * the lower-cased content of the persona's retrieved chunks; a single
 * matching chunk is enough to emit the label.
 *
 * The table lives in data/signals.yaml so it can be tuned without
 * touching code.
 */

import type { SignalCategory } from './persona.js';

export interface SignalRule {
  /** Which label family this rule feeds */
  category: SignalCategory;

  /** Canonical label emitted when the rule fires */
  label: string;

  /**
   * Match condition.
   * - 'keywords': any of the keywords appear in the chunk
   * - 'pattern':  regex match against the chunk
   */
  match: KeywordMatch | PatternMatch;

  /** Only chunks longer than this many characters can fire the rule */
  minLength?: number;
}

export interface KeywordMatch {
  type: 'keywords';
  /** Substrings looked for in the lower-cased chunk text */
  keywords: string[];
  /** Every keyword must appear, not just one */
  all?: boolean;
}

export interface PatternMatch {
  type: 'pattern';
  /** RegExp source */
  pattern: string;
  /** Defaults to 'i'; g and y are dropped */
  flags?: string;
}
