/**
 * Query rules — how a free-text question turns into search terms.
 *
 * Rules live in data/query-rules.yaml and are checked top to bottom;
 * the first match decides the terms. Questions no rule catches go
 * through stop-word stripping instead.
 */

export interface KeywordMatch {
  type: 'keywords';
  /** Any of these keywords triggers the rule */
  keywords: string[];
  /** Require ALL keywords instead of ANY? */
  all?: boolean;
}

export interface QueryRule {
  /** Unique identifier */
  id: string;

  match: KeywordMatch;

  /**
   * Emit the keywords that actually matched (in rule order)
   * ahead of the fixed terms.
   */
  includeMatched?: boolean;

  /** Search terms, most specific first */
  terms: string[];
}

export interface QueryPolicy {
  rules: QueryRule[];
  stopWords: string[];
}
