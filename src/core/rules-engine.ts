/**
 * Rules engine — turns a visitor question into reference-source
 * search terms, most specific first.
 *
 * The rule table is data (query-rules.yaml). The first rule whose
 * match fires decides the terms; everything else falls through to
 * stop-word stripping.
 */

import type { KeywordMatch, QueryPolicy, QueryRule } from '../types/index.js';

export interface RuleMatch {
  rule: QueryRule;
  /** Keywords of the rule found in the question, in rule order */
  matched: string[];
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Check a question against the rules. Returns the first match, or null.
 */
export function matchRule(question: string, rules: QueryRule[]): RuleMatch | null {
  const normalised = question.toLowerCase();

  for (const rule of rules) {
    const matched = testMatch(normalised, rule.match);
    if (matched) {
      return { rule, matched };
    }
  }

  return null;
}

/**
 * Map a question to candidate search terms. Never throws; an empty
 * list means there is nothing worth looking up.
 */
export function normalizeQuery(question: string, policy: QueryPolicy): string[] {
  const match = matchRule(question, policy.rules);

  if (match) {
    const terms = match.rule.includeMatched
      ? [...match.matched, ...match.rule.terms]
      : match.rule.terms;
    return dedupe(terms.map((t) => t.toLowerCase()));
  }

  const generic = stripStopWords(question, policy.stopWords);
  return generic ? [generic] : [];
}

/**
 * Drop stop-words and short words, keep the rest in order.
 */
export function stripStopWords(question: string, stopWords: string[]): string {
  const stop = new Set(stopWords.map((w) => w.toLowerCase()));

  return question
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(EDGE_PUNCTUATION, ''))
    .filter((word) => word.length > 2 && !stop.has(word))
    .join(' ');
}

/** Returns the matched keywords, or null when the rule does not fire */
function testMatch(normalised: string, match: KeywordMatch): string[] | null {
  const found = match.keywords.filter((kw) => normalised.includes(kw.toLowerCase()));

  if (match.all) {
    return found.length === match.keywords.length ? found : null;
  }
  return found.length > 0 ? found : null;
}

function dedupe(terms: string[]): string[] {
  return [...new Set(terms.filter(Boolean))];
}
