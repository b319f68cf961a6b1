/**
 * Reference source abstraction.
 *
 * An adapter looks up one term and either returns text, returns
 * null (the source explicitly has nothing), or throws. The client
 * decides what counts as relevant and what to try next.
 */

export interface SourceHit {
  text: string;
  /** Canonical page for the citation */
  url: string;
  title?: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SourceAdapter {
  /** Human-readable name for logs and citations */
  name: string;

  /** Per-lookup timeout */
  timeoutMs: number;

  /** Hits must be longer than this */
  minLength: number;

  lookup(term: string, signal: AbortSignal): Promise<SourceHit | null>;
}

export const SOURCE_DEFAULTS = {
  timeoutMs: 10_000,
  minLength: 50,
  maxChars: 1000,
  userAgent: 'personachat/0.1 (reference lookup)',
};
