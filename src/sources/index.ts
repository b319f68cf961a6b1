/**
 * Reference source factory + the fallback chain.
 *
 * For each term, each source is asked once, in config order. The
 * first relevant snippet wins. Every failure is soft: logged, then
 * the next combination. The chain itself never throws.
 */

import type { SourceConfig, SourceResult } from '../types/index.js';
import { NO_SOURCE_DATA } from '../types/index.js';
import type { FetchLike, SourceAdapter } from './provider.js';
import { createWikipediaAdapter } from './wikipedia.js';
import { createDuckDuckGoAdapter } from './duckduckgo.js';
import { createReaderAdapter } from './reader.js';

export type { FetchLike, SourceAdapter, SourceHit } from './provider.js';

export function createSourceAdapter(config: SourceConfig, fetchFn: FetchLike = fetch): SourceAdapter {
  switch (config.type) {
    case 'wikipedia':
      return createWikipediaAdapter(config, fetchFn);
    case 'duckduckgo':
      return createDuckDuckGoAdapter(config, fetchFn);
    case 'reader':
      return createReaderAdapter(config, fetchFn);
  }
}

export interface SourceClient {
  /** Source names in lookup order */
  readonly sources: string[];
  lookup(terms: string[]): Promise<SourceResult>;
}

export function createSourceClient(
  adapters: SourceAdapter[],
  now: () => Date = () => new Date()
): SourceClient {
  return {
    sources: adapters.map((a) => a.name),

    async lookup(terms: string[]): Promise<SourceResult> {
      for (const term of terms) {
        for (const adapter of adapters) {
          try {
            const hit = await adapter.lookup(term, AbortSignal.timeout(adapter.timeoutMs));
            const snippet = hit ? hit.text.trim() : '';

            if (hit && snippet.length > adapter.minLength) {
              console.log(`[personachat] ${adapter.name} answered "${term}" (${snippet.length} chars)`);
              return {
                status: 'found',
                snippet,
                sourceName: adapter.name,
                sourceUrl: hit.url,
                retrievedAt: now().toISOString(),
                term,
              };
            }
          } catch (error) {
            const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
            console.warn(`[personachat] ${adapter.name} lookup for "${term}" failed (${reason})`);
          }
        }
      }

      if (terms.length > 0) {
        console.log(`[personachat] No reference data for [${terms.join(', ')}]`);
      }
      return NO_SOURCE_DATA;
    },
  };
}
