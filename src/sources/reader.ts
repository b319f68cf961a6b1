/**
 * Reader proxy — fetches a site search page as plain text.
 *
 * Used for the alternative sources (encyclopedia, finance and tech
 * sites) behind the two JSON APIs.
 */

import { ExternalSourceUnavailable } from '../core/errors.js';
import type { ReaderSource } from '../types/index.js';
import { SOURCE_DEFAULTS, type FetchLike, type SourceAdapter, type SourceHit } from './provider.js';

const DEFAULT_NOT_FOUND_MARKERS = ['No results found', 'Page not found', '0 results'];

export function createReaderAdapter(config: ReaderSource, fetchFn: FetchLike): SourceAdapter {
  const maxChars = config.maxChars ?? SOURCE_DEFAULTS.maxChars;
  const markers = (config.notFoundMarkers ?? DEFAULT_NOT_FOUND_MARKERS).map((m) => m.toLowerCase());

  return {
    name: config.name,
    timeoutMs: config.timeoutMs ?? SOURCE_DEFAULTS.timeoutMs,
    minLength: config.minLength ?? 100,

    async lookup(term: string, signal: AbortSignal): Promise<SourceHit | null> {
      const url = `${config.baseUrl}${encodeURIComponent(term)}`;

      const response = await fetchFn(url, {
        headers: { 'User-Agent': SOURCE_DEFAULTS.userAgent, Accept: 'text/plain' },
        signal,
      });

      if (response.status === 404) {
        await response.body?.cancel();
        return null;
      }
      if (!response.ok) {
        throw new ExternalSourceUnavailable(config.name, `HTTP ${response.status}`);
      }

      const text = (await response.text()).trim();
      const lower = text.toLowerCase();
      if (markers.some((m) => lower.includes(m))) return null;

      return { text: text.slice(0, maxChars), url };
    },
  };
}
