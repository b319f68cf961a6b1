/**
 * Wikipedia REST summary endpoint.
 *
 * GET {baseUrl}{Title_With_Underscores} → { title, extract, type, content_urls }
 */

import { z } from 'zod';
import { ExternalSourceUnavailable } from '../core/errors.js';
import type { WikipediaSource } from '../types/index.js';
import { SOURCE_DEFAULTS, type FetchLike, type SourceAdapter, type SourceHit } from './provider.js';

const summarySchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  extract: z.string().optional(),
  content_urls: z
    .object({ desktop: z.object({ page: z.string().optional() }).optional() })
    .optional(),
});

const NOT_FOUND_TYPES = ['not_found', 'disambiguation'];

export function createWikipediaAdapter(config: WikipediaSource, fetchFn: FetchLike): SourceAdapter {
  return {
    name: config.name,
    timeoutMs: config.timeoutMs ?? SOURCE_DEFAULTS.timeoutMs,
    minLength: config.minLength ?? SOURCE_DEFAULTS.minLength,

    async lookup(term: string, signal: AbortSignal): Promise<SourceHit | null> {
      const title = encodeURIComponent(term.trim().replace(/\s+/g, '_'));
      const url = `${config.baseUrl}${title}`;

      const response = await fetchFn(url, {
        headers: { 'User-Agent': SOURCE_DEFAULTS.userAgent, Accept: 'application/json' },
        signal,
      });

      if (response.status === 404) {
        await response.body?.cancel();
        return null;
      }
      if (!response.ok) {
        throw new ExternalSourceUnavailable(config.name, `HTTP ${response.status}`);
      }

      const parsed = summarySchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ExternalSourceUnavailable(config.name, 'unexpected summary payload');
      }

      const data = parsed.data;
      const type = data.type ?? '';
      if (NOT_FOUND_TYPES.some((t) => type.includes(t))) {
        return null;
      }

      return {
        text: data.extract ?? '',
        url: data.content_urls?.desktop?.page ?? url,
        title: data.title,
      };
    },
  };
}
