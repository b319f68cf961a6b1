/**
 * DuckDuckGo instant answer API. Only the abstract is used.
 */

import { z } from 'zod';
import { ExternalSourceUnavailable } from '../core/errors.js';
import type { DuckDuckGoSource } from '../types/index.js';
import { SOURCE_DEFAULTS, type FetchLike, type SourceAdapter, type SourceHit } from './provider.js';

const instantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
});

export function createDuckDuckGoAdapter(config: DuckDuckGoSource, fetchFn: FetchLike): SourceAdapter {
  return {
    name: config.name,
    timeoutMs: config.timeoutMs ?? SOURCE_DEFAULTS.timeoutMs,
    minLength: config.minLength ?? SOURCE_DEFAULTS.minLength,

    async lookup(term: string, signal: AbortSignal): Promise<SourceHit | null> {
      const params = new URLSearchParams({
        q: term,
        format: 'json',
        no_html: '1',
        skip_disambig: '1',
      });
      const url = `${config.baseUrl}?${params.toString()}`;

      const response = await fetchFn(url, {
        headers: { 'User-Agent': SOURCE_DEFAULTS.userAgent },
        signal,
      });

      if (!response.ok) {
        throw new ExternalSourceUnavailable(config.name, `HTTP ${response.status}`);
      }

      const parsed = instantAnswerSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ExternalSourceUnavailable(config.name, 'unexpected instant answer payload');
      }

      const data = parsed.data;
      if (!data.AbstractText) return null;

      return {
        text: data.AbstractText,
        url: data.AbstractURL || url,
        title: data.Heading,
      };
    },
  };
}
