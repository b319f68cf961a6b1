/**
 * External reference sources.
 *
 * Each entry in the `sources` list of data/config.yaml becomes one
 * adapter in the fallback chain. Order in the file is lookup order.
 */

interface SourceBase {
  /** Display name, also used in citations */
  name: string;
  /** Endpoint prefix the term is appended to */
  baseUrl: string;
  /** Per-lookup timeout. Default: 10000 */
  timeoutMs?: number;
  /** Snippets of this length or shorter are rejected. Default: 50 */
  minLength?: number;
}

export interface WikipediaSource extends SourceBase {
  type: 'wikipedia';
}

export interface DuckDuckGoSource extends SourceBase {
  type: 'duckduckgo';
}

/** Plain-text reader proxy over an arbitrary site search */
export interface ReaderSource extends SourceBase {
  type: 'reader';
  /** Returned text is cut to this many characters. Default: 1000 */
  maxChars?: number;
  /** Substrings that mean the page had nothing for the term */
  notFoundMarkers?: string[];
}

export type SourceConfig = WikipediaSource | DuckDuckGoSource | ReaderSource;

/** A snippet accepted by the source client */
export interface SourceSnippet {
  status: 'found';
  snippet: string;
  sourceName: string;
  sourceUrl: string;
  retrievedAt: string; // ISO 8601
  term: string;
}

/** Every term/source combination came back empty */
export interface NoSourceData {
  status: 'none';
}

export type SourceResult = SourceSnippet | NoSourceData;

export const NO_SOURCE_DATA: NoSourceData = Object.freeze({ status: 'none' });
