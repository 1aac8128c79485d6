import { fetchHtml, type FetchImpl } from '../client.js';
import { parseEventPage, type ParseOptions } from '../parser.js';
import { FetchError, toError } from '../../../core/errors.js';
import type { DetailFetcher, FetchOutcome } from '../../../core/types.js';

/**
 * Jerrybase Detail Fetcher
 *
 * Purpose: Fetch one event page and extract its detail-only fields
 * Retries: none; a failed page is reported and the caller moves on
 *
 * Usage:
 *   const fetcher = createDetailFetcher({ timeoutMs: 30_000 })
 *   const outcome = await fetcher.fetchAndParse('https://jerrybase.com/events/19770508-01')
 *   if (outcome.ok) console.log(outcome.value.setlist)
 */

export interface DetailFetcherOptions extends ParseOptions {
  /** Per-request timeout in ms */
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
}

/**
 * Create a fetcher performing exactly one request per call
 * @param options - Timeout, fetch implementation and parser options
 * @returns Fetcher whose promises always resolve
 */
export function createDetailFetcher(options: DetailFetcherOptions = {}): DetailFetcher {
  const { timeoutMs, fetchImpl, knownVenues } = options;

  return {
    async fetchAndParse(url: string): Promise<FetchOutcome> {
      if (!URL.canParse(url)) {
        return { ok: false, url, error: new FetchError(url, `Not an absolute URL: ${url}`) };
      }

      let html: string;
      try {
        html = await fetchHtml(url, { timeoutMs, fetchImpl });
      } catch (error) {
        const cause = toError(error);
        return { ok: false, url, error: new FetchError(url, `Failed to fetch ${url}: ${cause.message}`, cause) };
      }

      try {
        return { ok: true, url, value: parseEventPage(html, { knownVenues }) };
      } catch (error) {
        const cause = toError(error);
        return { ok: false, url, error: new FetchError(url, `Failed to parse ${url}: ${cause.message}`, cause) };
      }
    },
  };
}
