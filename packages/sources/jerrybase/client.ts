/**
 * Jerrybase HTTP client
 * One GET per call, with a timeout and no retries
 */

const DEFAULT_TIMEOUT_MS = 30_000

const USER_AGENT = 'setlist-harvester/0.1'

export type FetchImpl = typeof fetch

export interface FetchHtmlOptions {
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
}

/**
 * Fetch a page and return its HTML
 * @throws Error on network failure, timeout or non-2xx status
 */
export async function fetchHtml(url: string, options: FetchHtmlOptions = {}): Promise<string> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, fetchImpl = fetch } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: { 'User-Agent': USER_AGENT, 'Accept': 'text/html,*/*' },
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }

    return await response.text();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
