/**
 * Page fetching
 *
 * The URL rule lives here. The request itself goes through an
 * {@link HttpClient}, which callers may replace.
 */

import type { ExtractorConfig } from '../lib/config-schema.js';
import { loadConfig } from '../lib/config.js';
import { FetchError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

/** Options handed to the HTTP client for each request */
export interface HttpRequestOptions {
  timeoutMs: number;
  userAgent: string;
}

/**
 * Performs one GET and resolves with the response body as text.
 */
export type HttpClient = (url: string, options: HttpRequestOptions) => Promise<string>;

/** Options shared by everything that fetches a page */
export interface FetchOptions {
  /** Transport; defaults to {@link defaultHttpClient} */
  client?: HttpClient;
  /** Configuration; defaults to {@link loadConfig} */
  config?: ExtractorConfig;
}

/**
 * URL of a word's page under `baseUrl`, or of one revision of it when
 * `revision` is given.
 *
 * @example
 * ```typescript
 * pageUrl('https://en.wiktionary.org', 'olvidar')
 * // 'https://en.wiktionary.org/wiki/olvidar'
 * pageUrl('https://en.wiktionary.org', 'olvidar', 62345284)
 * // 'https://en.wiktionary.org/w/index.php?title=olvidar&oldid=62345284'
 * ```
 */
export function pageUrl(baseUrl: string, word: string, revision?: number): string {
  if (revision === undefined) {
    return `${baseUrl}/wiki/${encodeURIComponent(word)}`;
  }
  return `${baseUrl}/w/index.php?title=${encodeURIComponent(word)}&oldid=${revision}`;
}

/**
 * HTTP client backed by the global `fetch`.
 *
 * A 404 still resolves with the body: Wiktionary serves its "no entry"
 * page with that status, and the caller decides what it means.
 */
export const defaultHttpClient: HttpClient = async (url, { timeoutMs, userAgent }) => {
  const response = await fetch(url, {
    headers: {
      'User-Agent': userAgent,
      Accept: 'text/html,application/xhtml+xml',
    },
    signal: AbortSignal.timeout(timeoutMs),
    redirect: 'follow',
  });

  if (!response.ok && response.status !== 404) {
    const side = response.status >= 400 && response.status < 500 ? 'Client' : 'Server';
    throw new FetchError(
      `${side} error: ${response.status} ${response.statusText}`,
      response.status
    );
  }

  return response.text();
};

/**
 * Fetch the raw markup of a word's page.
 */
export async function fetchPageMarkup(
  word: string,
  revision?: number,
  options: FetchOptions = {}
): Promise<string> {
  const config = options.config ?? loadConfig();
  const client = options.client ?? defaultHttpClient;
  const url = pageUrl(config.baseUrl, word, revision);

  const log = loggers.fetch.withOperation('fetchPageMarkup');
  log.debug('Fetching page', { url });

  const markup = await client(url, {
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
  });

  log.debug('Fetched page', { url, bytes: markup.length });
  return markup;
}
