/**
 * Test helpers and utilities
 */

import { readFileSync } from 'node:fs';
import { vi } from 'vitest';
import type { ExtractorConfig } from '../src/lib/config-schema.js';
import { Logger, setLoggerProvider, type LogEntry } from '../src/lib/logger.js';
import type { HttpClient } from '../src/wiktionary/fetch.js';
import { Page } from '../src/wiktionary/page.js';

/** Names of the pages under test/fixtures */
export type FixtureName = 'olvidar' | 'empleado' | 'kauppa' | 'missing';

/**
 * Read a saved page from test/fixtures
 */
export function loadFixture(name: FixtureName): string {
  return readFileSync(new URL(`./fixtures/${name}.html`, import.meta.url), 'utf8');
}

/**
 * Page built from a fixture, as if fetched for `name`
 */
export function fixturePage(name: Exclude<FixtureName, 'missing'>, revision?: number): Page {
  return new Page(name, loadFixture(name), { revision });
}

/** Configuration pointing at a host no test ever reaches */
export const TEST_CONFIG: ExtractorConfig = {
  baseUrl: 'https://wikt.test',
  userAgent: 'wikt-extract-tests',
  timeoutMs: 1000,
};

/**
 * HTTP client that serves fixtures by URL. Unknown URLs reject.
 */
export function createFixtureClient(pages: Record<string, string>) {
  return vi.fn<HttpClient>(async (url) => {
    const body = pages[url];
    if (body === undefined) {
      throw new Error(`No fixture for ${url}`);
    }
    return body;
  });
}

/**
 * Create a mock fetch response
 */
export function createMockFetchResponse(
  body: string,
  options: { status?: number; statusText?: string } = {}
): Response {
  const { status = 200, statusText = 'OK' } = options;
  return new Response(body, { status, statusText });
}

/**
 * Route every module logger to JSON at debug level and capture what it
 * writes. Returns a reader for the entries logged so far.
 */
export function captureLogs(): () => LogEntry[] {
  setLoggerProvider({
    createLogger: (context) => new Logger({ context, level: 'debug', format: 'json' }),
  });
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});

  return () =>
    [...log.mock.calls, ...error.mock.calls].flatMap(([line]) => {
      if (typeof line !== 'string') return [];
      const entry: LogEntry = JSON.parse(line);
      return [entry];
    });
}
