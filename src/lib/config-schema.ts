/**
 * Configuration Schema Validation
 *
 * Zod schema for the extractor's runtime configuration. Provides runtime
 * type safety and readable messages for misconfiguration.
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './constants.js';

/**
 * Extractor Configuration Schema
 */
export const ExtractorConfigSchema = z.object({
  /** Wiktionary origin, without trailing slash */
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_BASE_URL),

  /** User-Agent header sent with page requests */
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),

  /** Request timeout handed to the HTTP client */
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

/** Validated configuration, defaults applied */
export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;

/** Configuration as accepted before defaults are applied */
export type ExtractorConfigInput = z.input<typeof ExtractorConfigSchema>;

/**
 * Validate configuration
 *
 * @throws {z.ZodError} If validation fails
 */
export function validateConfig(config: unknown): ExtractorConfig {
  return ExtractorConfigSchema.parse(config);
}

/**
 * Validate configuration without throwing
 */
export function safeValidateConfig(
  config: unknown
): z.SafeParseReturnType<ExtractorConfigInput, ExtractorConfig> {
  return ExtractorConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
