/**
 * Configuration loading
 *
 * Configuration comes from environment variables only:
 *
 * - WIKT_BASE_URL    Wiktionary origin
 * - WIKT_USER_AGENT  User-Agent header
 * - WIKT_TIMEOUT_MS  request timeout in milliseconds
 */

import {
  type ExtractorConfig,
  safeValidateConfig,
  formatValidationError,
} from './config-schema.js';

/**
 * Load and validate configuration from the environment
 *
 * @throws {Error} If a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const config: Record<string, unknown> = {};

  const baseUrl = env['WIKT_BASE_URL'];
  if (baseUrl) {
    config['baseUrl'] = baseUrl;
  }
  const userAgent = env['WIKT_USER_AGENT'];
  if (userAgent) {
    config['userAgent'] = userAgent;
  }
  const timeoutMs = env['WIKT_TIMEOUT_MS'];
  if (timeoutMs) {
    config['timeoutMs'] = Number(timeoutMs);
  }

  const result = safeValidateConfig(config);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}
