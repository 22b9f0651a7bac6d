/**
 * Secret Redaction Utilities
 *
 * Safely redacts secrets from configuration objects for debugging/logging.
 */

import { redactSecret } from '@repo/shared-utils';
import { SECRET_KEY_PATTERN } from './schema.js';

/**
 * Redact secrets from a configuration object
 */
export function redactSecrets(config: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...config };

  for (const [key, raw] of Object.entries(redacted)) {
    if (typeof raw !== 'string') {
      continue;
    }

    if (isSecretKey(key)) {
      redacted[key] = redactSecret(raw);
      continue;
    }

    // For URLs, redact credentials but keep structure
    if (raw.includes('://')) {
      redacted[key] = stripUrlCredentials(raw);
    }
  }

  return redacted;
}

/**
 * Check if a key should be redacted
 */
export function isSecretKey(key: string): boolean {
  return SECRET_KEY_PATTERN.test(key);
}

function stripUrlCredentials(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return value;
  }
  if (!url.username && !url.password) {
    return value;
  }
  return `${url.protocol}//${redactSecret(`${url.username}:${url.password}`)}@${url.host}${url.pathname}${url.search}${url.hash}`;
}
