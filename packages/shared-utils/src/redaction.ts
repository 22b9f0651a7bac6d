/**
 * Secret Redaction Primitives
 *
 * One masking scheme for every output: first 6 + `****` + last 4 characters,
 * or `****` alone for values of 10 characters or fewer.
 */

export const REDACTION_MASK = '****';

const SHORT_SECRET_MAX_LENGTH = 10;
const VISIBLE_PREFIX = 6;
const VISIBLE_SUFFIX = 4;

/**
 * Runs of base64/url-safe characters long enough to be a credential.
 * A masked value never matches: at most 6 characters precede the mask.
 */
const SECRET_SHAPED_TOKEN = /\b[A-Za-z0-9+/_-]{16,}\b/g;

/**
 * Mask a secret value
 */
export function redactSecret(secret: string): string {
  if (secret.length <= SHORT_SECRET_MAX_LENGTH) {
    return REDACTION_MASK;
  }
  return `${secret.slice(0, VISIBLE_PREFIX)}${REDACTION_MASK}${secret.slice(-VISIBLE_SUFFIX)}`;
}

/**
 * Mask every secret-shaped token in free text, line by line
 */
export function redactEvidence(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(SECRET_SHAPED_TOKEN, (token) => redactSecret(token)))
    .join('\n');
}
