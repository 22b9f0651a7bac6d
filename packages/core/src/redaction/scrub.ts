/**
 * Known-secret scrubbing
 *
 * Where `redactEvidence` masks anything secret-shaped, these helpers mask
 * exact raw values the caller knows about, including ones too short or too
 * punctuated to look like a credential.
 */

import { redactSecret, isRecord } from '@repo/shared-utils';

/**
 * Replace every occurrence of each raw secret with its masked form
 */
export function scrubText(text: string, secrets: readonly string[]): string {
  let scrubbed = text;
  // Longest first so a secret containing another is masked whole
  const ordered = [...secrets].filter((secret) => secret.length > 0).sort((a, b) => b.length - a.length);
  for (const secret of ordered) {
    if (scrubbed.includes(secret)) {
      scrubbed = scrubbed.split(secret).join(redactSecret(secret));
    }
  }
  return scrubbed;
}

/**
 * Deep-walk strings, arrays and plain objects, scrubbing every string
 */
export function scrubSecrets(value: unknown, secrets: readonly string[]): unknown {
  if (secrets.length === 0) {
    return value;
  }
  if (typeof value === 'string') {
    return scrubText(value, secrets);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => scrubSecrets(item, secrets));
  }
  if (isRecord(value)) {
    return scrubRecord(value, secrets);
  }
  return value;
}

export function scrubRecord(record: Record<string, unknown>, secrets: readonly string[]): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, item]) => [key, scrubSecrets(item, secrets)])
  );
}
