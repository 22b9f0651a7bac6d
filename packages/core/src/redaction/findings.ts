/**
 * Finding redaction
 *
 * Produces the outward-facing copy of a finding: masked match and hint,
 * redacted validator text, and no raw-value meta keys.
 */

import { redactSecret, redactEvidence } from '@repo/shared-utils';
import {
  SENSITIVE_META_KEYS,
  type Finding,
  type FindingMeta,
  type ValidationResult,
} from '@repo/shared-types';
import { scrubText } from './scrub.js';

/**
 * Value to validate and classify: the detector's preserved full token or
 * URL when it kept one, else the match itself
 */
export function secretValueOf(finding: Finding): string {
  const { fullToken, fullUrl } = finding.meta ?? {};
  if (typeof fullToken === 'string' && fullToken.length > 0) {
    return fullToken;
  }
  if (typeof fullUrl === 'string' && fullUrl.length > 0) {
    return fullUrl;
  }
  return finding.match;
}

/**
 * Raw values a finding carries: the match plus any preserved full value
 */
export function rawSecretsOf(finding: Finding): string[] {
  const secrets = [finding.match];
  for (const key of SENSITIVE_META_KEYS) {
    const value = finding.meta?.[key];
    if (typeof value === 'string' && value.length > 0) {
      secrets.push(value);
    }
  }
  return secrets.filter((secret) => secret.length > 0);
}

/**
 * Redact a validator result's free text, masking known raw values too
 */
export function redactValidationResult(
  result: ValidationResult,
  secrets: readonly string[] = []
): ValidationResult {
  const clean = (text: string | undefined): string | undefined =>
    text === undefined ? undefined : redactEvidence(scrubText(text, secrets));

  return {
    ...result,
    evidence: clean(result.evidence),
    reason: clean(result.reason),
  };
}

function redactMeta(meta: Readonly<FindingMeta>, secrets: readonly string[]): FindingMeta {
  const sensitive: ReadonlySet<string> = new Set(SENSITIVE_META_KEYS);
  const kept: FindingMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (sensitive.has(key)) {
      continue;
    }
    kept[key] = typeof value === 'string' ? redactEvidence(scrubText(value, secrets)) : value;
  }
  return kept;
}

/**
 * Redact one finding. Works on any finding shape; extra fields pass through
 * and an embedded `validators` list has its evidence redacted.
 */
export function redactFinding<T extends Finding & { validators?: readonly ValidationResult[] }>(finding: T): T {
  const secrets = rawSecretsOf(finding);
  const clean = (text: string): string => redactEvidence(scrubText(text, secrets));

  return {
    ...finding,
    match: redactSecret(finding.match),
    ...(finding.matchHint !== undefined ? { matchHint: clean(finding.matchHint) } : {}),
    ...(finding.reason !== undefined ? { reason: clean(finding.reason) } : {}),
    ...(finding.meta !== undefined ? { meta: redactMeta(finding.meta, secrets) } : {}),
    ...(finding.validators !== undefined
      ? { validators: finding.validators.map((result) => redactValidationResult(result, secrets)) }
      : {}),
  };
}

export function redactFindings<T extends Finding & { validators?: readonly ValidationResult[] }>(
  findings: readonly T[]
): T[] {
  return findings.map((finding) => redactFinding(finding));
}
