/**
 * GCP service account key validator
 *
 * Checks the JSON key shape and service account email. Exchanging the key
 * for a token needs a signed OAuth2 assertion, which is not attempted, so a
 * well-formed key stays indeterminate.
 */

import type { Finding } from '@repo/shared-types';
import { isRecord, redactSecret } from '@repo/shared-utils';
import { secretValueOf } from '../../redaction/findings.js';
import type { Validator, ValidatorVerdict } from '../types.js';

const REQUIRED_FIELDS = ['type', 'project_id', 'private_key_id', 'private_key', 'client_email'] as const;

const SERVICE_ACCOUNT_EMAIL = /^[^@]+@[^@]+\.iam\.gserviceaccount\.com$/;

function parseKey(raw: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export const gcpServiceAccountKeyValidator: Validator = {
  name: 'gcp_sa_key_live',
  rateLimitQps: 0.5,
  requiresNetwork: true,

  appliesTo(finding: Finding): boolean {
    const value = secretValueOf(finding).trim();
    return finding.rule.startsWith('gcp') || (value.startsWith('{') && value.includes('service_account'));
  },

  async validate(finding: Finding): Promise<ValidatorVerdict> {
    const raw = secretValueOf(finding).trim();
    if (!raw.startsWith('{')) {
      return { state: 'invalid', reason: 'GCP service account key must be JSON' };
    }

    const key = parseKey(raw);
    if (!key) {
      return { state: 'invalid', reason: 'Malformed JSON for GCP service account key' };
    }

    const missing = REQUIRED_FIELDS.filter((field) => !(field in key));
    if (missing.length > 0) {
      return { state: 'invalid', reason: `Missing required fields: ${missing.join(', ')}` };
    }
    if (key.type !== 'service_account') {
      return { state: 'invalid', reason: "Wrong key type, expected 'service_account'" };
    }

    const email = typeof key.client_email === 'string' ? key.client_email : '';
    if (!SERVICE_ACCOUNT_EMAIL.test(email)) {
      return { state: 'invalid', reason: 'Malformed service account email' };
    }

    return {
      state: 'indeterminate',
      evidence: `GCP service account key format checks out: ${redactSecret(email)}`,
      reason: 'Format checks passed, but live validation requires an OAuth2 token exchange',
    };
  },
};
