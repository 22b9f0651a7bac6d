/**
 * AWS access key validator
 *
 * An access key id alone cannot be checked against STS (the request must be
 * signed with the secret key), so a well-formed id stays indeterminate.
 */

import type { Finding } from '@repo/shared-types';
import { redactSecret } from '@repo/shared-utils';
import { secretValueOf } from '../../redaction/findings.js';
import type { Validator, ValidatorVerdict } from '../types.js';

const ACCESS_KEY_ID_PATTERN = /^AKIA[0-9A-Z]{16}$/;

export const awsAccessKeyValidator: Validator = {
  name: 'aws_ak_live',
  rateLimitQps: 0.5,
  requiresNetwork: true,

  appliesTo(finding: Finding): boolean {
    return finding.rule.startsWith('aws') || secretValueOf(finding).startsWith('AKIA');
  },

  async validate(finding: Finding): Promise<ValidatorVerdict> {
    const keyId = secretValueOf(finding);
    if (!ACCESS_KEY_ID_PATTERN.test(keyId)) {
      return { state: 'invalid', reason: 'Not an AWS access key id format' };
    }
    return {
      state: 'indeterminate',
      evidence: `AKIA format: ${redactSecret(keyId)}`,
      reason: 'AWS access key id format checks out, but full validation requires the secret key',
    };
  },
};
