export { redactSecret, redactEvidence, REDACTION_MASK } from '@repo/shared-utils';
export { scrubText, scrubSecrets, scrubRecord } from './scrub.js';
export { redactFinding, redactFindings, redactValidationResult, rawSecretsOf, secretValueOf } from './findings.js';
