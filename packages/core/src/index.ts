/**
 * @leakgate/core - post-detection pipeline for leaked credentials
 *
 * Every finding a detector reports goes through:
 * 1. Validation - is the credential live, rejected, or unknown?
 * 2. Classification - actual, expired, test or unknown
 * 3. Risk scoring - deterministic 0-100 score
 * 4. Redaction - nothing raw leaves the pipeline
 *
 * and the batch is then gated against the repository's policy file.
 */

export * from './utils/index.js';
export * from './redaction/index.js';
export * from './validation/index.js';
export * from './classify/index.js';
export * from './risk/index.js';
export * from './policy/index.js';
export * from './pipeline/index.js';
