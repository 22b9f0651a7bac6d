/**
 * Classifier
 *
 * Decides whether a finding is actual, expired, test or unknown.
 */

export {
  classify,
  safeClassify,
  classificationFailure,
  SHORT_CIRCUIT_CONFIDENCE,
  UNKNOWN_CONFIDENCE,
  NO_RULES_MATCHED,
} from './classifier.js';
export {
  CLASSIFICATION_RULES,
  offlineExpiryRule,
  validatorSignalRule,
  testMarkerRule,
  entropyRule,
  type ClassificationRule,
  type RuleInput,
  type RuleOutcome,
} from './rules.js';
export { calculateEntropy, hasAscendingRun } from './entropy.js';
export { jwtExpiry, sasExpiry, looksLikeJwt } from './expiry.js';
