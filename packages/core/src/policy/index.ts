/**
 * Policy Module
 *
 * Policy file schema and loading, waivers and the CI gate.
 */

export {
  policyConfigSchema,
  waiverSchema,
  validatorsPolicySchema,
  budgetsPolicySchema,
  type PolicyConfigInput,
} from './schema.js';
export {
  loadPolicyConfig,
  parsePolicyConfig,
  resolvePolicyConfig,
  DEFAULT_POLICY_CONFIG,
  POLICY_FILE_NAMES,
  type ResolvedPolicy,
} from './loader.js';
export {
  isWaiverActive,
  isWaiverExpired,
  getActiveWaivers,
  findActiveWaiver,
  matchesWaiverPath,
} from './waivers.js';
export { PolicyEnforcer, enforcePolicy, type EnforceableFinding, type EnforceOptions } from './enforcer.js';
