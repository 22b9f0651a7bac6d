/**
 * Policy Types
 *
 * Shape of the policy file and of the CI gate decision. Keys mirror the
 * YAML file, so they stay snake_case.
 *
 * @module policy
 */

export const POLICY_VERSION = 1;

export interface ValidatorsPolicy {
  /** CI kill switch: network validators only run when true */
  allow_network: boolean;
  /** Queries per second shared by every validator */
  global_qps: number;
}

export interface BudgetsPolicy {
  new_findings?: number;
  new_actual_findings?: number;
  new_expired_findings?: number;
  new_test_findings?: number;
  new_unknown_findings?: number;
  max_risk_score?: number;
}

export const CATEGORY_BUDGET_KEYS = [
  'new_actual_findings',
  'new_expired_findings',
  'new_test_findings',
  'new_unknown_findings',
] as const;
export type CategoryBudgetKey = (typeof CATEGORY_BUDGET_KEYS)[number];

export interface Waiver {
  /** Exact detector rule id */
  rule: string;
  /** Glob over repo-relative paths */
  path: string;
  /** ISO-8601 date or date-time */
  expiry: string;
  reason: string;
}

export interface PolicyConfig {
  version: typeof POLICY_VERSION;
  validators: ValidatorsPolicy;
  budgets: BudgetsPolicy;
  waivers: Waiver[];
}

// ============================================================================
// Enforcement Result
// ============================================================================

export const VIOLATION_TYPES = [
  'budget_exceeded',
  'risk_score_too_high',
  'network_disabled',
  'rate_limit_exceeded',
] as const;
export type ViolationType = (typeof VIOLATION_TYPES)[number];

export type ViolationSeverity = 'high' | 'medium' | 'info';

export interface Violation {
  type: ViolationType;
  message: string;
  severity: ViolationSeverity;
  /** Rule id of the offending finding, empty for aggregate violations */
  findingId: string;
  path: string;
  details?: Record<string, unknown>;
}

export interface AppliedWaiver {
  /** `<rule>:<path>` */
  finding: string;
  waiver: Waiver;
}

export interface PolicySummary {
  totalFindings: number;
  filteredFindings: number;
  violations: number;
  waiversApplied: number;
  passed: boolean;
}

export interface PolicyResult {
  passed: boolean;
  violations: Violation[];
  /** Informational entries that never fail the gate */
  notices: Violation[];
  waiversApplied: AppliedWaiver[];
  summary: PolicySummary;
}
