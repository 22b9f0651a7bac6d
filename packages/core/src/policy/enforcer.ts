/**
 * Policy Enforcement
 *
 * Turns a batch of scored findings into the CI gate decision: waivers
 * first, then aggregate and per-category budgets on what is left, then the
 * per-finding risk ceiling.
 */

import {
  CATEGORY_BUDGET_KEYS,
  type AppliedWaiver,
  type CategoryBudgetKey,
  type FindingCategory,
  type PolicyConfig,
  type PolicyResult,
  type RepoContext,
  type ScorableFinding,
  type ValidationResult,
  type Violation,
} from '@repo/shared-types';
import { calculateRiskScore } from '../risk/score.js';
import { REASON_NETWORK_DISABLED, REASON_RATE_LIMITED } from '../validation/run-validators.js';
import { findActiveWaiver } from './waivers.js';

export type EnforceableFinding = ScorableFinding & {
  readonly validators?: readonly ValidationResult[];
};

export interface EnforceOptions {
  now?: Date;
  /** Exposure used when a finding arrives without a risk score */
  repoContext?: RepoContext;
}

const BUDGET_CATEGORIES: Record<CategoryBudgetKey, FindingCategory> = {
  new_actual_findings: 'actual',
  new_expired_findings: 'expired',
  new_test_findings: 'test',
  new_unknown_findings: 'unknown',
};

export class PolicyEnforcer {
  constructor(private readonly config: PolicyConfig) {}

  enforce(findings: readonly EnforceableFinding[], options: EnforceOptions = {}): PolicyResult {
    const now = options.now ?? new Date();
    const waiversApplied: AppliedWaiver[] = [];
    const remaining: EnforceableFinding[] = [];

    for (const finding of findings) {
      const waiver = findActiveWaiver(this.config.waivers, finding, now);
      if (waiver) {
        waiversApplied.push({ finding: `${finding.rule}:${finding.path}`, waiver });
      } else {
        remaining.push(finding);
      }
    }

    const violations = [
      ...this.checkBudgets(remaining),
      ...this.checkRiskScores(remaining, options.repoContext ?? {}),
    ];
    const passed = violations.length === 0;

    return {
      passed,
      violations,
      notices: this.collectNotices(findings),
      waiversApplied,
      summary: {
        totalFindings: findings.length,
        filteredFindings: remaining.length,
        violations: violations.length,
        waiversApplied: waiversApplied.length,
        passed,
      },
    };
  }

  private checkBudgets(findings: readonly EnforceableFinding[]): Violation[] {
    const { budgets } = this.config;
    const violations: Violation[] = [];

    const limit = budgets.new_findings;
    if (limit !== undefined && findings.length > limit) {
      violations.push({
        type: 'budget_exceeded',
        message: `Found ${findings.length} findings, but budget allows max ${limit}`,
        severity: 'high',
        findingId: '',
        path: '',
        details: { found: findings.length, allowed: limit, budgetType: 'new_findings' },
      });
    }

    for (const key of CATEGORY_BUDGET_KEYS) {
      const categoryLimit = budgets[key];
      if (categoryLimit === undefined) {
        continue;
      }
      const category = BUDGET_CATEGORIES[key];
      const found = findings.filter((finding) => (finding.category ?? 'unknown') === category).length;
      if (found > categoryLimit) {
        violations.push({
          type: 'budget_exceeded',
          message: `Found ${found} ${category} findings, but budget allows max ${categoryLimit}`,
          severity: 'high',
          findingId: '',
          path: '',
          details: { found, allowed: categoryLimit, budgetType: key, category },
        });
      }
    }

    return violations;
  }

  private checkRiskScores(findings: readonly EnforceableFinding[], repoContext: RepoContext): Violation[] {
    const limit = this.config.budgets.max_risk_score;
    if (limit === undefined) {
      return [];
    }

    const violations: Violation[] = [];
    for (const finding of findings) {
      const riskScore = finding.riskScore ?? calculateRiskScore(finding, finding.validators ?? [], repoContext);
      if (riskScore > limit) {
        violations.push({
          type: 'risk_score_too_high',
          message: `Finding has risk score ${riskScore}, exceeds limit ${limit}`,
          severity: 'high',
          findingId: finding.rule,
          path: finding.path,
          details: { riskScore, maxAllowed: limit, line: finding.line, category: finding.category },
        });
      }
    }
    return violations;
  }

  /**
   * Skipped validations are reported, never counted against the gate
   */
  private collectNotices(findings: readonly EnforceableFinding[]): Violation[] {
    const results = findings.flatMap((finding) => finding.validators ?? []);
    const networkSkipped = results.filter((result) => result.reason === REASON_NETWORK_DISABLED).length;
    const rateLimited = results.filter((result) => result.reason === REASON_RATE_LIMITED).length;
    const notices: Violation[] = [];

    if (networkSkipped > 0) {
      notices.push({
        type: 'network_disabled',
        message: `${networkSkipped} network validator check(s) skipped because network access is disabled`,
        severity: 'info',
        findingId: '',
        path: '',
        details: { count: networkSkipped, allowNetwork: this.config.validators.allow_network },
      });
    }
    if (rateLimited > 0) {
      notices.push({
        type: 'rate_limit_exceeded',
        message: `${rateLimited} validator check(s) skipped by rate limiting`,
        severity: 'info',
        findingId: '',
        path: '',
        details: { count: rateLimited, globalQps: this.config.validators.global_qps },
      });
    }
    return notices;
  }
}

/**
 * One-shot enforcement
 */
export function enforcePolicy(
  config: PolicyConfig,
  findings: readonly EnforceableFinding[],
  options: EnforceOptions = {}
): PolicyResult {
  return new PolicyEnforcer(config).enforce(findings, options);
}
