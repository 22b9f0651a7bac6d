/**
 * Policy Enforcement Tests
 */

import { describe, it, expect } from 'vitest';
import type { BudgetsPolicy, PolicyConfig, Waiver } from '@repo/shared-types';
import { REASON_NETWORK_DISABLED, REASON_RATE_LIMITED } from '../../validation/run-validators.js';
import { PolicyEnforcer, enforcePolicy, type EnforceableFinding } from '../enforcer.js';

const NOW = new Date('2026-06-01T00:00:00Z');

function makeConfig(budgets: BudgetsPolicy, waivers: Waiver[] = []): PolicyConfig {
  return {
    version: 1,
    validators: { allow_network: false, global_qps: 2 },
    budgets,
    waivers,
  };
}

function makeFinding(overrides: Partial<EnforceableFinding> = {}): EnforceableFinding {
  return {
    path: 'src/app.ts',
    rule: 'github_pat',
    line: 12,
    match: 'placeholder-secret-value-0001',
    severity: 'high',
    ...overrides,
  };
}

describe('enforcePolicy', () => {
  describe('new findings budget', () => {
    it('fails when unwaived findings exceed the budget', () => {
      const result = enforcePolicy(makeConfig({ new_findings: 0 }), [makeFinding()], { now: NOW });

      expect(result.passed).toBe(false);
      expect(result.violations).toEqual([
        {
          type: 'budget_exceeded',
          message: 'Found 1 findings, but budget allows max 0',
          severity: 'high',
          findingId: '',
          path: '',
          details: { found: 1, allowed: 0, budgetType: 'new_findings' },
        },
      ]);
    });

    it('passes when findings stay within the budget', () => {
      const result = enforcePolicy(makeConfig({ new_findings: 5 }), [makeFinding()], { now: NOW });

      expect(result.passed).toBe(true);
      expect(result.violations).toEqual([]);
    });

    it('leaves unset budgets unconstrained', () => {
      const findings = Array.from({ length: 20 }, (_, index) => makeFinding({ line: index + 1 }));
      expect(enforcePolicy(makeConfig({}), findings, { now: NOW }).passed).toBe(true);
    });
  });

  describe('category budgets', () => {
    it('counts findings per category, defaulting to unknown', () => {
      const findings = [
        makeFinding({ category: 'actual' }),
        makeFinding({ category: 'actual' }),
        makeFinding({ category: 'test' }),
        makeFinding(),
      ];
      const config = makeConfig({ new_actual_findings: 1, new_test_findings: 1, new_unknown_findings: 0 });

      const result = enforcePolicy(config, findings, { now: NOW });

      expect(result.violations.map((violation) => violation.message)).toEqual([
        'Found 2 actual findings, but budget allows max 1',
        'Found 1 unknown findings, but budget allows max 0',
      ]);
      expect(result.violations[1]?.details).toEqual({
        found: 1,
        allowed: 0,
        budgetType: 'new_unknown_findings',
        category: 'unknown',
      });
    });

    it('checks the aggregate budget alongside category budgets', () => {
      const findings = [makeFinding({ category: 'expired' }), makeFinding({ category: 'expired' })];
      const result = enforcePolicy(makeConfig({ new_findings: 1, new_expired_findings: 0 }), findings, { now: NOW });

      expect(result.violations.map((violation) => violation.message)).toEqual([
        'Found 2 findings, but budget allows max 1',
        'Found 2 expired findings, but budget allows max 0',
      ]);
    });
  });

  describe('risk ceiling', () => {
    it('computes a missing risk score and flags the finding', () => {
      const finding = makeFinding({ path: 'production/config.py' });

      const result = enforcePolicy(makeConfig({ max_risk_score: 40 }), [finding], { now: NOW });

      expect(result.passed).toBe(false);
      expect(result.violations).toHaveLength(1);
      expect(result.violations[0]).toMatchObject({
        type: 'risk_score_too_high',
        message: 'Finding has risk score 84, exceeds limit 40',
        severity: 'high',
        findingId: 'github_pat',
        path: 'production/config.py',
      });
    });

    it('uses a precomputed risk score', () => {
      const finding = makeFinding({ path: 'production/config.py', riskScore: 30 });
      expect(enforcePolicy(makeConfig({ max_risk_score: 40 }), [finding], { now: NOW }).passed).toBe(true);
    });

    it('allows a score equal to the ceiling', () => {
      const finding = makeFinding({ riskScore: 40 });
      expect(enforcePolicy(makeConfig({ max_risk_score: 40 }), [finding], { now: NOW }).passed).toBe(true);
    });

    it('scores with the repo exposure', () => {
      // 50 base x 1.2 public
      const finding = makeFinding({ rule: 'password' });
      const config = makeConfig({ max_risk_score: 55 });

      expect(enforcePolicy(config, [finding], { now: NOW }).passed).toBe(true);
      expect(enforcePolicy(config, [finding], { now: NOW, repoContext: { isPublic: true } }).passed).toBe(false);
    });

    it('never leaks the match into violation details', () => {
      const finding = makeFinding({ path: 'production/config.py' });
      const result = enforcePolicy(makeConfig({ max_risk_score: 40 }), [finding], { now: NOW });

      expect(JSON.stringify(result)).not.toContain('placeholder-secret-value-0001');
    });
  });

  describe('waivers', () => {
    const waiver: Waiver = { rule: 'github_pat', path: 'tests/**', expiry: '2027-01-01', reason: 'fixture tokens' };

    it('removes waived findings before budgets are checked', () => {
      const finding = makeFinding({ path: 'tests/fixtures/tokens.py' });

      const result = enforcePolicy(makeConfig({ new_findings: 0 }, [waiver]), [finding], { now: NOW });

      expect(result.passed).toBe(true);
      expect(result.waiversApplied).toEqual([{ finding: 'github_pat:tests/fixtures/tokens.py', waiver }]);
      expect(result.summary).toEqual({
        totalFindings: 1,
        filteredFindings: 0,
        violations: 0,
        waiversApplied: 1,
        passed: true,
      });
    });

    it('ignores expired waivers', () => {
      const finding = makeFinding({ path: 'tests/fixtures/tokens.py' });
      const expired = { ...waiver, expiry: '2026-01-01' };

      const result = enforcePolicy(makeConfig({ new_findings: 0 }, [expired]), [finding], { now: NOW });

      expect(result.passed).toBe(false);
      expect(result.waiversApplied).toEqual([]);
    });

    it('records one waiver per finding', () => {
      const finding = makeFinding({ path: 'tests/a.py' });
      const second = { ...waiver, path: '**', reason: 'everything' };

      const result = enforcePolicy(makeConfig({}, [waiver, second]), [finding], { now: NOW });

      expect(result.waiversApplied).toHaveLength(1);
    });
  });

  describe('notices', () => {
    it('reports network-disabled validators without failing the gate', () => {
      const finding = makeFinding({
        validators: [
          { state: 'indeterminate', reason: REASON_NETWORK_DISABLED, validatorName: 'github_pat_live' },
          { state: 'indeterminate', reason: REASON_NETWORK_DISABLED, validatorName: 'azure_sas_live' },
        ],
      });

      const result = enforcePolicy(makeConfig({}), [finding], { now: NOW });

      expect(result.passed).toBe(true);
      expect(result.violations).toEqual([]);
      expect(result.notices).toEqual([
        {
          type: 'network_disabled',
          message: '2 network validator check(s) skipped because network access is disabled',
          severity: 'info',
          findingId: '',
          path: '',
          details: { count: 2, allowNetwork: false },
        },
      ]);
    });

    it('reports rate-limited validators', () => {
      const finding = makeFinding({
        validators: [{ state: 'indeterminate', reason: REASON_RATE_LIMITED, validatorName: 'slack_webhook_format' }],
      });

      const result = enforcePolicy(makeConfig({}), [finding], { now: NOW });

      expect(result.notices.map((notice) => notice.type)).toEqual(['rate_limit_exceeded']);
      expect(result.summary.violations).toBe(0);
    });
  });
});

describe('PolicyEnforcer', () => {
  it('can be reused across batches', () => {
    const enforcer = new PolicyEnforcer(makeConfig({ new_findings: 1 }));

    expect(enforcer.enforce([makeFinding()], { now: NOW }).passed).toBe(true);
    expect(enforcer.enforce([makeFinding(), makeFinding()], { now: NOW }).passed).toBe(false);
  });
});
