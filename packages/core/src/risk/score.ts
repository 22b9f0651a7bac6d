/**
 * Risk Scoring
 *
 * Deterministic 0-100 score: base score for the rule times independent
 * modifiers for validation state, path, repo exposure, history and
 * category. Every modifier reads the original inputs, never an
 * intermediate score.
 */

import type {
  RepoContext,
  RiskFactors,
  RiskLevel,
  RiskSummary,
  ScorableFinding,
  ValidationResult,
} from '@repo/shared-types';
import { applicableResults } from '../validation/run-validators.js';

// ============================================================================
// Tables
// ============================================================================

export const DEFAULT_BASE_SCORE = 50;

export const BASE_RISK_SCORES: Readonly<Record<string, number>> = {
  github_pat: 70,
  aws_keypair: 80,
  slack_webhook: 40,
  private_key: 90,
  api_key: 60,
  password: 50,
  database_url: 75,
  jwt_token: 65,
};

/**
 * Substring checks against the lowercased path; the first hit wins
 */
export const PATH_RISK_MULTIPLIERS: ReadonlyArray<readonly [keyword: string, multiplier: number]> = [
  ['production', 1.2],
  ['prod', 1.2],
  ['deploy', 1.2],
  ['release', 1.2],
  ['config', 1.1],
  ['env', 1.1],
  ['.env', 1.2],
  ['test', 0.7],
  ['tests', 0.7],
  ['spec', 0.7],
  ['mock', 0.6],
  ['fixture', 0.6],
  ['example', 0.5],
  ['sample', 0.5],
  ['demo', 0.5],
  ['readme', 0.3],
  ['doc', 0.3],
  ['docs', 0.3],
];

export const RISK_LEVEL_THRESHOLDS: ReadonlyArray<readonly [minimum: number, level: RiskLevel]> = [
  [80, 'critical'],
  [60, 'high'],
  [40, 'medium'],
  [20, 'low'],
];

// ============================================================================
// Modifiers
// ============================================================================

/**
 * Validators that did not apply to the finding carry no signal
 */
export function validationModifier(validationResults: readonly ValidationResult[]): number {
  const results = applicableResults(validationResults);
  if (results.length === 0) {
    return 1.0;
  }
  if (results.some((result) => result.state === 'valid')) {
    return 1.3;
  }
  if (results.some((result) => result.state === 'invalid')) {
    return 0.4;
  }
  return 0.9;
}

export function pathModifier(path: string): number {
  if (!path) {
    return 1.0;
  }
  const lower = path.toLowerCase();
  const hit = PATH_RISK_MULTIPLIERS.find(([keyword]) => lower.includes(keyword));
  return hit ? hit[1] : 1.0;
}

export function exposureModifier(context: RepoContext): number {
  if (context.isPublic) {
    return 1.2;
  }
  if (context.hasExternalContributors) {
    return 1.1;
  }
  return 1.0;
}

export function historyModifier(historyAgeDays: number | undefined): number {
  const age = historyAgeDays ?? 0;
  if (age > 365) {
    return 1.2;
  }
  if (age > 90) {
    return 1.1;
  }
  return 1.0;
}

export function categoryModifier(category: string | undefined): number {
  switch (category) {
    case 'actual':
      return 1.3;
    case 'expired':
      return 0.3;
    case 'test':
      return 0.2;
    default:
      return 1.0;
  }
}

// ============================================================================
// Scoring
// ============================================================================

export function riskFactors(
  finding: ScorableFinding,
  validationResults: readonly ValidationResult[] = [],
  repoContext: RepoContext = {}
): RiskFactors {
  return {
    baseScore: BASE_RISK_SCORES[finding.rule] ?? DEFAULT_BASE_SCORE,
    validationModifier: validationModifier(validationResults),
    pathModifier: pathModifier(finding.path),
    exposureModifier: exposureModifier(repoContext),
    historyModifier: historyModifier(finding.historyAgeDays),
    categoryModifier: categoryModifier(finding.category),
  };
}

function scoreFromFactors(factors: RiskFactors): number {
  const raw =
    factors.baseScore *
    factors.validationModifier *
    factors.pathModifier *
    factors.exposureModifier *
    factors.historyModifier *
    factors.categoryModifier;
  return Math.max(0, Math.min(100, Math.round(raw)));
}

/**
 * Integer risk score in [0, 100]
 */
export function calculateRiskScore(
  finding: ScorableFinding,
  validationResults: readonly ValidationResult[] = [],
  repoContext: RepoContext = {}
): number {
  return scoreFromFactors(riskFactors(finding, validationResults, repoContext));
}

export function getRiskLevel(score: number): RiskLevel {
  const hit = RISK_LEVEL_THRESHOLDS.find(([minimum]) => score >= minimum);
  return hit ? hit[1] : 'info';
}

/**
 * Score, level and the factors behind them
 */
export function riskSummary(
  finding: ScorableFinding,
  validationResults: readonly ValidationResult[] = [],
  repoContext: RepoContext = {}
): RiskSummary {
  const factors = riskFactors(finding, validationResults, repoContext);
  const score = scoreFromFactors(factors);
  return { score, level: getRiskLevel(score), factors };
}
