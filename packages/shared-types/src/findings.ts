/**
 * Finding Types
 *
 * Records that flow through the post-detection pipeline: raw detector
 * findings, validator results, classifications and risk scores.
 *
 * @module findings
 */

// ============================================================================
// Detector Findings
// ============================================================================

export const FINDING_SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

/**
 * A located, possibly-sensitive match produced by a detector.
 * Never mutated: each pipeline stage derives a new record from it.
 */
export interface Finding {
  /** Repo-relative file path */
  readonly path: string;
  /** Detector rule id (e.g. `github_pat`, `aws_keypair`) */
  readonly rule: string;
  /** 1-based line number */
  readonly line: number;
  /** Full sensitive text that triggered the detection */
  readonly match: string;
  readonly severity: FindingSeverity | (string & {});
  /** Snippet around the match, as sensitive as `match` itself */
  readonly matchHint?: string;
  readonly reason?: string;
  /** Days the match has been present in history, when known */
  readonly historyAgeDays?: number;
  readonly meta?: Readonly<FindingMeta>;
}

export interface FindingMeta {
  /** Untruncated token preserved by the detector */
  fullToken?: string;
  /** Untruncated URL preserved by the detector */
  fullUrl?: string;
  [key: string]: unknown;
}

/** Meta keys that carry raw secret material and never leave the pipeline */
export const SENSITIVE_META_KEYS = ['fullToken', 'fullUrl'] as const;

// ============================================================================
// Validation
// ============================================================================

export const VALIDATION_STATES = ['valid', 'invalid', 'indeterminate'] as const;
export type ValidationState = (typeof VALIDATION_STATES)[number];

export interface ValidationResult {
  readonly state: ValidationState;
  /** Redacted hint supporting the verdict */
  readonly evidence?: string;
  readonly reason?: string;
  readonly validatorName: string;
}

// ============================================================================
// Classification
// ============================================================================

export const FINDING_CATEGORIES = ['actual', 'expired', 'test', 'unknown'] as const;
export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

export interface Classification {
  readonly category: FindingCategory;
  /** 0..1 */
  readonly confidence: number;
  /** Ordered rule tags, e.g. `offline:jwt_expired` */
  readonly reasons: readonly string[];
}

// ============================================================================
// Risk
// ============================================================================

export const RISK_LEVELS = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface RepoContext {
  isPublic?: boolean;
  hasExternalContributors?: boolean;
}

export interface RiskFactors {
  baseScore: number;
  validationModifier: number;
  pathModifier: number;
  exposureModifier: number;
  historyModifier: number;
  categoryModifier: number;
}

export interface RiskSummary {
  score: number;
  level: RiskLevel;
  factors: RiskFactors;
}

// ============================================================================
// Enriched Output
// ============================================================================

export interface ValidatedSummary {
  state: ValidationState;
  evidence?: string;
}

/**
 * A finding after the pipeline: `match`/`matchHint` are redacted and every
 * stage's verdict is attached.
 */
export interface EnrichedFinding extends Finding {
  readonly category: FindingCategory;
  readonly confidence: number;
  readonly reasons: readonly string[];
  readonly riskScore: number;
  readonly riskLevel: RiskLevel;
  readonly validated: ValidatedSummary;
  readonly validators: readonly ValidationResult[];
}

/** Anything the risk scorer and enforcer accept */
export type ScorableFinding = Finding & {
  readonly category?: FindingCategory;
  readonly riskScore?: number;
};
