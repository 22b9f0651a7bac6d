/**
 * Finding Pipeline
 *
 * Validator Core -> Classifier -> Risk Scorer -> redaction, one finding at a
 * time, then the policy gate over the whole batch. Nothing that goes wrong
 * with a single finding escapes; it is downgraded and recorded instead.
 *
 * @module pipeline
 */

import type {
  Classification,
  EnrichedFinding,
  Finding,
  PolicyConfig,
  PolicyResult,
  RepoContext,
  ValidatedSummary,
  ValidationResult,
} from '@repo/shared-types';
import { redactEvidence } from '@repo/shared-utils';
import { classificationFailure, safeClassify } from '../classify/classifier.js';
import { enforcePolicy } from '../policy/enforcer.js';
import { rawSecretsOf, redactFinding } from '../redaction/findings.js';
import { scrubText } from '../redaction/scrub.js';
import { calculateRiskScore, getRiskLevel } from '../risk/score.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { ValidatorRegistry } from '../validation/registry.js';
import { applicableResults, runValidators } from '../validation/run-validators.js';
import type { FetchFn } from '../validation/types.js';

export interface PipelineOptions {
  policy: PolicyConfig;
  /** Built once at process start, shared by every finding */
  registry: ValidatorRegistry;
  repoContext?: RepoContext;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => Date;
  fetch?: FetchFn;
  timeoutMs?: number;
  /** Forces every network validator to be skipped */
  disableNetwork?: boolean;
}

export interface PipelineResult {
  findings: EnrichedFinding[];
  result: PolicyResult;
}

/**
 * First `valid` result, else the first result from a validator that applied;
 * nothing applicable is indeterminate
 */
export function summarizeValidation(validationResults: readonly ValidationResult[]): ValidatedSummary {
  const results = applicableResults(validationResults);
  const chosen = results.find((result) => result.state === 'valid') ?? results[0];
  if (!chosen) {
    return { state: 'indeterminate' };
  }
  return chosen.evidence === undefined ? { state: chosen.state } : { state: chosen.state, evidence: chosen.evidence };
}

/**
 * Enrich one finding. The returned record is already redacted.
 */
export async function processFinding(
  finding: Finding,
  options: Omit<PipelineOptions, 'logger'> & { logger: Logger }
): Promise<{ finding: EnrichedFinding; classified: boolean }> {
  const now = options.now ?? (() => new Date());
  const secrets = rawSecretsOf(finding);
  const logger = options.logger.withSecrets(secrets);

  const validators = await runValidators(finding, options.policy, options.registry, {
    signal: options.signal,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
    disableNetwork: options.disableNetwork,
    logger: options.logger,
    now,
  });

  const outcome = safeClassify(finding, validators, now());
  let classification: Classification;
  if (outcome.ok) {
    classification = outcome.value;
  } else {
    logger.warn('Classification failed', { path: finding.path, rule: finding.rule, reason: outcome.error.message });
    classification = classificationFailure(outcome.error);
  }

  const riskScore = calculateRiskScore(
    { ...finding, category: classification.category },
    validators,
    options.repoContext ?? {}
  );

  const enriched = redactFinding<EnrichedFinding>({
    ...finding,
    category: classification.category,
    confidence: classification.confidence,
    reasons: classification.reasons.map((reason) => redactEvidence(scrubText(reason, secrets))),
    riskScore,
    riskLevel: getRiskLevel(riskScore),
    validated: summarizeValidation(validators),
    validators,
  });

  logger.debug('Finding enriched', {
    path: enriched.path,
    rule: enriched.rule,
    category: enriched.category,
    riskScore: enriched.riskScore,
  });

  return { finding: enriched, classified: outcome.ok };
}

/**
 * Run a batch of detector findings through the pipeline and the policy gate
 */
export async function runPipeline(
  findings: readonly Finding[],
  options: PipelineOptions
): Promise<PipelineResult> {
  const logger = options.logger ?? getLogger('pipeline');
  const group = logger.group(`pipeline (${findings.length} findings)`);
  const enriched: EnrichedFinding[] = [];

  for (const finding of findings) {
    const started = performance.now();
    const processed = await processFinding(finding, { ...options, logger });
    group.addOperation(`${finding.rule}:${finding.path}`, performance.now() - started, processed.classified);
    enriched.push(processed.finding);
  }

  const now = options.now ?? (() => new Date());
  const result = enforcePolicy(options.policy, enriched, { now: now(), repoContext: options.repoContext });
  group.end(result.passed);

  return { findings: enriched, result };
}
