/**
 * Finding Classifier
 *
 * Runs the rules in priority order. A rule above the short-circuit
 * threshold decides alone; otherwise the most confident candidate wins and
 * ties go to the earlier rule.
 */

import type { Classification, Finding, ValidationResult, Result } from '@repo/shared-types';
import { ok, err } from '@repo/shared-types';
import { formatError } from '@repo/shared-utils';
import { ClassificationError } from '../utils/errors.js';
import { secretValueOf } from '../redaction/findings.js';
import { CLASSIFICATION_RULES, type RuleInput, type RuleOutcome } from './rules.js';

export const SHORT_CIRCUIT_CONFIDENCE = 0.8;
export const UNKNOWN_CONFIDENCE = 0.1;
export const NO_RULES_MATCHED = 'no_classification_rules_matched';

export function classify(
  finding: Finding,
  validationResults: readonly ValidationResult[] = [],
  now: Date = new Date()
): Classification {
  const input: RuleInput = {
    value: secretValueOf(finding),
    path: finding.path,
    rule: finding.rule,
    validationResults,
    now,
  };

  const collected: string[] = [];
  let best: RuleOutcome | null = null;

  for (const rule of CLASSIFICATION_RULES) {
    const outcome = rule.evaluate(input);
    collected.push(...outcome.reasons);

    if (outcome.category === null || outcome.confidence <= 0) {
      continue;
    }
    if (outcome.confidence > SHORT_CIRCUIT_CONFIDENCE) {
      return toClassification(outcome);
    }
    if (!best || outcome.confidence > best.confidence) {
      best = outcome;
    }
  }

  if (best) {
    return toClassification(best);
  }

  return {
    category: 'unknown',
    confidence: UNKNOWN_CONFIDENCE,
    reasons: collected.length > 0 ? collected : [NO_RULES_MATCHED],
  };
}

function toClassification(outcome: RuleOutcome): Classification {
  return {
    category: outcome.category ?? 'unknown',
    confidence: outcome.confidence,
    reasons: outcome.reasons,
  };
}

/**
 * `classify` with failures returned instead of thrown
 */
export function safeClassify(
  finding: Finding,
  validationResults: readonly ValidationResult[] = [],
  now: Date = new Date()
): Result<Classification, ClassificationError> {
  try {
    return ok(classify(finding, validationResults, now));
  } catch (error) {
    return err(
      new ClassificationError(formatError(error), {
        rule: finding.rule,
        path: finding.path,
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}

/**
 * Classification recorded for a finding whose classification failed
 */
export function classificationFailure(error: Error): Classification {
  return {
    category: 'unknown',
    confidence: UNKNOWN_CONFIDENCE,
    reasons: [`classification_error:${error.message}`],
  };
}
