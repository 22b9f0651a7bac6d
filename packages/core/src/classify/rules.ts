/**
 * Classification Rules
 *
 * Each rule inspects one finding and either proposes a category with a
 * confidence or records informational reasons only. Evidence rules (offline
 * expiry, validator signals) come before syntactic heuristics.
 */

import type { FindingCategory, ValidationResult } from '@repo/shared-types';
import { calculateEntropy, distinctCharCount, hasAscendingRun } from './entropy.js';
import { jwtExpiry, looksLikeJwt, sasExpiry } from './expiry.js';
import {
  EXPIRY_WORDS_ON_INVALID,
  EXPIRY_WORDS_ON_VALID,
  OBVIOUS_PLACEHOLDERS,
  TEST_FILENAME_WORDS,
  TEST_PATH_MARKERS,
  VALUE_MARKERS,
} from './markers.js';

export interface RuleInput {
  /** Raw value under test (full token when the detector kept one) */
  value: string;
  path: string;
  rule: string;
  validationResults: readonly ValidationResult[];
  now: Date;
}

export interface RuleOutcome {
  /** null: the rule did not classify */
  category: FindingCategory | null;
  confidence: number;
  reasons: string[];
}

export interface ClassificationRule {
  name: string;
  evaluate(input: RuleInput): RuleOutcome;
}

const noVerdict = (reasons: string[] = []): RuleOutcome => ({ category: null, confidence: 0, reasons });

// ============================================================================
// Rule 1: Offline expiry
// ============================================================================

export const offlineExpiryRule: ClassificationRule = {
  name: 'offline_expiry',
  evaluate({ value, rule, now }) {
    const reasons: string[] = [];
    const kind = rule.toLowerCase();

    if (kind.includes('jwt') || looksLikeJwt(value)) {
      const expiry = jwtExpiry(value);
      if (expiry) {
        if (expiry.getTime() < now.getTime()) {
          return { category: 'expired', confidence: 0.95, reasons: [...reasons, 'offline:jwt_expired'] };
        }
        reasons.push('offline:jwt_valid_future_exp');
      }
    }

    if (kind.includes('azure') || kind.includes('sas') || value.includes('se=')) {
      const expiry = sasExpiry(value);
      if (expiry) {
        if (expiry.getTime() < now.getTime()) {
          return { category: 'expired', confidence: 0.95, reasons: [...reasons, 'offline:azure_sas_expired'] };
        }
        reasons.push('offline:azure_sas_valid_future_exp');
      }
    }

    return noVerdict(reasons);
  },
};

// ============================================================================
// Rule 2: Validator signals
// ============================================================================

function mentionsAny(result: ValidationResult, words: readonly string[]): boolean {
  const text = `${result.evidence ?? ''} ${result.reason ?? ''}`.toLowerCase();
  return words.some((word) => text.includes(word));
}

export const validatorSignalRule: ClassificationRule = {
  name: 'validator_signal',
  evaluate({ validationResults }) {
    // A confirmation anywhere outranks a rejection from another validator
    const valid = validationResults.find((result) => result.state === 'valid');
    if (valid) {
      if (mentionsAny(valid, EXPIRY_WORDS_ON_VALID)) {
        return { category: 'expired', confidence: 0.9, reasons: [`validator:${valid.validatorName}:expired`] };
      }
      return { category: 'actual', confidence: 0.9, reasons: [`validator:${valid.validatorName}:confirmed`] };
    }

    const expired = validationResults.find(
      (result) => result.state === 'invalid' && mentionsAny(result, EXPIRY_WORDS_ON_INVALID)
    );
    if (expired) {
      return { category: 'expired', confidence: 0.85, reasons: [`validator:${expired.validatorName}:expired`] };
    }

    return noVerdict();
  },
};

// ============================================================================
// Rule 3: Test markers
// ============================================================================

function degenerateMarker(value: string): string | null {
  if (value.length >= 10) {
    if (/^0+$/.test(value)) {
      return 'all_zeros';
    }
    if (distinctCharCount(value.toUpperCase()) === 1) {
      return 'repeated_char';
    }
    if (/(\d)\1{5,}/.test(value)) {
      return 'repeated_digit';
    }
  }

  if (value.length <= 16) {
    const upper = value.toUpperCase();
    const dominant = OBVIOUS_PLACEHOLDERS.find(
      (placeholder) => upper.includes(placeholder) && placeholder.length >= value.length * 0.6
    );
    if (dominant) {
      return dominant;
    }
  }

  return null;
}

export const testMarkerRule: ClassificationRule = {
  name: 'test_marker',
  evaluate({ value, path }) {
    const normalized = path.replace(/\\/g, '/').toLowerCase();

    const pathMarker = TEST_PATH_MARKERS.find(({ pattern }) => pattern.test(normalized));
    if (pathMarker) {
      return { category: 'test', confidence: 0.9, reasons: [`path:${pathMarker.label}`] };
    }

    const filename = normalized.split('/').pop() ?? '';
    const word = TEST_FILENAME_WORDS.find((candidate) => filename.includes(candidate));
    if (word) {
      return { category: 'test', confidence: 0.85, reasons: [`filename:${word}`] };
    }

    const upper = value.toUpperCase();
    const marker = VALUE_MARKERS.find((candidate) => upper.includes(candidate));
    if (marker) {
      return { category: 'test', confidence: 0.7, reasons: [`marker:${marker}`] };
    }

    const degenerate = degenerateMarker(value);
    if (degenerate) {
      return { category: 'test', confidence: 0.7, reasons: [`marker:${degenerate}`] };
    }

    return noVerdict();
  },
};

// ============================================================================
// Rule 4: Entropy / placeholder heuristics
// ============================================================================

export const entropyRule: ClassificationRule = {
  name: 'entropy',
  evaluate({ value }) {
    if (value.length < 8) {
      return noVerdict();
    }
    if (hasAscendingRun(value)) {
      return { category: 'test', confidence: 0.3, reasons: ['entropy:sequential'] };
    }
    if (distinctCharCount(value) <= 3 && value.length > 10) {
      return { category: 'test', confidence: 0.4, reasons: ['entropy:repeated_chars'] };
    }
    if (calculateEntropy(value) < 2.0) {
      return { category: 'test', confidence: 0.3, reasons: ['entropy:low'] };
    }
    return noVerdict();
  },
};

/** Fixed priority order */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  offlineExpiryRule,
  validatorSignalRule,
  testMarkerRule,
  entropyRule,
];
