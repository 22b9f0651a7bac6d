/**
 * Policy Schema
 *
 * Zod schema for the YAML policy file. Required: `version: 1`, a
 * `validators` mapping and a `budgets` mapping; everything else has a
 * default. Budget keys left out (or left empty) are unconstrained.
 */

import { z } from 'zod';
import { POLICY_VERSION } from '@repo/shared-types';

/**
 * Optional non-negative integer; an empty YAML value means "unset"
 */
const countBudget = z
  .number()
  .int('must be a whole number')
  .min(0, 'must not be negative')
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * Expiry date. YAML timestamps may arrive as Date objects; either form must
 * parse to a real instant.
 */
const expirySchema = z
  .union([z.string().min(1), z.date()])
  .transform((value, ctx) => {
    const text = value instanceof Date ? value.toISOString() : value;
    if (Number.isNaN(Date.parse(text))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable expiry date "${text}"` });
      return z.NEVER;
    }
    return text;
  });

export const waiverSchema = z.object({
  rule: z.string().min(1, 'rule is required'),
  path: z.string().min(1, 'path is required'),
  expiry: expirySchema,
  reason: z.string().min(1, 'reason is required'),
});

export const validatorsPolicySchema = z.object({
  allow_network: z.boolean().default(false),
  global_qps: z.number().positive('must be greater than 0').default(2.0),
});

export const budgetsPolicySchema = z.object({
  new_findings: countBudget,
  new_actual_findings: countBudget,
  new_expired_findings: countBudget,
  new_test_findings: countBudget,
  new_unknown_findings: countBudget,
  max_risk_score: z
    .number()
    .min(0, 'must be between 0 and 100')
    .max(100, 'must be between 0 and 100')
    .nullish()
    .transform((value) => value ?? undefined),
});

export const policyConfigSchema = z.object({
  version: z.literal(POLICY_VERSION, {
    errorMap: () => ({ message: `version must be ${POLICY_VERSION}` }),
  }),
  validators: validatorsPolicySchema,
  budgets: budgetsPolicySchema,
  waivers: z
    .array(waiverSchema)
    .nullish()
    .transform((value) => value ?? []),
});

export type PolicyConfigInput = z.input<typeof policyConfigSchema>;
