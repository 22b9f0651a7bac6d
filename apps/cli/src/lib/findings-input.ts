/**
 * Detector findings input
 *
 * Accepts the JSON a detector writes: either a bare array of findings or an
 * object with a `findings` array. Field names follow the Finding type;
 * `id` is read as the rule id and `history_age_days` as `historyAgeDays`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Finding } from '@repo/shared-types';
import { formatError, isRecord } from '@repo/shared-utils';
import { CliError } from './errors.js';

const findingSchema = z
  .object({
    path: z.string().min(1, 'path is required'),
    rule: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
    line: z.number().int().min(1).default(1),
    match: z.string().min(1, 'match is required'),
    severity: z.string().default('medium'),
    matchHint: z.string().optional(),
    reason: z.string().optional(),
    historyAgeDays: z.number().min(0).optional(),
    history_age_days: z.number().min(0).optional(),
    meta: z
      .object({ fullToken: z.string().optional(), fullUrl: z.string().optional() })
      .catchall(z.unknown())
      .optional(),
  })
  .transform((value, ctx): Finding => {
    const rule = value.rule ?? value.id;
    if (!rule) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rule is required', path: ['rule'] });
      return z.NEVER;
    }
    const historyAgeDays = value.historyAgeDays ?? value.history_age_days;
    return {
      path: value.path,
      rule,
      line: value.line,
      match: value.match,
      severity: value.severity,
      ...(value.matchHint !== undefined ? { matchHint: value.matchHint } : {}),
      ...(value.reason !== undefined ? { reason: value.reason } : {}),
      ...(historyAgeDays !== undefined ? { historyAgeDays } : {}),
      ...(value.meta !== undefined ? { meta: value.meta } : {}),
    };
  });

export const findingsInputSchema = z.array(findingSchema, {
  invalid_type_error: 'expected an array of findings',
});

/**
 * Validate parsed findings JSON. Issue messages name the field, never its
 * value, so a raw match cannot leak through an error.
 */
export function parseFindings(raw: unknown, source = 'findings'): Finding[] {
  const list = isRecord(raw) && 'findings' in raw ? raw.findings : raw;
  const result = findingsInputSchema.safeParse(list);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => {
      const location = issue.path.join('.');
      return location ? `${location}: ${issue.message}` : issue.message;
    });
    throw new CliError(`Invalid findings in ${source}: ${issues.join('; ')}`, 'FINDINGS_INVALID');
  }
  return result.data;
}

/**
 * Read and validate a findings file
 */
export async function readFindings(filePath: string): Promise<Finding[]> {
  const absolutePath = path.resolve(filePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new CliError(`Findings file not found: ${absolutePath}`, 'FINDINGS_NOT_FOUND', { cause: error });
    }
    throw new CliError(`Cannot read findings file ${absolutePath}: ${formatError(error)}`, 'FINDINGS_INVALID');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new CliError(`Findings file is not valid JSON: ${absolutePath}`, 'FINDINGS_INVALID');
  }

  return parseFindings(raw, absolutePath);
}
