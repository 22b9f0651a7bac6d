/**
 * Policy Loader
 *
 * Reads and validates the YAML policy file. Every failure surfaces as a
 * PolicyConfigError naming the absolute file path and the failing section.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { load as parseYaml } from 'js-yaml';
import type { z } from 'zod';
import type { PolicyConfig } from '@repo/shared-types';
import { formatError } from '@repo/shared-utils';
import { PolicyConfigError } from '../utils/errors.js';
import { policyConfigSchema } from './schema.js';

export const POLICY_FILE_NAMES = ['.leakgate.yml', '.leakgate.yaml'] as const;

/**
 * Used when no policy file exists: no network, no new findings, and nothing
 * riskier than "medium"
 */
export const DEFAULT_POLICY_CONFIG: PolicyConfig = {
  version: 1,
  validators: { allow_network: false, global_qps: 2.0 },
  budgets: { new_findings: 0, max_risk_score: 40 },
  waivers: [],
};

export interface ResolvedPolicy {
  config: PolicyConfig;
  /** Absolute path of the file the config came from; null for defaults */
  source: string | null;
}

function sectionOf(issue: z.ZodIssue): string {
  const [head, index] = issue.path;
  if (head === undefined) {
    return 'root';
  }
  if (head === 'waivers' && typeof index === 'number') {
    return `waivers[${index}]`;
  }
  return String(head);
}

function describeIssue(issue: z.ZodIssue): string {
  const location = issue.path.join('.');
  return location ? `${location}: ${issue.message}` : issue.message;
}

/**
 * Validate an already-parsed policy document
 */
export function parsePolicyConfig(raw: unknown, configPath?: string): PolicyConfig {
  if (raw === null || raw === undefined) {
    throw new PolicyConfigError('Policy file is empty', { configPath, section: 'root' });
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new PolicyConfigError('Policy must be a mapping', { configPath, section: 'root' });
  }

  const result = policyConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors;
    const first = issues[0];
    throw new PolicyConfigError(`Invalid policy config: ${issues.map(describeIssue).join('; ')}`, {
      configPath,
      section: first ? sectionOf(first) : undefined,
    });
  }

  return result.data;
}

/**
 * Load and validate a policy file
 */
export async function loadPolicyConfig(filePath: string): Promise<PolicyConfig> {
  const absolutePath = path.resolve(filePath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    const notFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new PolicyConfigError(notFound ? 'Policy file not found' : `Cannot read policy file: ${formatError(error)}`, {
      configPath: absolutePath,
      notFound,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new PolicyConfigError(`Malformed YAML: ${formatError(error).split('\n')[0]}`, {
      configPath: absolutePath,
      section: 'root',
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parsePolicyConfig(raw, absolutePath);
}

async function fileExists(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Pick the policy for a run: explicit path, then a policy file at the repo
 * root, then the built-in defaults. An explicit path that does not exist is
 * an error, never a silent fallback.
 */
export async function resolvePolicyConfig(
  options: { policyPath?: string; repoRoot?: string } = {}
): Promise<ResolvedPolicy> {
  if (options.policyPath) {
    const source = path.resolve(options.policyPath);
    return { config: await loadPolicyConfig(source), source };
  }

  const root = path.resolve(options.repoRoot ?? process.cwd());
  for (const name of POLICY_FILE_NAMES) {
    const candidate = path.join(root, name);
    if (await fileExists(candidate)) {
      return { config: await loadPolicyConfig(candidate), source: candidate };
    }
  }

  return { config: DEFAULT_POLICY_CONFIG, source: null };
}
