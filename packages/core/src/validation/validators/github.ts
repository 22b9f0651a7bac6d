/**
 * GitHub token validator (live)
 *
 * Authenticates against `GET /user`; the login in the response is the only
 * evidence kept.
 */

import type { Finding } from '@repo/shared-types';
import { formatError, isRecord } from '@repo/shared-utils';
import { secretValueOf } from '../../redaction/findings.js';
import type { Validator, ValidatorContext, ValidatorVerdict } from '../types.js';

export const GITHUB_TOKEN_PREFIXES = ['ghp_', 'github_pat_', 'ghs_', 'gho_'] as const;

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

export interface GitHubValidatorOptions {
  apiUrl?: string;
}

export function createGitHubPatValidator(options: GitHubValidatorOptions = {}): Validator {
  const endpoint = `${(options.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '')}/user`;

  return {
    name: 'github_pat_live',
    rateLimitQps: 1,
    requiresNetwork: true,

    appliesTo(finding: Finding): boolean {
      const token = secretValueOf(finding);
      return finding.rule.startsWith('github') || GITHUB_TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix));
    },

    async validate(finding: Finding, context: ValidatorContext): Promise<ValidatorVerdict> {
      const token = secretValueOf(finding);
      if (!GITHUB_TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix))) {
        return { state: 'invalid', reason: 'Not a GitHub token format' };
      }

      let response: Response;
      try {
        response = await context.fetch(endpoint, {
          headers: {
            Authorization: `token ${token}`,
            Accept: 'application/vnd.github+json',
            'User-Agent': 'leakgate-validator',
          },
          signal: context.signal,
        });
      } catch (error) {
        if (context.signal.aborted) {
          throw error;
        }
        return { state: 'indeterminate', reason: `Network error: ${formatError(error)}` };
      }

      if (response.status === 200) {
        const body: unknown = await response.json();
        const login = isRecord(body) && typeof body.login === 'string' ? body.login : 'unknown';
        return {
          state: 'valid',
          evidence: `Valid GitHub token for user: ${login}`,
          reason: 'Token authenticated with GitHub API',
        };
      }
      if (response.status === 401) {
        return { state: 'invalid', reason: 'Token rejected by GitHub API (401 Unauthorized)' };
      }
      return { state: 'indeterminate', reason: `GitHub API error: ${response.status}` };
    },
  };
}
