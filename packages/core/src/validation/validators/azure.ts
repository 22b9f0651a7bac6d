/**
 * Azure SAS URL validator (live)
 *
 * Expiry in the `se` parameter is checked offline first; an unexpired URL
 * gets one HEAD request. A 404 still proves the signature was accepted.
 */

import type { Finding } from '@repo/shared-types';
import { formatError, redactSecret } from '@repo/shared-utils';
import { secretValueOf } from '../../redaction/findings.js';
import type { Validator, ValidatorContext, ValidatorVerdict } from '../types.js';

const AZURE_STORAGE_HOST_SUFFIXES = [
  '.blob.core.windows.net',
  '.queue.core.windows.net',
  '.table.core.windows.net',
  '.file.core.windows.net',
] as const;

/**
 * Parse a SAS URL, or null when it is not an HTTPS Azure storage URL
 * carrying both a signature and an expiry
 */
export function parseSasUrl(value: string): { url: URL; expiry: string } | null {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }

  if (url.protocol !== 'https:') {
    return null;
  }
  if (!AZURE_STORAGE_HOST_SUFFIXES.some((suffix) => url.hostname.endsWith(suffix))) {
    return null;
  }

  const signature = url.searchParams.get('sig');
  const expiry = url.searchParams.get('se');
  if (!signature || !expiry) {
    return null;
  }
  return { url, expiry };
}

export const azureSasValidator: Validator = {
  name: 'azure_sas_live',
  rateLimitQps: 1,
  requiresNetwork: true,

  appliesTo(finding: Finding): boolean {
    return finding.rule.includes('azure') || parseSasUrl(secretValueOf(finding)) !== null;
  },

  async validate(finding: Finding, context: ValidatorContext): Promise<ValidatorVerdict> {
    const sas = parseSasUrl(secretValueOf(finding));
    if (!sas) {
      return { state: 'invalid', reason: 'Not an Azure SAS URL format' };
    }

    const host = redactSecret(sas.url.host);
    const expiresAt = Date.parse(sas.expiry);
    if (!Number.isNaN(expiresAt) && expiresAt < context.now().getTime()) {
      return {
        state: 'invalid',
        evidence: `Azure SAS for host ${host} has se=${sas.expiry}`,
        reason: 'SAS token expired',
      };
    }

    let response: Response;
    try {
      response = await context.fetch(sas.url, { method: 'HEAD', signal: context.signal });
    } catch (error) {
      if (context.signal.aborted) {
        throw error;
      }
      return { state: 'indeterminate', reason: `Network error: ${formatError(error)}` };
    }

    if ((response.status >= 200 && response.status < 300) || response.status === 404) {
      return {
        state: 'valid',
        evidence: `Azure SAS accepted by host: ${host}`,
        reason: `Storage service answered ${response.status}`,
      };
    }
    if (response.status === 403) {
      return {
        state: 'invalid',
        evidence: `Azure SAS refused by host: ${host}`,
        reason: 'SAS signature rejected or expired (403 Forbidden)',
      };
    }
    return { state: 'indeterminate', reason: `Azure storage error: ${response.status}` };
  },
};
