/**
 * Waiver Matching
 *
 * A waiver is active for a finding when its rule matches exactly, its path
 * glob matches the finding path, and its expiry is strictly in the future.
 * Any active waiver suppresses; there is no ordering among matches.
 */

import picomatch from 'picomatch';
import type { Finding, PolicyConfig, Waiver } from '@repo/shared-types';

const matcherCache = new Map<string, (candidate: string) => boolean>();

function matcherFor(glob: string): (candidate: string) => boolean {
  let matcher = matcherCache.get(glob);
  if (!matcher) {
    matcher = picomatch(normalizePath(glob), { dot: true });
    matcherCache.set(glob, matcher);
  }
  return matcher;
}

function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').replace(/^\.\//, '');
}

export function matchesWaiverPath(glob: string, filePath: string): boolean {
  return matcherFor(glob)(normalizePath(filePath));
}

export function isWaiverExpired(waiver: Waiver, now: Date = new Date()): boolean {
  const expiry = Date.parse(waiver.expiry);
  return Number.isNaN(expiry) || now.getTime() >= expiry;
}

export function isWaiverActive(waiver: Waiver, filePath: string, rule: string, now: Date = new Date()): boolean {
  return waiver.rule === rule && matchesWaiverPath(waiver.path, filePath) && !isWaiverExpired(waiver, now);
}

/**
 * Waivers that have not expired yet
 */
export function getActiveWaivers(config: Pick<PolicyConfig, 'waivers'>, now: Date = new Date()): Waiver[] {
  return config.waivers.filter((waiver) => !isWaiverExpired(waiver, now));
}

/**
 * First active waiver covering the finding, if any
 */
export function findActiveWaiver(
  waivers: readonly Waiver[],
  finding: Pick<Finding, 'path' | 'rule'>,
  now: Date = new Date()
): Waiver | undefined {
  return waivers.find((waiver) => isWaiverActive(waiver, finding.path, finding.rule, now));
}
