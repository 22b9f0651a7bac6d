/**
 * Policy Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PolicyConfigError } from '../../utils/errors.js';
import {
  DEFAULT_POLICY_CONFIG,
  loadPolicyConfig,
  parsePolicyConfig,
  resolvePolicyConfig,
} from '../loader.js';

const VALID_POLICY = `version: 1
validators:
  allow_network: true
  global_qps: 5
budgets:
  new_findings: 3
  new_test_findings: 10
  max_risk_score: 60
waivers:
  - rule: github_pat
    path: "tests/**"
    expiry: "2027-01-01"
    reason: fixture tokens
`;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parsePolicyConfig', () => {
  it('applies defaults for optional sections', () => {
    const config = parsePolicyConfig({ version: 1, validators: {}, budgets: {} });

    expect(config.validators).toEqual({ allow_network: false, global_qps: 2 });
    expect(config.waivers).toEqual([]);
    expect(config.budgets.new_findings).toBeUndefined();
  });

  it('treats empty budget values as unset', () => {
    const config = parsePolicyConfig({ version: 1, validators: {}, budgets: { new_findings: null } });
    expect(config.budgets.new_findings).toBeUndefined();
  });

  it('rejects an unsupported version', () => {
    const error = captureError(() => parsePolicyConfig({ version: 2, validators: {}, budgets: {} }, '/repo/.leakgate.yml'));

    expect(error).toBeInstanceOf(PolicyConfigError);
    if (error instanceof PolicyConfigError) {
      expect(error.message).toBe(
        'Invalid policy config: version: version must be 1 (config: /repo/.leakgate.yml) (section: version)'
      );
      expect(error.section).toBe('version');
      expect(error.code).toBe('CONFIG_INVALID');
    }
  });

  it('names the failing waiver', () => {
    const error = captureError(() =>
      parsePolicyConfig({
        version: 1,
        validators: {},
        budgets: {},
        waivers: [{ rule: 'github_pat', path: '*', expiry: 'not-a-date', reason: 'r' }],
      })
    );

    expect(error).toBeInstanceOf(PolicyConfigError);
    if (error instanceof PolicyConfigError) {
      expect(error.section).toBe('waivers[0]');
      expect(error.message).toContain('waivers.0.expiry: unparseable expiry date "not-a-date"');
    }
  });

  it('rejects a non-positive global qps', () => {
    const error = captureError(() => parsePolicyConfig({ version: 1, validators: { global_qps: 0 }, budgets: {} }));

    expect(error).toBeInstanceOf(PolicyConfigError);
    if (error instanceof PolicyConfigError) {
      expect(error.section).toBe('validators');
      expect(error.message).toContain('validators.global_qps: must be greater than 0');
    }
  });

  it('rejects negative budgets and out-of-range risk ceilings', () => {
    expect(() => parsePolicyConfig({ version: 1, validators: {}, budgets: { new_findings: -1 } })).toThrow(
      'budgets.new_findings: must not be negative'
    );
    expect(() => parsePolicyConfig({ version: 1, validators: {}, budgets: { max_risk_score: 101 } })).toThrow(
      'budgets.max_risk_score: must be between 0 and 100'
    );
  });

  it('rejects empty and non-mapping documents', () => {
    expect(() => parsePolicyConfig(null)).toThrow('Policy file is empty');
    expect(() => parsePolicyConfig(['version', 1])).toThrow('Policy must be a mapping');
    expect(() => parsePolicyConfig('version: 1')).toThrow('Policy must be a mapping');
  });
});

describe('loadPolicyConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leakgate-policy-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads a complete policy file', async () => {
    const file = path.join(tempDir, 'policy.yml');
    await fs.writeFile(file, VALID_POLICY);

    const config = await loadPolicyConfig(file);

    expect(config.validators).toEqual({ allow_network: true, global_qps: 5 });
    expect(config.budgets).toEqual({ new_findings: 3, new_test_findings: 10, max_risk_score: 60 });
    expect(config.waivers).toEqual([
      { rule: 'github_pat', path: 'tests/**', expiry: '2027-01-01', reason: 'fixture tokens' },
    ]);
  });

  it('reports a missing file with its absolute path', async () => {
    const file = path.join(tempDir, 'missing.yml');

    await expect(loadPolicyConfig(file)).rejects.toMatchObject({
      code: 'CONFIG_NOT_FOUND',
      configPath: file,
      message: `Policy file not found (config: ${file})`,
    });
  });

  it('reports malformed YAML at the root section', async () => {
    const file = path.join(tempDir, 'broken.yml');
    await fs.writeFile(file, 'version: [1\n');

    const promise = loadPolicyConfig(file);
    await expect(promise).rejects.toBeInstanceOf(PolicyConfigError);
    await expect(promise).rejects.toMatchObject({ section: 'root', configPath: file });
    await expect(promise).rejects.toThrow(/^Malformed YAML: /);
  });

  it('rejects an empty file', async () => {
    const file = path.join(tempDir, 'empty.yml');
    await fs.writeFile(file, '');

    await expect(loadPolicyConfig(file)).rejects.toThrow(`Policy file is empty (config: ${file}) (section: root)`);
  });
});

describe('resolvePolicyConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'leakgate-resolve-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('falls back to the defaults when no policy file exists', async () => {
    const resolved = await resolvePolicyConfig({ repoRoot: tempDir });

    expect(resolved.source).toBeNull();
    expect(resolved.config).toEqual(DEFAULT_POLICY_CONFIG);
  });

  it('finds a policy file at the repo root', async () => {
    const file = path.join(tempDir, '.leakgate.yaml');
    await fs.writeFile(file, VALID_POLICY);

    const resolved = await resolvePolicyConfig({ repoRoot: tempDir });

    expect(resolved.source).toBe(file);
    expect(resolved.config.budgets.new_findings).toBe(3);
  });

  it('prefers .leakgate.yml over .leakgate.yaml', async () => {
    await fs.writeFile(path.join(tempDir, '.leakgate.yaml'), VALID_POLICY);
    await fs.writeFile(path.join(tempDir, '.leakgate.yml'), 'version: 1\nvalidators: {}\nbudgets:\n  new_findings: 7\n');

    const resolved = await resolvePolicyConfig({ repoRoot: tempDir });

    expect(resolved.source).toBe(path.join(tempDir, '.leakgate.yml'));
    expect(resolved.config.budgets.new_findings).toBe(7);
  });

  it('never falls back when an explicit path is missing', async () => {
    await fs.writeFile(path.join(tempDir, '.leakgate.yml'), VALID_POLICY);

    await expect(
      resolvePolicyConfig({ policyPath: path.join(tempDir, 'custom.yml'), repoRoot: tempDir })
    ).rejects.toMatchObject({ code: 'CONFIG_NOT_FOUND' });
  });
});
