/**
 * Environment detection for CI/TTY and graceful degradation
 */

import ci from 'ci-info';

/** Environment information */
export interface Environment {
  /** Running in CI environment */
  isCI: boolean;
  /** CI provider name (if detected) */
  ciName: string | null;
  /** stdout is a TTY */
  isTTY: boolean;
  /** Supports ANSI colors */
  colors: boolean;
  /** Supports Unicode characters */
  unicode: boolean;
}

/** Symbol sets for different terminal capabilities */
export interface SymbolSet {
  tick: string;
  cross: string;
  warning: string;
  info: string;
  bullet: string;
}

export const UNICODE_SYMBOLS: SymbolSet = {
  tick: '✓',
  cross: '✖',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•',
};

export const ASCII_SYMBOLS: SymbolSet = {
  tick: '+',
  cross: 'x',
  warning: '!',
  info: 'i',
  bullet: '*',
};

function isSet(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Detect color support
 */
function detectColorSupport(vars: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  // Explicit no color
  if (vars['NO_COLOR'] !== undefined || isSet(vars['LEAKGATE_NO_COLOR'])) {
    return false;
  }

  const forceColor = vars['FORCE_COLOR'];
  if (forceColor !== undefined) {
    return forceColor !== '0' && forceColor !== 'false';
  }

  if (!isTTY) {
    // GitHub Actions and GitLab render ANSI in job logs
    return ci.isCI && Boolean(vars['GITHUB_ACTIONS'] ?? vars['GITLAB_CI']);
  }

  return vars['TERM'] !== 'dumb';
}

/**
 * Detect Unicode support
 */
function detectUnicodeSupport(vars: NodeJS.ProcessEnv): boolean {
  if (isSet(vars['LEAKGATE_NO_UNICODE'])) {
    return false;
  }

  if (process.platform === 'win32') {
    return Boolean(vars['WT_SESSION']) || vars['TERM_PROGRAM'] === 'vscode';
  }

  return true;
}

/**
 * Build the environment description for a given set of variables
 */
export function detectEnvironment(
  vars: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stdout.isTTY)
): Environment {
  return {
    isCI: ci.isCI,
    ciName: ci.name,
    isTTY,
    colors: detectColorSupport(vars, isTTY),
    unicode: detectUnicodeSupport(vars),
  };
}

/**
 * Get symbols based on environment capabilities
 */
export function getSymbols(environment: Pick<Environment, 'unicode'>): SymbolSet {
  return environment.unicode ? UNICODE_SYMBOLS : ASCII_SYMBOLS;
}
