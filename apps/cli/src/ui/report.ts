/**
 * Gate report rendering
 *
 * Everything printed here comes from already-redacted pipeline output.
 */

import chalk from 'chalk';
import type { EnrichedFinding, PolicyResult, Violation } from '@repo/shared-types';
import { ASCII_SYMBOLS, type SymbolSet } from '../lib/environment.js';

export interface ReportOptions {
  colors?: boolean;
  symbols?: SymbolSet;
  /** List every enriched finding ahead of the verdict */
  verbose?: boolean;
}

interface Palette {
  red: (text: string) => string;
  yellow: (text: string) => string;
  green: (text: string) => string;
  cyan: (text: string) => string;
  bold: (text: string) => string;
  dim: (text: string) => string;
}

function palette(useColors: boolean): Palette {
  const plain = (text: string): string => text;
  return {
    red: useColors ? chalk.red : plain,
    yellow: useColors ? chalk.yellow : plain,
    green: useColors ? chalk.green : plain,
    cyan: useColors ? chalk.cyan : plain,
    bold: useColors ? chalk.bold : plain,
    dim: useColors ? chalk.dim : plain,
  };
}

function violationLines(violation: Violation, symbols: SymbolSet, c: Palette): string[] {
  const icon = violation.severity === 'high' ? c.red(symbols.cross) : c.yellow(symbols.warning);
  const lines = [`${icon} ${violation.type}: ${violation.message}`];
  if (violation.path) {
    lines.push(`   File: ${violation.path}`);
  }
  if (violation.findingId) {
    lines.push(`   Rule: ${violation.findingId}`);
  }
  return lines;
}

/**
 * One line per finding: location, rule, category, score and masked match
 */
export function formatFindings(findings: readonly EnrichedFinding[], options: ReportOptions = {}): string {
  const c = palette(options.colors ?? false);
  const symbols = options.symbols ?? ASCII_SYMBOLS;

  if (findings.length === 0) {
    return 'No findings.';
  }

  const lines = [c.bold('Findings:')];
  for (const finding of findings) {
    lines.push(
      `  ${symbols.bullet} ${finding.path}:${finding.line} ${finding.rule} ` +
        `${finding.category} (${finding.confidence.toFixed(2)}) ` +
        `risk ${finding.riskScore} ${finding.riskLevel} ${c.dim(finding.match)}`
    );
  }
  return lines.join('\n');
}

/**
 * Human-readable verdict: violations, notices and the summary counts
 */
export function formatReport(
  result: PolicyResult,
  findings: readonly EnrichedFinding[] = [],
  options: ReportOptions = {}
): string {
  const c = palette(options.colors ?? false);
  const symbols = options.symbols ?? ASCII_SYMBOLS;
  const report: string[] = [];

  if (options.verbose) {
    report.push(formatFindings(findings, options), '');
  }

  if (result.passed) {
    report.push(`${c.green(symbols.tick)} All policy checks passed.`, '');
  } else {
    report.push(`${c.red(symbols.cross)} Policy violations found:`, '');
    for (const violation of result.violations) {
      report.push(...violationLines(violation, symbols, c), '');
    }
  }

  if (result.notices.length > 0) {
    report.push('Notices:');
    for (const notice of result.notices) {
      report.push(`  ${c.cyan(symbols.info)} ${notice.type}: ${notice.message}`);
    }
    report.push('');
  }

  const { summary } = result;
  report.push(
    'Summary:',
    `  Total findings: ${summary.totalFindings}`,
    `  After waivers: ${summary.filteredFindings}`,
    `  Violations: ${summary.violations}`,
    `  Waivers applied: ${summary.waiversApplied}`
  );

  return report.join('\n');
}
