/**
 * Gate command - run detector findings through the pipeline and the policy
 */

import path from 'node:path';
import { createDefaultRegistry, Logger as CoreLogger, resolvePolicyConfig, runPipeline } from '@leakgate/core';
import { formatConfig, loadConfig, type Config } from '@repo/shared-config';
import { formatError } from '@repo/shared-utils';
import type { CliIO } from '../io.js';
import { detectEnvironment, getSymbols } from '../lib/environment.js';
import { CliError, EXIT_CODES, wrapError, type ExitCode } from '../lib/errors.js';
import { readFindings } from '../lib/findings-input.js';
import { createLogger } from '../lib/logger.js';
import { formatReport } from '../ui/report.js';

export interface GateOptions {
  findings: string;
  policy?: string;
  repo?: string;
  public?: boolean;
  externalContributors?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Environment plus the .env file in the working directory (skipped in
 * production)
 */
function loadEnvironmentConfig(io: CliIO): Config {
  try {
    return loadConfig({ env: io.env, cwd: io.cwd });
  } catch (error) {
    throw new CliError(formatError(error).replace(/\s*\n\s*/g, ' '), 'ENV_INVALID');
  }
}

export async function gateCommand(options: GateOptions, io: CliIO): Promise<ExitCode> {
  const environment = detectEnvironment(io.env, io.isTTY);
  const symbols = getSymbols(environment);

  let config: Config;
  try {
    config = loadEnvironmentConfig(io);
  } catch (error) {
    return reportError(error, options, io);
  }

  const level = options.verbose ? 'debug' : config.LOG_LEVEL;
  const logger = createLogger({
    level,
    json: config.LEAKGATE_LOG_FORMAT === 'json',
    colors: environment.colors,
    symbols,
    write: (line) => io.stderr(`${line}\n`),
  });
  const coreLogger = new CoreLogger({
    level,
    component: 'leakgate',
    enableConsole: false,
    onLog: (entry) => logger.fromCore(entry),
  });

  try {
    logger.debug(`Environment configuration: ${formatConfig(config)}`);

    const policyPath = options.policy ?? config.LEAKGATE_POLICY_PATH;
    const resolved = await resolvePolicyConfig({
      policyPath: policyPath ? path.resolve(io.cwd, policyPath) : undefined,
      repoRoot: path.resolve(io.cwd, options.repo ?? '.'),
    });
    logger.debug(`Policy: ${resolved.source ?? 'built-in defaults'}`);

    const findings = await readFindings(path.resolve(io.cwd, options.findings));
    logger.debug(`Loaded ${findings.length} findings`);

    const registry = createDefaultRegistry({ githubApiUrl: config.GITHUB_API_URL });
    const { findings: enriched, result } = await runPipeline(findings, {
      policy: resolved.config,
      registry,
      repoContext: {
        isPublic: options.public ?? false,
        hasExternalContributors: options.externalContributors ?? false,
      },
      logger: coreLogger,
      signal: io.signal,
      fetch: io.fetch,
      timeoutMs: config.LEAKGATE_VALIDATOR_TIMEOUT_MS,
      disableNetwork: config.LEAKGATE_DISABLE_NETWORK,
    });

    if (options.json) {
      io.stdout(`${JSON.stringify({ passed: result.passed, result, findings: enriched }, null, 2)}\n`);
    } else {
      io.stdout(
        `${formatReport(result, enriched, { colors: environment.colors, symbols, verbose: options.verbose })}\n`
      );
    }

    return result.passed ? EXIT_CODES.PASSED : EXIT_CODES.GATE_FAILED;
  } catch (error) {
    return reportError(error, options, io);
  }
}

function reportError(error: unknown, options: GateOptions, io: CliIO): ExitCode {
  const cliError = wrapError(error);
  if (options.json) {
    io.stderr(`${JSON.stringify({ error: cliError.toJSON() })}\n`);
  } else {
    io.stderr(`${cliError.format({ verbose: options.verbose })}\n`);
  }
  return cliError.exitCode;
}
