/**
 * Command-line program definition
 */

import { Command, CommanderError } from 'commander';
import { gateCommand, type GateOptions } from './commands/gate.js';
import type { CliIO } from './io.js';
import { EXIT_CODES, type ExitCode } from './lib/errors.js';
import { CLI_NAME, CLI_VERSION } from './lib/version.js';

/**
 * Build the program. `onExit` receives the exit code of whichever command ran.
 */
export function createProgram(io: CliIO, onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Validate, classify and score leaked-credential findings, then gate CI on policy')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  program
    .command('gate')
    .description('Run detector findings through the pipeline and enforce the policy')
    .requiredOption('-f, --findings <file>', 'JSON file of detector findings')
    .option('-p, --policy <file>', 'Policy file (default: .leakgate.yml at the repo root)')
    .option('-r, --repo <dir>', 'Repository root used to discover the policy file')
    .option('--public', 'Repository is public')
    .option('--external-contributors', 'Repository accepts outside contributions')
    .option('--json', 'Print the enriched findings and policy result as JSON')
    .option('--verbose', 'List every finding and log pipeline progress')
    .action(async (options: GateOptions) => {
      onExit(await gateCommand(options, io));
    });

  return program;
}

/**
 * Parse `argv` and run the selected command
 */
export async function run(argv: readonly string[], io: CliIO): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.PASSED;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exit cleanly; every usage mistake is an input error
      return error.exitCode === 0 ? EXIT_CODES.PASSED : EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }

  return exitCode;
}
