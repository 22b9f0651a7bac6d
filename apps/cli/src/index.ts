#!/usr/bin/env node
/**
 * leakgate CLI entry point
 */

import { run } from './cli.js';
import { processIO } from './io.js';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

const exitCode = await run(process.argv, processIO(controller.signal));
process.exitCode = controller.signal.aborted ? 130 : exitCode;
