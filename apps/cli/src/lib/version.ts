/**
 * CLI version, read from the package manifest
 *
 * @module lib/version
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const manifestSchema = z.object({ name: z.string(), version: z.string() });

function readManifest(): z.infer<typeof manifestSchema> {
  // src/lib and dist/lib both sit two levels below the package root
  const content = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return manifestSchema.parse(JSON.parse(content));
}

const manifest = readManifest();

export const CLI_VERSION = manifest.version;

export const CLI_NAME = 'leakgate';
