/**
 * Configuration Loader
 *
 * Loads and validates configuration from environment variables.
 * Supports .env files outside production only.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { configSchema, type ConfigSchema } from './schema.js';
import { redactSecrets } from './redaction.js';

export type Config = ConfigSchema;

export interface ConfigOptions {
  /**
   * Whether to load .env files (default: true outside production)
   */
  loadEnvFile?: boolean;

  /**
   * Path to .env file (default: searches for .env in `cwd`)
   */
  envFilePath?: string;

  /**
   * Directory searched for .env files (default: process.cwd())
   */
  cwd?: string;

  /**
   * Environment to read instead of process.env
   */
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = trimmed.match(/^([^#=]+)=(.*)$/);
    if (match && match[1] && match[2] !== undefined) {
      const key = match[1].trim();
      let value = match[2].trim();

      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

function findEnvFile(startPath: string = process.cwd()): string | null {
  for (const candidate of ['.env', '.env.local']) {
    const path = resolve(startPath, candidate);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

function loadEnvFile(filePath?: string, cwd?: string): Record<string, string> {
  const envPath = filePath ? resolve(cwd ?? process.cwd(), filePath) : findEnvFile(cwd);
  if (!envPath) {
    return {};
  }

  try {
    return parseEnvFile(readFileSync(envPath, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new Error(`Failed to load .env file at ${envPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Merge environment variables (the live environment takes precedence over .env)
 */
function mergeEnvVars(envFileVars: Record<string, string>, env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = { ...envFileVars };

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: ConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const isProduction = env.NODE_ENV === 'production';
  const { loadEnvFile: shouldLoadEnvFile = !isProduction, envFilePath, cwd } = options;

  const envFileVars = shouldLoadEnvFile ? loadEnvFile(envFilePath, cwd) : {};
  const parseResult = configSchema.safeParse(mergeEnvVars(envFileVars, env));

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map((err) => {
        const path = err.path.join('.');
        return `  • ${path || 'root'}: ${err.message}`;
      })
      .join('\n');

    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return parseResult.data;
}

/**
 * Render configuration as JSON with secrets redacted
 */
export function formatConfig(config: Config): string {
  return JSON.stringify(redactSecrets(config), null, 2);
}
