/**
 * Configuration Schema
 *
 * Defines all environment variables with validation, types, and defaults.
 */

import { z } from 'zod';

/**
 * `z.coerce.boolean()` treats any non-empty string as true, so "false" and
 * "0" need explicit handling.
 */
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === 'boolean') return value;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
  });

/**
 * Complete configuration schema for all leakgate components
 */
export const configSchema = z.object({
  // ============================================================================
  // Runtime
  // ============================================================================
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================================================
  // Logging
  // ============================================================================
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LEAKGATE_LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),

  // ============================================================================
  // Validators
  // ============================================================================
  // Forces every network validator onto the skipped path, whatever the policy says
  LEAKGATE_DISABLE_NETWORK: envBoolean.default(false),
  LEAKGATE_VALIDATOR_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(10000),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),

  // ============================================================================
  // Policy
  // ============================================================================
  LEAKGATE_POLICY_PATH: z.string().min(1).optional(),

  // ============================================================================
  // CLI
  // ============================================================================
  LEAKGATE_NO_COLOR: envBoolean.default(false),
});

export type ConfigSchema = z.infer<typeof configSchema>;

/**
 * Keys whose values are redacted when printing config. URL values have
 * their credentials stripped separately.
 */
export const SECRET_KEY_PATTERN = /(TOKEN|SECRET|PASSWORD|PRIVATE_KEY|API_KEY)/i;
