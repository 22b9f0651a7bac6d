/**
 * Centralized Configuration System
 *
 * Single source of truth for environment configuration:
 * - Schema validation via Zod
 * - Type normalization (numbers, booleans, URLs)
 * - Secret redaction for debugging
 */

export {
  loadConfig,
  formatConfig,
  parseEnvFile,
  type Config,
  type ConfigOptions,
} from './loader.js';
export { configSchema, SECRET_KEY_PATTERN, type ConfigSchema } from './schema.js';
export { redactSecrets, isSecretKey } from './redaction.js';
