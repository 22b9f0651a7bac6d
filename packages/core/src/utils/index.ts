/**
 * Core Utilities Module
 *
 * Shared utilities for error handling, logging and timeouts.
 */

export * from './errors.js';
export * from './logger.js';
export * from './timeout.js';
