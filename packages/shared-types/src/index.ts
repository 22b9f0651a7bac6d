/**
 * Shared TypeScript types for the monorepo
 *
 * This module provides:
 * - Finding, validation, classification and risk types
 * - Policy configuration and enforcement result types
 * - A Result type for isolated per-finding failures
 */

export * from './findings.js';
export * from './policy.js';
export * from './result.js';
