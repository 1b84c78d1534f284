/**
 * Default Configuration Constants
 *
 * Values used when config/runtime.yaml leaves a field out, and by library
 * callers that never load the YAML at all.
 */

import type { PolicyDefaults } from '../types/suites.js';

/**
 * Execution policy fallbacks
 */
export const POLICY_DEFAULTS: Readonly<PolicyDefaults> = Object.freeze({
  /** Serial execution */
  parallelism: 1,

  /** Zero tolerance for tests that only pass on retry */
  maxAllowedFlakes: 0,

  /** Per-test timeout (ms) */
  timeoutMs: 15 * 60_000, // 15 minutes

  /** Each test runs once */
  count: 1,
});

/**
 * Logging
 */
export const LOGGING = {
  /** Environment variable that overrides the configured level */
  LEVEL_ENV: 'SUITE_PLANNER_LOG_LEVEL',

  DEFAULT_LEVEL: 'info',
} as const;

/**
 * Provider resolution
 */
export const PROVIDER = {
  /** Identifier that blocks provider-specific behaviour */
  NONE: 'none',
} as const;

/**
 * Environment variable naming CSI driver manifest files, comma separated
 */
export const CSI_DRIVER_FILES_ENV = 'TEST_CSI_DRIVER_FILES';
