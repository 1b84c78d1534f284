/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevelSchema, NonEmptyString, NonNegativeInteger, PositiveInteger } from './common.js';

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Fallbacks for suites that leave a policy field unset
 */
export const PolicyDefaultsConfigSchema = z.object({
  parallelism: PositiveInteger,
  max_allowed_flakes: NonNegativeInteger,
  timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
  count: PositiveInteger,
});

/**
 * Allow-list files, relative to the package root
 */
export const AllowListsConfigSchema = z.object({
  minimal: NonEmptyString,
  cni: NonEmptyString,
});

export const RuntimeConfigSchema = z.object({
  logging: LoggingConfigSchema,
  policy_defaults: PolicyDefaultsConfigSchema,
  allow_lists: AllowListsConfigSchema,
});

export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
