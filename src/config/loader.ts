/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema } from '../types/schemas/config.js';
import type { PolicyDefaults } from '../types/suites.js';
import type { LogLevel } from '../types/schemas/common.js';
import { SuiteError } from '../api/errors.js';

export type Environment = 'production' | 'development' | 'test';

/**
 * Configuration Schema (matches runtime.yaml structure)
 */
export interface Config {
  logging: {
    level: LogLevel;
  };
  policy_defaults: {
    parallelism: number;
    max_allowed_flakes: number;
    timeout_ms: number;
    count: number;
  };
  allow_lists: {
    minimal: string;
    cni: string;
  };
  environments?: {
    production?: DeepPartial<Config>;
    development?: DeepPartial<Config>;
    test?: DeepPartial<Config>;
  };
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; `source` wins on conflicts
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

function formatIssues(error: { issues: { path: PropertyKey[]; message: string }[] }): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.map(String).join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}

/**
 * Load configuration from YAML file and validate it
 */
export function loadConfig(configPath?: string, environment?: Environment): Config {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SuiteError(
        'ConfigError',
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`,
        { path: finalPath }
      );
    }
    throw new SuiteError('ConfigError', `Failed to load configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  if (!isPlainObject(raw)) {
    throw new SuiteError('ConfigError', `Configuration file is not a mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  // Apply environment-specific overrides
  let merged: Record<string, unknown> = raw;
  const environments = raw.environments;
  if (isPlainObject(environments)) {
    const override = environments[resolveEnvironment(environment)];
    if (isPlainObject(override)) {
      merged = deepMerge(raw, override);
    }
  }
  delete merged.environments;

  const parseResult = RuntimeConfigSchema.safeParse(merged);
  if (!parseResult.success) {
    throw new SuiteError(
      'ConfigError',
      `Configuration validation failed:\n${formatIssues(parseResult.error).join('\n')}`,
      { path: finalPath }
    );
  }

  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML policy defaults (snake_case) to PolicyDefaults (camelCase)
 */
export function getPolicyDefaults(config: Config = getConfig()): PolicyDefaults {
  return {
    parallelism: config.policy_defaults.parallelism,
    maxAllowedFlakes: config.policy_defaults.max_allowed_flakes,
    timeoutMs: config.policy_defaults.timeout_ms,
    count: config.policy_defaults.count,
  };
}

/**
 * Absolute paths of the allow-list files
 */
export function getAllowListPaths(
  config: Config = getConfig(),
  root: string = findPackageRoot()
): { minimal: string; cni: string } {
  const resolve = (path: string): string => (isAbsolute(path) ? path : join(root, path));
  return {
    minimal: resolve(config.allow_lists.minimal),
    cni: resolve(config.allow_lists.cni),
  };
}
