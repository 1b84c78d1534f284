/**
 * Storage capability summary
 *
 * PostSuite output for the CSI suite: lists the capabilities each driver
 * manifest declares, so a reader of the run log can tell which storage
 * tests were expected to be skipped.
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { OutputSink, PostSuiteHook } from '../types/suites.js';
import { SuiteError, zodErrorToSuiteError } from '../api/errors.js';
import { CSI_DRIVER_FILES_ENV } from '../config/defaults.js';

const DriverManifestSchema = z.object({
  DriverInfo: z.object({
    Name: z.string().min(1, 'Cannot be empty'),
    Capabilities: z.record(z.boolean()).default({}),
  }),
});

export interface DriverCapabilities {
  driver: string;
  file: string;
  capabilities: Record<string, boolean>;
}

export function readDriverCapabilities(file: string): DriverCapabilities {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new SuiteError('ConfigError', `Failed to read CSI driver manifest ${file}: ${String(error)}`, {
      path: file,
    });
  }

  const result = DriverManifestSchema.safeParse(raw);
  if (!result.success) {
    throw zodErrorToSuiteError(result.error, 'ConfigError');
  }

  return {
    driver: result.data.DriverInfo.Name,
    file,
    capabilities: result.data.DriverInfo.Capabilities,
  };
}

export function formatDriverCapabilities(entry: DriverCapabilities): string {
  const lines = [`Storage capabilities of CSI driver ${entry.driver} (${entry.file}):`];
  const names = Object.keys(entry.capabilities).sort();
  if (names.length === 0) {
    lines.push('  (none declared)');
  }
  for (const name of names) {
    lines.push(`  ${name}: ${entry.capabilities[name] ? 'yes' : 'no'}`);
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Split the comma separated manifest list.
 */
export function driverManifestFiles(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((file) => file.trim())
    .filter((file) => file.length > 0);
}

export function printStorageCapabilities(out: OutputSink, files: readonly string[]): void {
  for (const file of files) {
    out.write(formatDriverCapabilities(readDriverCapabilities(file)));
  }
}

/**
 * PostSuite hook printing the capabilities of every manifest named in
 * `TEST_CSI_DRIVER_FILES`.
 */
export function storageCapabilitiesPostSuite(
  env: NodeJS.ProcessEnv = process.env
): PostSuiteHook {
  return (options) => {
    printStorageCapabilities(options.out, driverManifestFiles(env[CSI_DRIVER_FILES_ENV]));
  };
}
