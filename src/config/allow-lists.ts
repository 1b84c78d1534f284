/**
 * Allow-list Loader
 *
 * Curated suites select tests by exact name. The lists live in plain text
 * files, one full test name per line, kept exactly as written apart from
 * the line ending; blank lines and lines starting with `#` are ignored.
 */

import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { TestName } from '../types/suites.js';
import { SuiteError } from '../api/errors.js';

export interface AllowLists {
  /** Highly reliable conformance tests */
  minimal: ReadonlySet<TestName>;
  /** Tests certified third-party network plugins must pass */
  cni: ReadonlySet<TestName>;
}

export function parseAllowList(contents: string): Set<TestName> {
  const names = new Set<TestName>();
  for (const line of contents.split(/\r?\n/)) {
    if (line.trim().length === 0 || line.trimStart().startsWith('#')) {
      continue;
    }
    names.add(line);
  }
  return names;
}

export function loadAllowList(path: string, logger?: Logger): Set<TestName> {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    throw new SuiteError('ConfigError', `Failed to read allow-list ${path}: ${String(error)}`, {
      path,
    });
  }

  const names = parseAllowList(contents);
  logger?.debug({ path, count: names.size }, 'Loaded allow-list');
  return names;
}

export function loadAllowLists(
  paths: { minimal: string; cni: string },
  logger?: Logger
): AllowLists {
  return {
    minimal: loadAllowList(paths.minimal, logger),
    cni: loadAllowList(paths.cni, logger),
  };
}
