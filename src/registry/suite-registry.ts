/**
 * Suite Registry
 *
 * Ordered, read-only collection of suites keyed by name. Built once at
 * start-up and passed to whatever needs it; there is no registration API
 * after construction, so concurrent readers need no locking.
 */

import type { Logger } from 'pino';
import type { Suite, SuiteDefinition, TestName } from '../types/suites.js';
import { createDuplicateSuiteError, createUnknownSuiteError } from '../api/errors.js';

/**
 * Freeze a declaration into a Suite.
 */
export function createSuite(definition: SuiteDefinition): Suite {
  const { matcher } = definition;
  return Object.freeze({
    ...definition,
    matches: (name: TestName, at?: Date): boolean => matcher.matches(name, at),
  });
}

export class SuiteRegistry {
  private readonly suites: readonly Suite[];
  private readonly byName: ReadonlyMap<string, Suite>;

  /**
   * @throws SuiteError `DuplicateSuite` if two definitions share a name
   */
  constructor(definitions: readonly SuiteDefinition[], logger?: Logger) {
    const byName = new Map<string, Suite>();
    const suites: Suite[] = [];

    for (const definition of definitions) {
      if (byName.has(definition.name)) {
        throw createDuplicateSuiteError(definition.name);
      }
      const suite = createSuite(definition);
      byName.set(suite.name, suite);
      suites.push(suite);
    }

    this.suites = Object.freeze(suites);
    this.byName = byName;

    logger?.debug({ suiteCount: suites.length }, 'Suite registry initialized');
  }

  get size(): number {
    return this.suites.length;
  }

  /**
   * Exact-name lookup
   */
  lookup(name: string): Suite | undefined {
    return this.byName.get(name);
  }

  /**
   * Exact-name lookup that never substitutes a default suite.
   *
   * @throws SuiteError `UnknownSuite`
   */
  get(name: string): Suite {
    const suite = this.byName.get(name);
    if (!suite) {
      throw createUnknownSuiteError(name, this.names());
    }
    return suite;
  }

  /**
   * Suites in declaration order. Safe to iterate repeatedly.
   */
  all(): readonly Suite[] {
    return this.suites;
  }

  names(): string[] {
    return this.suites.map((suite) => suite.name);
  }

  [Symbol.iterator](): Iterator<Suite> {
    return this.suites[Symbol.iterator]();
  }
}
