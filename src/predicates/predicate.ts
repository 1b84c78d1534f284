/**
 * Suite Predicates
 *
 * Small value objects that decide suite membership from a test name.
 * Each one carries its captured data explicitly, so a predicate can be
 * tested on its own without building the registry.
 */

import type { TestName } from '../types/suites.js';
import { isDisabled } from '../tags/disablement.js';
import { hasTag, isStandardEarlyOrLateTest, isStandardEarlyTest } from '../tags/grammar.js';

/**
 * Membership capability shared by every predicate.
 *
 * `at` is the evaluation instant forwarded to the disablement check.
 */
export interface SuitePredicate {
  matches(name: TestName, at?: Date): boolean;
  /** Short human-readable rendering, used in listings and logs */
  describe(): string;
}

/**
 * Name contains a tag or literal fragment.
 */
export class ContainsPredicate implements SuitePredicate {
  constructor(public readonly fragment: string) {}

  matches(name: TestName): boolean {
    return hasTag(name, this.fragment);
  }

  describe(): string {
    return `contains(${JSON.stringify(this.fragment)})`;
  }
}

export class AllOfPredicate implements SuitePredicate {
  constructor(public readonly predicates: readonly SuitePredicate[]) {}

  matches(name: TestName, at?: Date): boolean {
    return this.predicates.every((predicate) => predicate.matches(name, at));
  }

  describe(): string {
    return `allOf(${this.predicates.map((p) => p.describe()).join(', ')})`;
  }
}

export class AnyOfPredicate implements SuitePredicate {
  constructor(public readonly predicates: readonly SuitePredicate[]) {}

  matches(name: TestName, at?: Date): boolean {
    return this.predicates.some((predicate) => predicate.matches(name, at));
  }

  describe(): string {
    return `anyOf(${this.predicates.map((p) => p.describe()).join(', ')})`;
  }
}

export class NotPredicate implements SuitePredicate {
  constructor(public readonly inner: SuitePredicate) {}

  matches(name: TestName, at?: Date): boolean {
    return !this.inner.matches(name, at);
  }

  describe(): string {
    return `not(${this.inner.describe()})`;
  }
}

export class AlwaysPredicate implements SuitePredicate {
  matches(): boolean {
    return true;
  }

  describe(): string {
    return 'always';
  }
}

/**
 * `[Early]` or `[Late]` test from the parallel conformance suite.
 */
export class StandardEarlyOrLatePredicate implements SuitePredicate {
  matches(name: TestName): boolean {
    return isStandardEarlyOrLateTest(name);
  }

  describe(): string {
    return 'standardEarlyOrLate';
  }
}

/**
 * `[Early]` test from the parallel conformance suite.
 */
export class StandardEarlyPredicate implements SuitePredicate {
  matches(name: TestName): boolean {
    return isStandardEarlyTest(name);
  }

  describe(): string {
    return 'standardEarly';
  }
}

/**
 * Curated subset: the exact name must be on the allow-list and carry the
 * suite tag.
 */
export class AllowListPredicate implements SuitePredicate {
  constructor(
    public readonly listName: string,
    private readonly names: ReadonlySet<TestName>,
    public readonly suiteFragment: string
  ) {}

  matches(name: TestName): boolean {
    if (!this.names.has(name)) {
      return false;
    }
    return hasTag(name, this.suiteFragment);
  }

  describe(): string {
    return `allowList(${this.listName}: ${this.names.size} names, ${JSON.stringify(this.suiteFragment)})`;
  }
}

/**
 * Hard-coded exclusion of tests tied to a known defect.
 *
 * `reference` is the tracking note for the defect, kept verbatim so the
 * carve-out can be lifted once it is fixed.
 */
export class CarveOutPredicate implements SuitePredicate {
  constructor(
    public readonly inner: SuitePredicate,
    public readonly fragment: string,
    public readonly reference: string
  ) {}

  matches(name: TestName, at?: Date): boolean {
    if (hasTag(name, this.fragment)) {
      return false;
    }
    return this.inner.matches(name, at);
  }

  describe(): string {
    return `${this.inner.describe()} excluding(${JSON.stringify(this.fragment)})`;
  }
}

/**
 * Rejects disabled and not-yet-due tests before consulting `inner`.
 */
export class EnabledOnlyPredicate implements SuitePredicate {
  constructor(public readonly inner: SuitePredicate) {}

  matches(name: TestName, at?: Date): boolean {
    if (isDisabled(name, at)) {
      return false;
    }
    return this.inner.matches(name, at);
  }

  describe(): string {
    return `enabled(${this.inner.describe()})`;
  }
}

export const contains = (fragment: string): SuitePredicate => new ContainsPredicate(fragment);

export const allOf = (...predicates: SuitePredicate[]): SuitePredicate =>
  new AllOfPredicate(predicates);

export const anyOf = (...predicates: SuitePredicate[]): SuitePredicate =>
  new AnyOfPredicate(predicates);

export const not = (predicate: SuitePredicate): SuitePredicate => new NotPredicate(predicate);

export const always = (): SuitePredicate => new AlwaysPredicate();

export const standardEarlyOrLateTest = (): SuitePredicate => new StandardEarlyOrLatePredicate();

export const standardEarlyTest = (): SuitePredicate => new StandardEarlyPredicate();

export const allowList = (
  listName: string,
  names: Iterable<TestName>,
  suiteFragment: string
): SuitePredicate => new AllowListPredicate(listName, new Set(names), suiteFragment);

export const excluding = (
  inner: SuitePredicate,
  fragment: string,
  reference: string
): SuitePredicate => new CarveOutPredicate(inner, fragment, reference);

export const enabledOnly = (inner: SuitePredicate): SuitePredicate =>
  new EnabledOnlyPredicate(inner);
