/**
 * Suite Types
 *
 * Type definitions shared by the registry, policy resolution and the
 * suite run lifecycle.
 */

import type { SuitePredicate } from '../predicates/predicate.js';
import type { ProviderConfig } from '../provider/types.js';

/**
 * Fully-qualified display name of a test, including any bracketed tags.
 */
export type TestName = string;

/**
 * Membership test over test names, as handed to (or narrowed by) hooks.
 */
export type TestMatchFn = (name: TestName) => boolean;

/**
 * Which post-run system-event invariant function a suite applies.
 *
 * `stable` fails on any unexpected event; `permissive` tolerates the
 * disruption a suite deliberately causes.
 */
export type InvariantCheckKind = 'stable' | 'permissive' | 'none';

/**
 * Writable sink for hook output. Matches `process.stdout` and any
 * `node:stream` Writable.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Mutable context threaded through the PreSuite and PostSuite hooks.
 *
 * One instance per suite run; never shared between concurrent runs.
 */
export interface RunOptions {
  /** Requested provider identifier; replaced by the resolved config JSON */
  provider: string;
  dryRun: boolean;
  /** Filled in by a PreSuite hook once the provider has been decoded */
  providerConfig?: ProviderConfig;
  /** Extra narrowing applied on top of the suite predicate */
  matchFn?: TestMatchFn;
  out: OutputSink;
}

/**
 * Runs once before filtering. A rejection aborts the suite run.
 */
export type PreSuiteHook = (options: RunOptions) => Promise<void>;

/**
 * Runs once after dispatch completes. Failures are logged, never propagated.
 */
export type PostSuiteHook = (options: RunOptions) => Promise<void> | void;

/**
 * Runs before each test body. A failure fails that test only.
 */
export type PreTestHook = () => Promise<void> | void;

/**
 * Static declaration of a suite. Unset policy fields fall back to the
 * configured defaults at resolution time.
 */
export interface SuiteDefinition {
  name: string;
  description: string;
  matcher: SuitePredicate;
  /** Upper bound on concurrently running tests; 0 or unset uses the default */
  parallelism?: number;
  maxAllowedFlakes?: number;
  timeoutMs?: number;
  /** How many times each test is run */
  count?: number;
  invariantCheck?: InvariantCheckKind;
  preSuite?: PreSuiteHook;
  postSuite?: PostSuiteHook;
  preTest?: PreTestHook;
}

/**
 * Registered, immutable suite.
 */
export interface Suite extends Readonly<Omit<SuiteDefinition, 'matcher'>> {
  readonly matcher: SuitePredicate;
  /**
   * Suite membership. `at` pins the evaluation instant; without it the
   * clock is read for every call, so results can change when a
   * `[SkippedUntil:…]` date passes.
   */
  matches(name: TestName, at?: Date): boolean;
}

/**
 * System-wide fallbacks applied by policy resolution.
 */
export interface PolicyDefaults {
  parallelism: number;
  maxAllowedFlakes: number;
  timeoutMs: number;
  count: number;
}

/**
 * Fully resolved execution policy for one suite.
 */
export interface EffectivePolicy {
  readonly parallelism: number;
  readonly maxAllowedFlakes: number;
  readonly timeoutMs: number;
  readonly count: number;
  readonly invariantCheck: InvariantCheckKind;
}
