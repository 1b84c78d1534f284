/**
 * Execution Engine Contract
 *
 * What the suite run hands to the external engine that actually runs
 * tests, and what it expects back.
 */

import type { EffectivePolicy, PreTestHook, TestName } from './suites.js';

/**
 * Runtime event observed while a suite ran (cluster events, operator
 * condition changes and the like). Opaque beyond these fields.
 */
export interface ObservedEvent {
  source: string;
  message: string;
  timestamp: number;
  [key: string]: unknown;
}

/**
 * One JUnit-style test case synthesised from observed events.
 */
export interface JUnitTestCase {
  name: string;
  failureOutput?: string;
  skipMessage?: string;
}

/**
 * Post-run system-event invariant check.
 */
export type InvariantReportFn = (events: readonly ObservedEvent[]) => JUnitTestCase[];

/**
 * Supplies the invariant check variants; the core only chooses between
 * them.
 */
export interface InvariantCheckCatalog {
  stable: InvariantReportFn;
  permissive: InvariantReportFn;
}

/**
 * Everything the engine needs to run one suite, resolved before dispatch.
 */
export interface ExecutionPlan {
  readonly suiteName: string;
  readonly tests: readonly TestName[];
  readonly policy: EffectivePolicy;
  readonly invariantCheckFn?: InvariantReportFn;
  readonly preTest?: PreTestHook;
}

export type TestStatus = 'passed' | 'failed' | 'flaky' | 'skipped';

export interface TestOutcome {
  name: TestName;
  status: TestStatus;
  error?: Error;
}

export interface SuiteResult {
  outcomes: TestOutcome[];
  /** Engine verdict, taking the flake threshold into account */
  success: boolean;
}

export interface ExecutionEngine {
  execute(plan: ExecutionPlan): Promise<SuiteResult>;
}
