/**
 * Suite Run
 *
 * Drives one suite through its lifecycle:
 *
 *   created -> preSuiteRunning -> (preSuiteFailed | filtering)
 *           -> dispatched -> completed -> postSuiteRunning -> done
 *
 * The PreSuite hook runs exactly once and may narrow selection through
 * RunOptions.matchFn. A PreSuite failure is fatal for the run. The
 * PostSuite hook runs exactly once after the engine returns; its failures
 * are logged and emitted but never fail the suite.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  EffectivePolicy,
  PolicyDefaults,
  PreTestHook,
  RunOptions,
  Suite,
  TestMatchFn,
  TestName,
} from '../types/suites.js';
import type {
  ExecutionEngine,
  ExecutionPlan,
  InvariantCheckCatalog,
  InvariantReportFn,
  SuiteResult,
  TestOutcome,
} from '../types/execution.js';
import { resolvePolicy } from '../policy/resolver.js';
import { SuiteError, createPreSuiteError, toSuiteError } from '../api/errors.js';
import { lazyLog } from '../utils/logger.js';

export type SuiteRunState =
  | 'created'
  | 'preSuiteRunning'
  | 'preSuiteFailed'
  | 'filtering'
  | 'dispatched'
  | 'completed'
  | 'postSuiteRunning'
  | 'done';

const TRANSITIONS: Readonly<Record<SuiteRunState, readonly SuiteRunState[]>> = {
  created: ['preSuiteRunning'],
  preSuiteRunning: ['preSuiteFailed', 'filtering'],
  preSuiteFailed: [],
  filtering: ['dispatched'],
  dispatched: ['completed'],
  completed: ['postSuiteRunning'],
  postSuiteRunning: ['done'],
  done: [],
};

export interface SuiteRunEvents {
  stateChange: (to: SuiteRunState, from: SuiteRunState) => void;
  filtered: (selected: number, total: number) => void;
  postSuiteError: (error: SuiteError) => void;
}

export interface SuiteRunConfig {
  suite: Suite;
  options: RunOptions;
  policyDefaults?: PolicyDefaults;
  invariantChecks?: InvariantCheckCatalog;
  /**
   * Instant used for every disablement check in this run. When unset the
   * clock is read per test, so a skip-until date passing mid-filter can
   * change membership.
   */
  evaluatedAt?: Date;
  logger?: Logger;
}

export interface SuiteRunReport {
  plan: ExecutionPlan;
  result: SuiteResult;
  /** Set when the PostSuite hook failed; the result is unaffected */
  postSuiteError?: SuiteError;
}

/**
 * Run a PreTest hook for one test. A failure becomes that test's failed
 * outcome instead of an exception.
 *
 * @returns null when the test body may run
 */
export async function runPreTest(
  hook: PreTestHook | undefined,
  name: TestName
): Promise<TestOutcome | null> {
  if (!hook) {
    return null;
  }
  try {
    await hook();
    return null;
  } catch (error) {
    return {
      name,
      status: 'failed',
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

export class SuiteRun extends EventEmitter<SuiteRunEvents> {
  private readonly suite: Suite;
  private readonly options: RunOptions;
  private readonly policy: EffectivePolicy;
  private readonly invariantChecks?: InvariantCheckCatalog;
  private readonly evaluatedAt?: Date;
  private readonly logger?: Logger;
  private state: SuiteRunState = 'created';

  constructor(config: SuiteRunConfig) {
    super();
    this.suite = config.suite;
    this.options = config.options;
    this.policy = resolvePolicy(config.suite, config.policyDefaults);
    this.invariantChecks = config.invariantChecks;
    this.evaluatedAt = config.evaluatedAt;
    this.logger = config.logger;
  }

  public getState(): SuiteRunState {
    return this.state;
  }

  public getPolicy(): EffectivePolicy {
    return this.policy;
  }

  /**
   * Run the PreSuite hook and filter `universe` into an execution plan.
   *
   * Leaves the run in the `filtering` state; `dispatch` continues it.
   *
   * @throws SuiteError `PreSuiteFailed` if the hook rejects
   */
  public async plan(universe: Iterable<TestName>): Promise<ExecutionPlan> {
    this.transition('preSuiteRunning');

    if (this.suite.preSuite) {
      try {
        await this.suite.preSuite(this.options);
      } catch (error) {
        const wrapped = createPreSuiteError(this.suite.name, error);
        this.logger?.error({ suite: this.suite.name, err: error }, 'PreSuite hook failed');
        this.transition('preSuiteFailed');
        throw wrapped;
      }
    }

    this.transition('filtering');
    const tests = this.filter(universe);

    return Object.freeze({
      suiteName: this.suite.name,
      tests,
      policy: this.policy,
      invariantCheckFn: this.selectInvariantCheck(),
      preTest: this.suite.preTest,
    });
  }

  /**
   * Hand a plan to the engine, then run the PostSuite hook.
   *
   * If the engine itself rejects, the PostSuite hook still runs and the
   * engine error is rethrown afterwards.
   *
   * @throws SuiteError `ConfigError` if the policy names an invariant check
   * the plan could not resolve
   */
  public async dispatch(plan: ExecutionPlan, engine: ExecutionEngine): Promise<SuiteRunReport> {
    if (plan.policy.invariantCheck !== 'none' && !plan.invariantCheckFn) {
      throw new SuiteError(
        'ConfigError',
        `Suite "${plan.suiteName}" requires the ${plan.policy.invariantCheck} invariant check but no invariant check catalog is configured`,
        { suite: plan.suiteName, kind: plan.policy.invariantCheck }
      );
    }
    this.transition('dispatched');
    this.logger?.info(
      { suite: plan.suiteName, tests: plan.tests.length, policy: plan.policy },
      'Dispatching suite'
    );

    let result: SuiteResult | undefined;
    let engineError: unknown;
    try {
      result = await engine.execute(plan);
    } catch (error) {
      engineError = error;
    }

    this.transition('completed');
    const postSuiteError = await this.runPostSuite();
    this.transition('done');

    if (result === undefined) {
      throw engineError;
    }

    this.logger?.info({ suite: plan.suiteName, success: result.success }, 'Suite finished');
    return postSuiteError ? { plan, result, postSuiteError } : { plan, result };
  }

  /**
   * Plan and dispatch in one go.
   */
  public async run(universe: Iterable<TestName>, engine: ExecutionEngine): Promise<SuiteRunReport> {
    const plan = await this.plan(universe);
    return this.dispatch(plan, engine);
  }

  private filter(universe: Iterable<TestName>): TestName[] {
    const narrow = this.options.matchFn;
    const selected: TestName[] = [];
    let total = 0;

    for (const name of universe) {
      total += 1;
      if (!this.suite.matches(name, this.evaluatedAt)) {
        continue;
      }
      if (narrow && !this.providerMatches(narrow, name)) {
        lazyLog(this.logger, 'debug', () => ({ suite: this.suite.name, test: name }), 'Test excluded by provider');
        continue;
      }
      selected.push(name);
    }

    this.logger?.debug({ suite: this.suite.name, selected: selected.length, total }, 'Filtered test universe');
    this.emit('filtered', selected.length, total);
    return selected;
  }

  private providerMatches(narrow: TestMatchFn, name: TestName): boolean {
    try {
      return narrow(name);
    } catch (error) {
      throw new SuiteError(
        'ProviderResolution',
        `Provider filter failed on "${name}": ${error instanceof Error ? error.message : String(error)}`,
        { suite: this.suite.name, test: name },
        { cause: error }
      );
    }
  }

  private selectInvariantCheck(): InvariantReportFn | undefined {
    // Without a catalog the plan can still be listed but not dispatched
    const kind = this.policy.invariantCheck;
    if (kind === 'none' || !this.invariantChecks) {
      return undefined;
    }
    return this.invariantChecks[kind];
  }

  private async runPostSuite(): Promise<SuiteError | undefined> {
    this.transition('postSuiteRunning');
    if (!this.suite.postSuite) {
      return undefined;
    }

    try {
      await this.suite.postSuite(this.options);
      return undefined;
    } catch (error) {
      const wrapped = toSuiteError(error, 'PostSuiteFailed');
      this.logger?.warn({ suite: this.suite.name, err: error }, 'PostSuite hook failed');
      this.emit('postSuiteError', wrapped);
      return wrapped;
    }
  }

  private transition(to: SuiteRunState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new SuiteError('InvalidState', `Suite run cannot move from ${from} to ${to}`, {
        suite: this.suite.name,
        from,
        to,
      });
    }
    this.state = to;
    this.emit('stateChange', to, from);
  }
}
