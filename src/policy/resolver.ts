/**
 * Policy Resolution
 *
 * Projects a suite's declared policy onto the system-wide defaults.
 * Pure: the suite is never mutated and the result is frozen.
 */

import type { EffectivePolicy, PolicyDefaults, Suite } from '../types/suites.js';
import { POLICY_DEFAULTS } from '../config/defaults.js';

type PolicyFields = Pick<
  Suite,
  'parallelism' | 'maxAllowedFlakes' | 'timeoutMs' | 'count' | 'invariantCheck'
>;

export function resolvePolicy(
  suite: PolicyFields,
  defaults: PolicyDefaults = POLICY_DEFAULTS
): EffectivePolicy {
  return Object.freeze({
    // 0 means "engine default", same as unset
    parallelism: suite.parallelism && suite.parallelism > 0 ? suite.parallelism : defaults.parallelism,
    maxAllowedFlakes: suite.maxAllowedFlakes ?? defaults.maxAllowedFlakes,
    timeoutMs: suite.timeoutMs ?? defaults.timeoutMs,
    count: suite.count ?? defaults.count,
    invariantCheck: suite.invariantCheck ?? 'none',
  });
}

/**
 * Whether a suite run with `flakyCount` tests that only passed on retry
 * is still a success under `policy`.
 */
export function isWithinFlakeTolerance(policy: EffectivePolicy, flakyCount: number): boolean {
  return flakyCount <= policy.maxAllowedFlakes;
}
