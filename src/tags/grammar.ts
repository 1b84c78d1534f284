/**
 * Name Tag Grammar
 *
 * Test names carry their metadata as bracketed tags, e.g.
 * `[Suite:openshift/conformance/parallel]`, `[Feature:Builds]` or
 * `[Early]`. External tooling writes these tags into test names
 * permanently, so every check here is a case-sensitive substring test with
 * exact brackets. Names are never tokenised as a whole.
 */

import type { TestName } from '../types/suites.js';

/**
 * Well-known tags and tag prefixes.
 *
 * Prefixes without a closing bracket also match nested values, so
 * `[Suite:openshift/conformance/parallel` also matches
 * `[Suite:openshift/conformance/parallel/minimal]`.
 */
export const TAGS = {
  DISABLED_PREFIX: '[Disabled',
  EARLY: '[Early]',
  LATE: '[Late]',
  SERIAL_SELF: '[Serial:Self]',
  LOCAL: '[Local]',
  CONFORMANCE: '[Conformance]',
  DISRUPTIVE: '[Disruptive]',
  CONFORMANCE_SUITE_PREFIX: '[Suite:openshift/conformance/',
  CONFORMANCE_PARALLEL_PREFIX: '[Suite:openshift/conformance/parallel',
  CONFORMANCE_SERIAL_PREFIX: '[Suite:openshift/conformance/serial',
  KUBE_SUITE: '[Suite:k8s]',
} as const;

/**
 * `[Suite:<name>]`
 */
export function suiteTag(name: string): string {
  return `[Suite:${name}]`;
}

/**
 * `[Feature:<name>]`
 */
export function featureTag(name: string): string {
  return `[Feature:${name}]`;
}

/**
 * `[sig-<name>]`
 */
export function sigTag(name: string): string {
  return `[sig-${name}]`;
}

/**
 * `[Skipped:<value>]`, used by providers to opt tests out per platform.
 */
export function skippedTag(value: string): string {
  return `[Skipped:${value}]`;
}

export function hasTag(name: TestName, tag: string): boolean {
  return name.includes(tag);
}

/**
 * True if a test is part of the normal pre-condition checks: tagged
 * `[Early]` and belonging to the parallel conformance suite.
 */
export function isStandardEarlyTest(name: TestName): boolean {
  if (!hasTag(name, TAGS.EARLY)) {
    return false;
  }
  return hasTag(name, TAGS.CONFORMANCE_PARALLEL_PREFIX);
}

/**
 * True if a test is part of the normal pre- or post-condition checks:
 * tagged `[Early]` or `[Late]` and belonging to the parallel conformance
 * suite. Used to inject the common validation tests into many otherwise
 * unrelated suites.
 */
export function isStandardEarlyOrLateTest(name: TestName): boolean {
  if (!hasTag(name, TAGS.EARLY) && !hasTag(name, TAGS.LATE)) {
    return false;
  }
  return hasTag(name, TAGS.CONFORMANCE_PARALLEL_PREFIX);
}
