import { describe, it, expect } from 'vitest';
import {
  TAGS,
  featureTag,
  hasTag,
  isStandardEarlyOrLateTest,
  isStandardEarlyTest,
  sigTag,
  skippedTag,
  suiteTag,
} from '../../../src/tags/grammar.js';

describe('tag builders', () => {
  it('renders bracketed tags', () => {
    expect(suiteTag('openshift/scalability')).toBe('[Suite:openshift/scalability]');
    expect(featureTag('Builds')).toBe('[Feature:Builds]');
    expect(sigTag('network')).toBe('[sig-network]');
    expect(skippedTag('Network/OVNKubernetes')).toBe('[Skipped:Network/OVNKubernetes]');
  });
});

describe('hasTag', () => {
  it('matches exact, case-sensitive substrings', () => {
    expect(hasTag('a [Feature:Builds] b', '[Feature:Builds]')).toBe(true);
    expect(hasTag('a [feature:builds] b', '[Feature:Builds]')).toBe(false);
    expect(hasTag('a Feature:Builds b', '[Feature:Builds]')).toBe(false);
  });

  it('treats open prefixes as matching nested suite names', () => {
    expect(
      hasTag('x [Suite:openshift/conformance/parallel/minimal]', TAGS.CONFORMANCE_PARALLEL_PREFIX)
    ).toBe(true);
  });
});

describe('isStandardEarlyOrLateTest', () => {
  it('accepts early tests from the parallel conformance suite', () => {
    expect(isStandardEarlyOrLateTest('foo [Early] [Suite:openshift/conformance/parallel]')).toBe(
      true
    );
  });

  it('accepts late tests from the parallel conformance suite', () => {
    expect(isStandardEarlyOrLateTest('foo [Late] [Suite:openshift/conformance/parallel]')).toBe(
      true
    );
  });

  it('rejects early tests outside the parallel conformance suite', () => {
    expect(isStandardEarlyOrLateTest('foo [Early]')).toBe(false);
    expect(isStandardEarlyOrLateTest('foo [Early] [Suite:openshift/conformance/serial]')).toBe(
      false
    );
  });

  it('rejects parallel conformance tests that are neither early nor late', () => {
    expect(isStandardEarlyOrLateTest('foo [Suite:openshift/conformance/parallel]')).toBe(false);
  });
});

describe('isStandardEarlyTest', () => {
  it('accepts only early tests', () => {
    expect(isStandardEarlyTest('foo [Early] [Suite:openshift/conformance/parallel]')).toBe(true);
    expect(isStandardEarlyTest('foo [Late] [Suite:openshift/conformance/parallel]')).toBe(false);
    expect(isStandardEarlyTest('foo [Early]')).toBe(false);
  });
});
