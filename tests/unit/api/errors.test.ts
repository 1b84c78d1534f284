import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  SuiteError,
  createDuplicateSuiteError,
  createPreSuiteError,
  createUnknownSuiteError,
  toSuiteError,
  zodErrorToSuiteError,
} from '../../../src/api/errors.js';

describe('SuiteError', () => {
  it('serializes to a plain object', () => {
    const error = new SuiteError('ConfigError', 'bad config', { path: '/tmp/x.yaml' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SuiteError');
    expect(error.toObject()).toEqual({
      code: 'ConfigError',
      message: 'bad config',
      details: { path: '/tmp/x.yaml' },
    });
  });
});

describe('toSuiteError', () => {
  it('returns SuiteError instances unchanged', () => {
    const original = new SuiteError('UnknownSuite', 'nope');

    expect(toSuiteError(original, 'ConfigError')).toBe(original);
  });

  it('wraps plain errors with the fallback code', () => {
    const cause = new Error('disk full');

    const wrapped = toSuiteError(cause, 'PostSuiteFailed');

    expect(wrapped.code).toBe('PostSuiteFailed');
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.cause).toBe(cause);
  });

  it('describes non-error values', () => {
    expect(toSuiteError('boom', 'ConfigError').message).toBe('Non-error value thrown: boom');
  });
});

describe('error factories', () => {
  it('lists the known suites for an unknown name', () => {
    const error = createUnknownSuiteError('openshift/nope', ['all', 'openshift/build']);

    expect(error.code).toBe('UnknownSuite');
    expect(error.message).toBe('Suite "openshift/nope" does not exist');
    expect(error.details).toEqual({ suite: 'openshift/nope', available: ['all', 'openshift/build'] });
  });

  it('names the duplicated suite', () => {
    expect(createDuplicateSuiteError('all').message).toBe('Suite "all" is declared more than once');
  });

  it('keeps the code of a SuiteError raised by a PreSuite hook', () => {
    const reason = new SuiteError('ProviderResolution', 'cluster unreachable');

    const error = createPreSuiteError('openshift/csi', reason);

    expect(error.code).toBe('PreSuiteFailed');
    expect(error.message).toBe('Suite "openshift/csi" could not be prepared: cluster unreachable');
    expect(error.details).toEqual({ suite: 'openshift/csi', reasonCode: 'ProviderResolution' });
    expect(error.cause).toBe(reason);
  });

  it('omits the reason code for other failures', () => {
    expect(createPreSuiteError('all', 'timeout').details).toEqual({ suite: 'all' });
  });
});

describe('zodErrorToSuiteError', () => {
  it('reports the first failing field', () => {
    const result = z.object({ type: z.string().min(1, 'Cannot be empty') }).safeParse({ type: '' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const error = zodErrorToSuiteError(result.error, 'ProviderResolution');

    expect(error.code).toBe('ProviderResolution');
    expect(error.message).toBe("Validation error on field 'type': Cannot be empty");
    expect(error.details?.field).toBe('type');
  });

  it('uses root for top-level failures', () => {
    const result = z.string().safeParse(42);
    if (result.success) throw new Error('expected failure');

    expect(zodErrorToSuiteError(result.error).message).toBe(
      "Validation error on field 'root': Expected string, received number"
    );
  });
});
