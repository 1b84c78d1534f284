import { describe, it, expect } from 'vitest';
import { createPreSuiteHooks } from '../../../src/lifecycle/hooks.js';
import type { RunOptions } from '../../../src/types/suites.js';
import { createDecoder, createProviderConfig, createSink } from '../helpers.js';

function createOptions(provider = 'gce'): RunOptions {
  return { provider, dryRun: true, out: createSink() };
}

describe('PreSuite hooks', () => {
  const providerConfig = createProviderConfig('{"type":"gce"}', ['[Skipped:gce]']);

  it('withInitializedProvider records the provider without narrowing', async () => {
    const decoder = createDecoder(providerConfig);
    const options = createOptions();

    await createPreSuiteHooks(decoder).withInitializedProvider(options);

    expect(decoder.decodeProvider).toHaveBeenCalledWith('gce', true, true);
    expect(options.provider).toBe('{"type":"gce"}');
    expect(options.providerConfig).toBe(providerConfig);
    expect(options.matchFn).toBeUndefined();
  });

  it('withProvider narrows selection to tests the provider supports', async () => {
    const options = createOptions();

    await createPreSuiteHooks(createDecoder(providerConfig)).withProvider(options);

    expect(options.matchFn?.('storage works')).toBe(true);
    expect(options.matchFn?.('storage works [Skipped:gce]')).toBe(false);
  });

  it('withNoProvider ignores the requested provider', async () => {
    const decoder = createDecoder();
    const options = createOptions('aws');

    await createPreSuiteHooks(decoder).withNoProvider(options);

    expect(decoder.decodeProvider).toHaveBeenCalledWith('none', true, true);
    expect(options.provider).toBe('{"type":"none"}');
    expect(options.matchFn).toBeTypeOf('function');
  });

  it('withKubeTestInitialization initializes the framework after decoding', async () => {
    const decoder = createDecoder(providerConfig);
    const options = createOptions();

    await createPreSuiteHooks(decoder).withKubeTestInitialization(options);

    expect(decoder.initializeTestFramework).toHaveBeenCalledWith(providerConfig, true);
    expect(options.matchFn?.('x [Skipped:gce]')).toBe(false);
  });

  it('propagates decoder failures', async () => {
    const decoder = createDecoder();
    decoder.decodeProvider.mockRejectedValue(new Error('no kubeconfig'));
    const options = createOptions();

    await expect(createPreSuiteHooks(decoder).withProvider(options)).rejects.toThrow('no kubeconfig');
    expect(options.provider).toBe('gce');
    expect(decoder.initializeTestFramework).not.toHaveBeenCalled();
  });

  it('propagates framework initialization failures', async () => {
    const decoder = createDecoder(providerConfig);
    decoder.initializeTestFramework.mockRejectedValue(new Error('framework unavailable'));

    await expect(
      createPreSuiteHooks(decoder).withKubeTestInitialization(createOptions())
    ).rejects.toThrow('framework unavailable');
  });
});
