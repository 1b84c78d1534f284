/**
 * PreSuite hooks
 *
 * Resolve the provider a suite runs against and, where the suite is
 * provider-sensitive, narrow its test selection to match.
 */

import type { PreSuiteHook, RunOptions } from '../types/suites.js';
import type { ProviderConfig, ProviderDecoder } from '../provider/types.js';
import { PROVIDER } from '../config/defaults.js';

export interface PreSuiteHooks {
  /** Loads the provider but does not exclude provider-specific tests */
  withInitializedProvider: PreSuiteHook;
  /** Loads the provider and drops tests that do not apply to it */
  withProvider: PreSuiteHook;
  /** Forces the `none` provider so no cloud-specific behaviour leaks in */
  withNoProvider: PreSuiteHook;
  /** As withProvider, then initializes the shared test framework context */
  withKubeTestInitialization: PreSuiteHook;
}

export function createPreSuiteHooks(decoder: ProviderDecoder): PreSuiteHooks {
  const initializeProvider = async (options: RunOptions): Promise<ProviderConfig> => {
    const config = await decoder.decodeProvider(options.provider, options.dryRun, true);
    options.providerConfig = config;
    options.provider = config.toJSONString();
    return config;
  };

  const withInitializedProvider: PreSuiteHook = async (options) => {
    await initializeProvider(options);
  };

  const withProvider: PreSuiteHook = async (options) => {
    const config = await initializeProvider(options);
    options.matchFn = config.matchFn();
  };

  const withNoProvider: PreSuiteHook = async (options) => {
    options.provider = PROVIDER.NONE;
    await withProvider(options);
  };

  const withKubeTestInitialization: PreSuiteHook = async (options) => {
    const config = await initializeProvider(options);
    options.matchFn = config.matchFn();
    await decoder.initializeTestFramework(config, options.dryRun);
  };

  return {
    withInitializedProvider,
    withProvider,
    withNoProvider,
    withKubeTestInitialization,
  };
}
