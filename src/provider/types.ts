/**
 * Provider Resolution Types
 *
 * The contract between suite hooks and whatever discovers the cluster or
 * cloud the tests will run against.
 */

import type { TestMatchFn } from '../types/suites.js';

/**
 * Resolved provider configuration.
 */
export interface ProviderConfig {
  /** Narrowing that drops tests not applicable to this provider */
  matchFn(): TestMatchFn;
  /** Canonical identifier handed to child test processes */
  toJSONString(): string;
}

/**
 * Decodes a provider identifier into a configuration.
 */
export interface ProviderDecoder {
  /**
   * @param identifier - Provider as requested by the caller (JSON or a bare type)
   * @param dryRun - Resolve without contacting a live cluster
   * @param initialize - Fill in details discovered from the environment
   * @param extra - Decoder-specific inputs
   */
  decodeProvider(
    identifier: string,
    dryRun: boolean,
    initialize: boolean,
    extra?: Record<string, unknown>
  ): Promise<ProviderConfig>;

  /**
   * Populate the shared test framework context from the resolved provider.
   * Needed by suites that drive upstream storage tests.
   */
  initializeTestFramework(config: ProviderConfig, dryRun: boolean): Promise<void>;
}
