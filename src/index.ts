export {
  SuiteError,
  toSuiteError,
  zodErrorToSuiteError,
  type SuiteErrorCode,
  type SuiteErrorShape,
} from './api/errors.js';

// Tag grammar and disablement
export * from './tags/grammar.js';
export * from './tags/disablement.js';

// Predicates
export * from './predicates/predicate.js';

// Registry
export { SuiteRegistry, createSuite } from './registry/suite-registry.js';
export {
  createStaticSuites,
  createSuiteRegistry,
  type StaticSuiteDependencies,
} from './registry/static-suites.js';

// Policy
export { resolvePolicy, isWithinFlakeTolerance } from './policy/resolver.js';

// Lifecycle
export { createPreSuiteHooks, type PreSuiteHooks } from './lifecycle/hooks.js';
export {
  SuiteRun,
  runPreTest,
  type SuiteRunConfig,
  type SuiteRunEvents,
  type SuiteRunReport,
  type SuiteRunState,
} from './lifecycle/suite-run.js';
export {
  storageCapabilitiesPostSuite,
  printStorageCapabilities,
  readDriverCapabilities,
  type DriverCapabilities,
} from './lifecycle/storage-capabilities.js';

// Provider resolution
export type { ProviderConfig, ProviderDecoder } from './provider/types.js';
export {
  ClusterProviderConfig,
  ClusterProviderDecoder,
  ClusterSpecSchema,
  parseProviderIdentifier,
  type ClusterSpec,
  type ClusterDiscovery,
  type FrameworkInitializer,
} from './provider/cluster-provider.js';

// Configuration
export {
  loadConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getPolicyDefaults,
  getAllowListPaths,
  type Config,
} from './config/loader.js';
export { loadAllowLists, parseAllowList, type AllowLists } from './config/allow-lists.js';
export { POLICY_DEFAULTS } from './config/defaults.js';
export { createLogger } from './utils/logger.js';

export * from './types/schemas/index.js';

export type * from './types/suites.js';
export type * from './types/execution.js';
