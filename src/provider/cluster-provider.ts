/**
 * Cluster Provider Decoder
 *
 * Default ProviderDecoder. Accepts a bare provider type (`aws`), a JSON
 * object (`{"type":"gce","region":"us-central1"}`) or `none`, and narrows
 * suites by the `[Skipped:<value>]` tags tests use to opt out of a
 * platform or topology.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { TestMatchFn, TestName } from '../types/suites.js';
import type { ProviderConfig, ProviderDecoder } from './types.js';
import { NonEmptyString, PositiveInteger } from '../types/schemas/common.js';
import { SuiteError, toSuiteError, zodErrorToSuiteError } from '../api/errors.js';
import { hasTag, skippedTag } from '../tags/grammar.js';
import { PROVIDER } from '../config/defaults.js';

export const ClusterSpecSchema = z.object({
  type: NonEmptyString,
  region: z.string().optional(),
  zone: z.string().optional(),
  numNodes: PositiveInteger.optional(),
  multiZone: z.boolean().optional(),
  networkPlugin: z.string().optional(),
  singleReplicaTopology: z.boolean().optional(),
  disconnected: z.boolean().optional(),
});

export type ClusterSpec = z.infer<typeof ClusterSpecSchema>;

const SPEC_KEYS = [
  'type',
  'region',
  'zone',
  'numNodes',
  'multiZone',
  'networkPlugin',
  'singleReplicaTopology',
  'disconnected',
] as const satisfies readonly (keyof ClusterSpec)[];

/**
 * Fills in provider details from a live cluster.
 */
export type ClusterDiscovery = (requested: ClusterSpec | null) => Promise<ClusterSpec>;

/**
 * Prepares the external test framework for a resolved cluster.
 */
export type FrameworkInitializer = (spec: ClusterSpec, dryRun: boolean) => Promise<void>;

export interface ClusterProviderDecoderOptions {
  discover?: ClusterDiscovery;
  initializeFramework?: FrameworkInitializer;
  logger?: Logger;
}

export class ClusterProviderConfig implements ProviderConfig {
  public readonly spec: Readonly<ClusterSpec>;

  constructor(spec: ClusterSpec) {
    this.spec = Object.freeze({ ...spec });
  }

  /**
   * Tags that exclude a test on this cluster.
   */
  public exclusionTags(): string[] {
    const tags = [skippedTag(this.spec.type)];
    if (this.spec.networkPlugin) {
      tags.push(skippedTag(`Network/${this.spec.networkPlugin}`));
    }
    if (this.spec.singleReplicaTopology) {
      tags.push(skippedTag('SingleReplicaTopology'));
    }
    if (this.spec.disconnected) {
      tags.push(skippedTag('Disconnected'));
    }
    return tags;
  }

  public matchFn(): TestMatchFn {
    const tags = this.exclusionTags();
    return (name: TestName) => !tags.some((tag) => hasTag(name, tag));
  }

  public toJSONString(): string {
    // Keys always in SPEC_KEYS order
    const ordered: Record<string, unknown> = {};
    for (const key of SPEC_KEYS) {
      const value = this.spec[key];
      if (value !== undefined) {
        ordered[key] = value;
      }
    }
    return JSON.stringify(ordered);
  }
}

/**
 * Parse a provider identifier without contacting a cluster.
 *
 * Returns null when no provider was requested.
 */
export function parseProviderIdentifier(identifier: string): ClusterSpec | null {
  const trimmed = identifier.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (!trimmed.startsWith('{')) {
    return { type: trimmed };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (error) {
    throw new SuiteError(
      'ProviderResolution',
      `Provider identifier is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { identifier }
    );
  }

  const result = ClusterSpecSchema.safeParse(raw);
  if (!result.success) {
    throw zodErrorToSuiteError(result.error, 'ProviderResolution');
  }
  return result.data;
}

export class ClusterProviderDecoder implements ProviderDecoder {
  private readonly discover?: ClusterDiscovery;
  private readonly initializeFramework?: FrameworkInitializer;
  private readonly logger?: Logger;

  constructor(options: ClusterProviderDecoderOptions = {}) {
    this.discover = options.discover;
    this.initializeFramework = options.initializeFramework;
    this.logger = options.logger;
  }

  public async decodeProvider(
    identifier: string,
    dryRun: boolean,
    initialize: boolean
  ): Promise<ClusterProviderConfig> {
    const requested = parseProviderIdentifier(identifier);

    if (requested?.type === PROVIDER.NONE || dryRun || !initialize) {
      const spec = requested ?? { type: PROVIDER.NONE };
      this.logger?.debug({ provider: spec.type, dryRun, initialize }, 'Provider decoded without discovery');
      return new ClusterProviderConfig(spec);
    }

    if (!this.discover) {
      if (requested) {
        return new ClusterProviderConfig(requested);
      }
      throw new SuiteError(
        'ProviderResolution',
        'No provider was specified and cluster discovery is not configured',
        { identifier }
      );
    }

    let discovered: ClusterSpec;
    try {
      discovered = await this.discover(requested);
    } catch (error) {
      throw toSuiteError(error, 'ProviderResolution');
    }

    const result = ClusterSpecSchema.safeParse({ ...discovered, ...requested });
    if (!result.success) {
      throw zodErrorToSuiteError(result.error, 'ProviderResolution');
    }

    this.logger?.info({ provider: result.data.type }, 'Provider discovered from cluster');
    return new ClusterProviderConfig(result.data);
  }

  public async initializeTestFramework(config: ProviderConfig, dryRun: boolean): Promise<void> {
    if (!(config instanceof ClusterProviderConfig)) {
      throw new SuiteError('ProviderResolution', 'Provider config was not produced by this decoder');
    }
    if (!this.initializeFramework) {
      this.logger?.debug({ provider: config.spec.type }, 'No test framework initializer configured');
      return;
    }
    try {
      await this.initializeFramework(config.spec, dryRun);
    } catch (error) {
      throw toSuiteError(error, 'ProviderResolution');
    }
  }
}
