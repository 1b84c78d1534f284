import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { ProviderConfig, ProviderDecoder } from '../../src/provider/types.js';
import type { OutputSink } from '../../src/types/suites.js';
import type { AllowLists } from '../../src/config/allow-lists.js';

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    isLevelEnabled: vi.fn().mockReturnValue(true),
    child: vi.fn().mockReturnThis(),
  } as unknown as Logger;
}

/**
 * Provider config that excludes names containing any of `excluded`.
 */
export function createProviderConfig(json: string, excluded: string[] = []): ProviderConfig {
  return {
    matchFn: () => (name: string) => !excluded.some((fragment) => name.includes(fragment)),
    toJSONString: () => json,
  };
}

export function createDecoder(config: ProviderConfig = createProviderConfig('{"type":"none"}')): ProviderDecoder & {
  decodeProvider: ReturnType<typeof vi.fn>;
  initializeTestFramework: ReturnType<typeof vi.fn>;
} {
  return {
    decodeProvider: vi.fn().mockResolvedValue(config),
    initializeTestFramework: vi.fn().mockResolvedValue(undefined),
  };
}

export function createSink(): OutputSink & { text(): string } {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}

export const MINIMAL_TEST = '[sig-node] pods should start [Suite:openshift/conformance/parallel]';
export const CNI_TEST = '[sig-network] pods should talk across nodes [Suite:k8s]';

export function createAllowLists(): AllowLists {
  return {
    minimal: new Set([MINIMAL_TEST]),
    cni: new Set([CNI_TEST]),
  };
}
