import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getAllowListPaths,
  getConfig,
  getPolicyDefaults,
  initializeConfig,
  loadConfig,
  resetConfig,
} from '../../../src/config/loader.js';
import type { Config } from '../../../src/config/loader.js';
import { SuiteError } from '../../../src/api/errors.js';

describe('Config Loader', () => {
  let testConfigDir: string;
  let testConfigPath: string;

  const validConfig: Config = {
    logging: { level: 'info' },
    policy_defaults: {
      parallelism: 1,
      max_allowed_flakes: 0,
      timeout_ms: 900000,
      count: 1,
    },
    allow_lists: {
      minimal: 'lists/minimal.txt',
      cni: 'lists/cni.txt',
    },
  };

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'suite-planner-config-'));
    testConfigPath = join(testConfigDir, 'test-runtime.yaml');
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    resetConfig();
  });

  describe('loadConfig', () => {
    it('should load valid configuration from YAML file', () => {
      writeFileSync(testConfigPath, yaml.dump(validConfig));

      const config = loadConfig(testConfigPath, 'production');

      expect(config).toEqual(validConfig);
    });

    it('should throw error for non-existent config file', () => {
      const nonExistentPath = join(testConfigDir, 'non-existent.yaml');

      expect(() => loadConfig(nonExistentPath)).toThrow('Configuration file not found');
      expect(() => loadConfig(nonExistentPath)).toThrow(nonExistentPath);
    });

    it('should throw error for invalid YAML syntax', () => {
      writeFileSync(testConfigPath, 'invalid: yaml: syntax: [[[');

      expect(() => loadConfig(testConfigPath)).toThrow('Failed to load configuration');
    });

    it('should reject a document that is not a mapping', () => {
      writeFileSync(testConfigPath, '- one\n- two\n');

      expect(() => loadConfig(testConfigPath)).toThrow(
        `Configuration file is not a mapping: ${testConfigPath}`
      );
    });

    it('should apply environment-specific overrides (production)', () => {
      writeFileSync(
        testConfigPath,
        yaml.dump({
          ...validConfig,
          environments: {
            production: { policy_defaults: { timeout_ms: 1_800_000 } },
            test: { logging: { level: 'silent' } },
          },
        })
      );

      const config = loadConfig(testConfigPath, 'production');

      expect(config.policy_defaults).toEqual({
        parallelism: 1,
        max_allowed_flakes: 0,
        timeout_ms: 1_800_000,
        count: 1,
      });
      expect(config.logging.level).toBe('info');
      expect(config.environments).toBeUndefined();
    });

    it('should apply environment-specific overrides (test)', () => {
      writeFileSync(
        testConfigPath,
        yaml.dump({
          ...validConfig,
          environments: { test: { logging: { level: 'silent' } } },
        })
      );

      expect(loadConfig(testConfigPath, 'test').logging.level).toBe('silent');
    });

    it('should report every invalid field', () => {
      writeFileSync(
        testConfigPath,
        yaml.dump({
          ...validConfig,
          policy_defaults: { ...validConfig.policy_defaults, timeout_ms: 10, parallelism: 0 },
        })
      );

      let caught: unknown;
      try {
        loadConfig(testConfigPath, 'production');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SuiteError);
      if (caught instanceof SuiteError) {
        expect(caught.code).toBe('ConfigError');
        expect(caught.message).toBe(
          'Configuration validation failed:\n' +
            'policy_defaults.parallelism Must be a positive integer\n' +
            'policy_defaults.timeout_ms must be >= 1000ms'
        );
      }
    });

    it('should load the packaged runtime.yaml', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.logging.level).toBe('silent');
      expect(config.policy_defaults.timeout_ms).toBe(15 * 60_000);
      expect(config.allow_lists.minimal).toBe('config/allowlists/minimal.txt');
    });
  });

  describe('global configuration', () => {
    it('should cache the initialized configuration until reset', () => {
      writeFileSync(testConfigPath, yaml.dump(validConfig));

      const initialized = initializeConfig(testConfigPath, 'production');

      expect(getConfig()).toBe(initialized);
      resetConfig();
      expect(getConfig()).not.toBe(initialized);
    });
  });

  describe('getPolicyDefaults', () => {
    it('should convert snake_case keys', () => {
      expect(
        getPolicyDefaults({
          ...validConfig,
          policy_defaults: { parallelism: 4, max_allowed_flakes: 2, timeout_ms: 60000, count: 3 },
        })
      ).toEqual({ parallelism: 4, maxAllowedFlakes: 2, timeoutMs: 60000, count: 3 });
    });
  });

  describe('getAllowListPaths', () => {
    it('should resolve relative paths against the root and keep absolute ones', () => {
      const config: Config = {
        ...validConfig,
        allow_lists: { minimal: 'lists/minimal.txt', cni: '/etc/suite-planner/cni.txt' },
      };

      expect(getAllowListPaths(config, '/opt/planner')).toEqual({
        minimal: '/opt/planner/lists/minimal.txt',
        cni: '/etc/suite-planner/cni.txt',
      });
    });
  });
});
