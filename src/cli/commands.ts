/**
 * suite-plan commands
 *
 * Usage:
 *   suite-plan list [--json]                         # List known suites
 *   suite-plan plan <suite> --tests <file> [options] # Resolve a suite plan
 */

import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { OutputSink, RunOptions, TestName } from '../types/suites.js';
import type { ProviderDecoder } from '../provider/types.js';
import type { ExecutionPlan } from '../types/execution.js';
import { SuiteError, toSuiteError } from '../api/errors.js';
import { getAllowListPaths, getPolicyDefaults, loadConfig, type Config } from '../config/loader.js';
import { loadAllowLists } from '../config/allow-lists.js';
import { createPreSuiteHooks } from '../lifecycle/hooks.js';
import { SuiteRun } from '../lifecycle/suite-run.js';
import { ClusterProviderDecoder } from '../provider/cluster-provider.js';
import { createSuiteRegistry } from '../registry/static-suites.js';
import type { SuiteRegistry } from '../registry/suite-registry.js';
import { createLogger } from '../utils/logger.js';
import { PROVIDER } from '../config/defaults.js';

export interface CLIArgs {
  _: string[];
  tests?: string;
  provider?: string;
  config?: string;
  dryRun: boolean;
  json: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Set(['tests', 'provider', 'config']);

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [], dryRun: false, json: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const key = arg.slice(2);
    if (VALUE_FLAGS.has(key)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new SuiteError('ValidationError', `Option --${key} requires a value`);
      }
      i++;
      if (key === 'tests') result.tests = value;
      else if (key === 'provider') result.provider = value;
      else result.config = value;
    } else if (key === 'dry-run') {
      result.dryRun = true;
    } else if (key === 'json') {
      result.json = true;
    } else if (key === 'help') {
      result.help = true;
    } else {
      throw new SuiteError('ValidationError', `Unknown option --${key}`);
    }
  }

  return result;
}

export const HELP_TEXT = `
suite-plan - Resolve which tests a suite runs and under what policy

USAGE:
  suite-plan list [--json]
  suite-plan plan <suite> --tests <file> [options]

COMMANDS:
  list                    List every known suite
  plan <suite>            Run the suite's PreSuite hook and print its plan

OPTIONS:
  --tests <file>          Newline separated list of test names
  --provider <id>         Provider type or JSON (default: none)
  --dry-run               Resolve the provider without contacting a cluster
  --config <path>         Alternative runtime.yaml
  --json                  Output as JSON
  --help                  Show this help message

ENVIRONMENT VARIABLES:
  SUITE_PLANNER_LOG_LEVEL Log level (trace|debug|info|warn|error|fatal|silent)
  TEST_CSI_DRIVER_FILES   CSI driver manifests for the openshift/csi suite
`;

export interface CliContext {
  stdout: OutputSink;
  stderr: OutputSink;
  env?: NodeJS.ProcessEnv;
  /** Overrides for tests */
  config?: Config;
  decoder?: ProviderDecoder;
  logger?: Logger;
}

export function readTestUniverse(path: string): TestName[] {
  // Names match exactly, so surrounding spaces are kept
  return readFileSync(path, 'utf8')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
}

export function formatSuiteList(registry: SuiteRegistry): string {
  const width = Math.max(...registry.names().map((name) => name.length));
  return registry
    .all()
    .map((suite) => `${suite.name.padEnd(width)}  ${suite.description}`)
    .join('\n');
}

export function formatPlan(plan: ExecutionPlan, provider: string): string {
  const { policy } = plan;
  const lines = [
    `Suite: ${plan.suiteName}`,
    `Provider: ${provider}`,
    `Parallelism: ${policy.parallelism}`,
    `Max allowed flakes: ${policy.maxAllowedFlakes}`,
    `Timeout: ${policy.timeoutMs / 60_000}m`,
    `Count: ${policy.count}`,
    `Invariant check: ${policy.invariantCheck}`,
    `Tests (${plan.tests.length}):`,
    ...plan.tests.map((name) => `  ${name}`),
  ];
  return lines.join('\n');
}

/**
 * Run one CLI invocation.
 *
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  const { stdout, stderr } = context;

  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    stderr.write(`Error: ${toSuiteError(error, 'ValidationError').message}\n`);
    return 1;
  }

  const command = args._[0];
  if (args.help || !command) {
    (args.help ? stdout : stderr).write(HELP_TEXT);
    return args.help ? 0 : 1;
  }

  try {
    const config = context.config ?? loadConfig(args.config);
    const logger = context.logger ?? createLogger('cli', config.logging.level, stderr);
    const decoder = context.decoder ?? new ClusterProviderDecoder({ logger });
    const registry = createSuiteRegistry(
      {
        hooks: createPreSuiteHooks(decoder),
        allowLists: loadAllowLists(getAllowListPaths(config), logger),
        env: context.env,
      },
      logger
    );

    if (command === 'list') {
      if (args.json) {
        const suites = registry.all().map((suite) => ({
          name: suite.name,
          description: suite.description,
          matcher: suite.matcher.describe(),
        }));
        stdout.write(`${JSON.stringify(suites, null, 2)}\n`);
      } else {
        stdout.write(`${formatSuiteList(registry)}\n`);
      }
      return 0;
    }

    if (command === 'plan') {
      const suiteName = args._[1];
      if (!suiteName || !args.tests) {
        throw new SuiteError('ValidationError', 'plan requires a suite name and --tests <file>');
      }

      const suite = registry.get(suiteName);
      const options: RunOptions = {
        provider: args.provider ?? PROVIDER.NONE,
        dryRun: args.dryRun,
        out: stdout,
      };
      const run = new SuiteRun({
        suite,
        options,
        policyDefaults: getPolicyDefaults(config),
        evaluatedAt: new Date(),
        logger,
      });
      const plan = await run.plan(readTestUniverse(args.tests));

      if (args.json) {
        stdout.write(
          `${JSON.stringify({ suite: plan.suiteName, provider: options.provider, policy: plan.policy, tests: plan.tests }, null, 2)}\n`
        );
      } else {
        stdout.write(`${formatPlan(plan, options.provider)}\n`);
      }
      return 0;
    }

    throw new SuiteError('ValidationError', `Unknown command: ${command}`);
  } catch (error) {
    const err = toSuiteError(error, 'ConfigError');
    stderr.write(`Error: ${err.message}\n`);
    stderr.write(`   Code: ${err.code}\n`);
    return 1;
  }
}
