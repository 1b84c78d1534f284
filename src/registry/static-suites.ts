/**
 * Static suite declarations
 *
 * Every suite this planner knows. Each predicate is wrapped in
 * `enabledOnly`, so disabled and not-yet-due tests never reach any suite.
 */

import type { Logger } from 'pino';
import type { SuiteDefinition } from '../types/suites.js';
import type { AllowLists } from '../config/allow-lists.js';
import type { PreSuiteHooks } from '../lifecycle/hooks.js';
import { storageCapabilitiesPostSuite } from '../lifecycle/storage-capabilities.js';
import { TAGS, featureTag, sigTag, suiteTag } from '../tags/grammar.js';
import {
  allOf,
  allowList,
  always,
  anyOf,
  contains,
  enabledOnly,
  excluding,
  not,
  standardEarlyOrLateTest,
  standardEarlyTest,
} from '../predicates/predicate.js';
import { SuiteRegistry } from './suite-registry.js';

const MINUTE_MS = 60_000;

export interface StaticSuiteDependencies {
  hooks: PreSuiteHooks;
  allowLists: AllowLists;
  /** Environment read by hooks (CSI manifest list) */
  env?: NodeJS.ProcessEnv;
}

export function createStaticSuites(deps: StaticSuiteDependencies): SuiteDefinition[] {
  const { hooks, allowLists } = deps;

  return [
    {
      name: 'openshift/conformance',
      description: 'Tests that ensure an OpenShift cluster and components are working properly.',
      matcher: enabledOnly(contains(TAGS.CONFORMANCE_SUITE_PREFIX)),
      parallelism: 30,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/conformance/parallel',
      description: 'Only the portion of the openshift/conformance test suite that run in parallel.',
      matcher: enabledOnly(contains(TAGS.CONFORMANCE_PARALLEL_PREFIX)),
      parallelism: 30,
      maxAllowedFlakes: 15,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/conformance/serial',
      description: 'Only the portion of the openshift/conformance test suite that run serially.',
      matcher: enabledOnly(anyOf(contains(TAGS.CONFORMANCE_SERIAL_PREFIX), standardEarlyOrLateTest())),
      timeoutMs: 40 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/disruptive',
      description:
        'The disruptive test suite. Disruptive tests interrupt the cluster function such as by ' +
        'stopping/restarting the control plane or changing the global cluster configuration in a ' +
        'way that can affect other tests.',
      matcher: enabledOnly(
        excluding(
          anyOf(
            contains(featureTag('EtcdRecovery')),
            contains(featureTag('NodeRecovery')),
            standardEarlyTest()
          ),
          'Cluster should survive master and worker failure and recover with machine health checks',
          'excluded due to stopped instance handling until https://bugzilla.redhat.com/show_bug.cgi?id=1905709 is fixed'
        )
      ),
      // The quorum restore test alone takes longer than an hour
      timeoutMs: 90 * MINUTE_MS,
      invariantCheck: 'permissive',
      preSuite: hooks.withProvider,
    },
    {
      name: 'kubernetes/conformance',
      description: 'The default Kubernetes conformance suite.',
      matcher: enabledOnly(allOf(contains(TAGS.KUBE_SUITE), contains(TAGS.CONFORMANCE))),
      parallelism: 30,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/build',
      description: 'Tests that exercise the OpenShift build functionality.',
      matcher: enabledOnly(anyOf(contains(featureTag('Builds')), standardEarlyOrLateTest())),
      parallelism: 7,
      // Builds are flaky while worker IO is contended
      maxAllowedFlakes: 3,
      // Jenkins tests can take a really long time
      timeoutMs: 60 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/templates',
      description: 'Tests that exercise the OpenShift template functionality.',
      matcher: enabledOnly(anyOf(contains(featureTag('Templates')), standardEarlyOrLateTest())),
      parallelism: 1,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/image-registry',
      description: 'Tests that exercise the OpenShift image-registry functionality.',
      matcher: enabledOnly(
        allOf(
          not(contains(TAGS.LOCAL)),
          anyOf(contains(sigTag('imageregistry')), standardEarlyOrLateTest())
        )
      ),
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/image-ecosystem',
      description: 'Tests that exercise language and tooling images shipped as part of OpenShift.',
      matcher: enabledOnly(
        allOf(
          not(contains(TAGS.LOCAL)),
          anyOf(contains(featureTag('ImageEcosystem')), standardEarlyOrLateTest())
        )
      ),
      parallelism: 7,
      timeoutMs: 20 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/jenkins-e2e',
      description:
        'Tests that exercise the OpenShift / Jenkins integrations provided by the OpenShift ' +
        'Jenkins image/plugins and the Pipeline Build Strategy.',
      matcher: enabledOnly(anyOf(contains(featureTag('Jenkins')), standardEarlyOrLateTest())),
      parallelism: 4,
      timeoutMs: 20 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/jenkins-e2e-rhel-only',
      description:
        'Tests that exercise the OpenShift / Jenkins integrations provided by the OpenShift ' +
        'Jenkins image/plugins and the Pipeline Build Strategy, using RHEL images only.',
      matcher: enabledOnly(
        anyOf(contains(featureTag('JenkinsRHELImagesOnly')), standardEarlyOrLateTest())
      ),
      parallelism: 4,
      timeoutMs: 20 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/scalability',
      description:
        'Tests that verify the scalability characteristics of the cluster. Currently this is ' +
        'focused on core performance behaviors and preventing regressions.',
      matcher: enabledOnly(contains(suiteTag('openshift/scalability'))),
      parallelism: 1,
      timeoutMs: 20 * MINUTE_MS,
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/conformance-excluded',
      description:
        'Run only tests that are excluded from conformance. Makes identifying omitted tests easier.',
      matcher: enabledOnly(not(contains(TAGS.CONFORMANCE_SUITE_PREFIX))),
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/test-cmd',
      description: 'Run only tests for test-cmd.',
      matcher: enabledOnly(
        anyOf(contains(featureTag('LegacyCommandTests')), standardEarlyOrLateTest())
      ),
      invariantCheck: 'stable',
      preSuite: hooks.withNoProvider,
    },
    {
      name: 'openshift/csi',
      description:
        'Run tests for a CSI driver. Set the TEST_CSI_DRIVER_FILES environment variable to the ' +
        'name of the file with the CSI driver test manifest. The manifest specifies Kubernetes + ' +
        'CSI features to test with the driver.',
      matcher: enabledOnly(
        excluding(
          allOf(contains('External Storage [Driver:'), not(contains(TAGS.DISRUPTIVE))),
          'provisioning should provision storage with any volume data source',
          'these CSI tests are disabled since Pods created by these tests pull image directly: https://bugzilla.redhat.com/show_bug.cgi?id=2093339'
        )
      ),
      invariantCheck: 'stable',
      preSuite: hooks.withKubeTestInitialization,
      postSuite: storageCapabilitiesPostSuite(deps.env),
    },
    {
      name: 'openshift/network/stress',
      description:
        'This test suite repeatedly verifies the networking function of the cluster in parallel ' +
        'to find flakes.',
      matcher: enabledOnly(
        excluding(
          // Serial:Self tests cannot run in parallel with a copy of themselves
          allOf(
            not(contains(TAGS.SERIAL_SELF)),
            anyOf(
              allOf(contains(TAGS.CONFORMANCE_SUITE_PREFIX), contains(sigTag('network'))),
              standardEarlyOrLateTest()
            )
          ),
          featureTag('NetworkPolicy'),
          'Skip NetworkPolicy tests for https://bugzilla.redhat.com/show_bug.cgi?id=1980141'
        )
      ),
      parallelism: 60,
      count: 12,
      timeoutMs: 20 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/network/third-party',
      description: 'The conformance testing suite for certified third-party CNI plugins.',
      matcher: enabledOnly(allowList('cni', allowLists.cni, TAGS.KUBE_SUITE)),
      preSuite: hooks.withProvider,
    },
    {
      name: 'experimental/reliability/minimal',
      description: 'Set of highly reliable tests.',
      matcher: enabledOnly(
        allowList('minimal', allowLists.minimal, TAGS.CONFORMANCE_PARALLEL_PREFIX)
      ),
      parallelism: 20,
      maxAllowedFlakes: 15,
      invariantCheck: 'stable',
      preSuite: hooks.withKubeTestInitialization,
    },
    {
      name: 'all',
      description: 'Run all tests that are not disabled.',
      matcher: enabledOnly(always()),
      preSuite: hooks.withInitializedProvider,
    },
    {
      name: 'openshift/etcd/scaling',
      description:
        'This test suite runs vertical scaling tests to exercise the safe scale-up and ' +
        'scale-down of etcd members.',
      matcher: enabledOnly(
        anyOf(
          contains('[Suite:openshift/etcd/scaling'),
          contains(featureTag('EtcdVerticalScaling')),
          standardEarlyOrLateTest()
        )
      ),
      // apiserver rollouts take a while to settle on one revision
      timeoutMs: 60 * MINUTE_MS,
      invariantCheck: 'stable',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/etcd/recovery',
      description:
        'This test suite runs etcd recovery tests to exercise the safe restore process of etcd ' +
        'members.',
      matcher: enabledOnly(
        anyOf(
          contains('[Suite:openshift/etcd/recovery'),
          contains(featureTag('EtcdRecovery')),
          standardEarlyOrLateTest()
        )
      ),
      timeoutMs: 120 * MINUTE_MS,
      invariantCheck: 'permissive',
      preSuite: hooks.withProvider,
    },
    {
      name: 'openshift/nodes/realtime',
      description: 'This test suite runs tests to validate realtime functionality on nodes.',
      matcher: enabledOnly(contains('[Suite:openshift/nodes/realtime')),
      timeoutMs: 30 * MINUTE_MS,
      preSuite: hooks.withProvider,
    },
  ];
}

/**
 * Build the registry of every static suite.
 */
export function createSuiteRegistry(deps: StaticSuiteDependencies, logger?: Logger): SuiteRegistry {
  return new SuiteRegistry(createStaticSuites(deps), logger);
}
