import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  driverManifestFiles,
  formatDriverCapabilities,
  printStorageCapabilities,
  readDriverCapabilities,
  storageCapabilitiesPostSuite,
} from '../../../src/lifecycle/storage-capabilities.js';
import { createSink } from '../helpers.js';

describe('storage capabilities', () => {
  const dirs: string[] = [];

  const manifest = (contents: string): string => {
    const dir = mkdtempSync(join(tmpdir(), 'suite-planner-csi-'));
    dirs.push(dir);
    const path = join(dir, 'manifest.yaml');
    writeFileSync(path, contents);
    return path;
  };

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  const EXAMPLE = [
    'ShortName: example',
    'StorageClass:',
    '  FromFile: storageclass.yaml',
    'DriverInfo:',
    '  Name: csi.example.com',
    '  Capabilities:',
    '    snapshotDataSource: true',
    '    block: false',
    '    persistence: true',
    '',
  ].join('\n');

  it('reads the driver name and capabilities', () => {
    const file = manifest(EXAMPLE);

    expect(readDriverCapabilities(file)).toEqual({
      driver: 'csi.example.com',
      file,
      capabilities: { snapshotDataSource: true, block: false, persistence: true },
    });
  });

  it('treats missing capabilities as none declared', () => {
    const file = manifest('DriverInfo:\n  Name: csi.bare.com\n');

    expect(formatDriverCapabilities(readDriverCapabilities(file))).toBe(
      `Storage capabilities of CSI driver csi.bare.com (${file}):\n  (none declared)\n`
    );
  });

  it('rejects a manifest without a driver name', () => {
    const file = manifest('DriverInfo:\n  Name: ""\n');

    expect(() => readDriverCapabilities(file)).toThrow(
      "Validation error on field 'DriverInfo.Name': Cannot be empty"
    );
  });

  it('reports an unreadable manifest as a configuration error', () => {
    const missing = join(tmpdir(), 'suite-planner-missing', 'manifest.yaml');

    expect(() => readDriverCapabilities(missing)).toThrow(
      `Failed to read CSI driver manifest ${missing}`
    );
  });

  it('lists capabilities alphabetically', () => {
    expect(
      formatDriverCapabilities({
        driver: 'csi.example.com',
        file: 'm.yaml',
        capabilities: { snapshotDataSource: true, block: false, persistence: true },
      })
    ).toBe(
      'Storage capabilities of CSI driver csi.example.com (m.yaml):\n' +
        '  block: no\n' +
        '  persistence: yes\n' +
        '  snapshotDataSource: yes\n'
    );
  });

  it('splits the manifest list on commas', () => {
    expect(driverManifestFiles(' a.yaml, b.yaml ,,')).toEqual(['a.yaml', 'b.yaml']);
    expect(driverManifestFiles(undefined)).toEqual([]);
    expect(driverManifestFiles('')).toEqual([]);
  });

  it('prints one block per manifest', () => {
    const first = manifest('DriverInfo:\n  Name: one.csi\n  Capabilities:\n    block: true\n');
    const second = manifest('DriverInfo:\n  Name: two.csi\n');
    const out = createSink();

    printStorageCapabilities(out, [first, second]);

    expect(out.text()).toBe(
      `Storage capabilities of CSI driver one.csi (${first}):\n  block: yes\n` +
        `Storage capabilities of CSI driver two.csi (${second}):\n  (none declared)\n`
    );
  });

  describe('storageCapabilitiesPostSuite', () => {
    it('prints the manifests named in the environment', async () => {
      const file = manifest('DriverInfo:\n  Name: env.csi\n  Capabilities:\n    exec: false\n');
      const out = createSink();
      const hook = storageCapabilitiesPostSuite({ TEST_CSI_DRIVER_FILES: file });

      await hook({ provider: 'none', dryRun: true, out });

      expect(out.text()).toBe(`Storage capabilities of CSI driver env.csi (${file}):\n  exec: no\n`);
    });

    it('prints nothing when no manifests are configured', async () => {
      const out = createSink();

      await storageCapabilitiesPostSuite({})({ provider: 'none', dryRun: true, out });

      expect(out.text()).toBe('');
    });
  });
});
