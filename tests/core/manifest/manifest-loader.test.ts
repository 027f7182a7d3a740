import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { findManifest, loadManifest, parseManifest, validateManifest } from '../../../src/core/manifest/manifest-loader.js';
import { ValidationError } from '../../../src/utils/errors.js';

const VALID = `
version: "1.0"
name: demo-app
description: Tools the demo needs
dependencies:
  - name: jq
    description: JSON processor
    version:
      required: 1.7.1
      constraint: ">=1.6.0"
    platforms:
      linux:
        installer:
          type: package
        commands:
          install: [apt-get, install, -y, jq]
          verify: [jq, --version]
          uninstall: [apt-get, remove, -y, jq]
        version_pattern: "jq-(\\\\d+\\\\.\\\\d+\\\\.\\\\d+)"
      darwin:
        installer:
          type: package
        commands:
          install: [brew, install, jq]
          verify: [jq, --version]
  - name: sdk
    version:
      required: 2.0.0
    dependencies: [jq]
    environment:
      path: ["{install_dir}/bin"]
      variables:
        SDK_HOME: "{install_dir}"
    platforms:
      linux:
        installer:
          type: archive
          url: https://example.test/sdk-2.0.0.tar.gz
          checksum: sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824
        install_dir: ~/.local/sdk
        commands:
          install: [tar, -xzf, "{download_path}", -C, "{install_dir}"]
          verify: ["{install_dir}/bin/sdk", --version]
`;

/** One-dependency document with a replaceable linux platform block */
function withLinux(platform: Record<string, unknown>, version: Record<string, unknown> = { required: '1.7.1' }) {
  return {
    version: '1',
    name: 'demo-app',
    dependencies: [{ name: 'jq', version, platforms: { linux: platform } }]
  };
}

const PACKAGE_PLATFORM = {
  installer: { type: 'package' },
  commands: { install: ['apt-get', 'install', 'jq'], verify: ['jq', '--version'] }
};

describe('parseManifest', () => {
  it('builds a typed manifest from YAML', () => {
    const manifest = parseManifest(VALID);

    assert.equal(manifest.version, '1.0');
    assert.equal(manifest.name, 'demo-app');
    assert.equal(manifest.description, 'Tools the demo needs');
    assert.deepEqual(
      manifest.dependencies.map(dependency => dependency.name),
      ['jq', 'sdk']
    );

    const [jq, sdk] = manifest.dependencies;
    assert.deepEqual(jq.version, { required: '1.7.1', constraint: '>=1.6.0' });
    assert.deepEqual(Object.keys(jq.platforms), ['linux', 'darwin']);
    assert.deepEqual(jq.platforms.linux?.commands.uninstall, ['apt-get', 'remove', '-y', 'jq']);
    assert.equal(jq.platforms.linux?.version_pattern, 'jq-(\\d+\\.\\d+\\.\\d+)');
    assert.equal(jq.platforms.darwin?.commands.uninstall, undefined);

    assert.deepEqual(sdk.dependencies, ['jq']);
    assert.deepEqual(sdk.environment, { path: ['{install_dir}/bin'], variables: { SDK_HOME: '{install_dir}' } });
    assert.deepEqual(sdk.platforms.linux?.installer, {
      type: 'archive',
      url: 'https://example.test/sdk-2.0.0.tar.gz',
      checksum: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    });
    assert.equal(sdk.platforms.linux?.install_dir, '~/.local/sdk');
  });

  it('accepts a numeric format version', () => {
    const manifest = parseManifest('version: 2\nname: demo-app\n');
    assert.equal(manifest.version, '2');
    assert.deepEqual(manifest.dependencies, []);
  });

  it('reports YAML syntax errors as validation errors', () => {
    assert.throws(() => parseManifest('name: [unclosed', 'broken.yml'), (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.ok(error.message.startsWith('Validation error: Failed to parse broken.yml'));
      return true;
    });
  });
});

describe('validateManifest', () => {
  it('rejects a document that is not an object', () => {
    assert.throws(() => validateManifest(['jq']), { message: 'Validation error: manifest must be an object' });
  });

  it('rejects duplicate dependency names', () => {
    const document = withLinux(PACKAGE_PLATFORM);
    document.dependencies.push(document.dependencies[0]);
    assert.throws(() => validateManifest(document), {
      message: "Validation error: dependency 'jq' is declared more than once"
    });
  });

  it('rejects unknown platforms', () => {
    const document = {
      version: '1',
      name: 'demo-app',
      dependencies: [{ name: 'jq', version: { required: '1.7.1' }, platforms: { freebsd: PACKAGE_PLATFORM } }]
    };
    assert.throws(() => validateManifest(document), {
      message: "Validation error: dependency 'jq': unknown platform 'freebsd'"
    });
  });

  it('rejects unknown installer types', () => {
    const document = withLinux({ ...PACKAGE_PLATFORM, installer: { type: 'snap' } });
    assert.throws(() => validateManifest(document), {
      message: "Validation error: dependency 'jq' (linux): installer type 'snap' is not one of package, binary, archive, msi, pkg"
    });
  });

  it('requires a full semantic version', () => {
    assert.throws(() => validateManifest(withLinux(PACKAGE_PLATFORM, { required: '1.2' })), {
      message: "Validation error: dependency 'jq': required version '1.2' is not a valid semantic version"
    });
  });

  it('rejects a constraint that is not a range', () => {
    assert.throws(() => validateManifest(withLinux(PACKAGE_PLATFORM, { required: '1.7.1', constraint: 'banana' })), {
      message: "Validation error: dependency 'jq': version constraint 'banana' is not a valid range"
    });
  });

  it('rejects an empty install command', () => {
    const document = withLinux({ ...PACKAGE_PLATFORM, commands: { install: [], verify: ['jq', '--version'] } });
    assert.throws(() => validateManifest(document), {
      message: "Validation error: dependency 'jq' (linux): 'commands.install' must not be empty"
    });
  });

  it('rejects a malformed checksum', () => {
    const document = withLinux({
      ...PACKAGE_PLATFORM,
      installer: { type: 'binary', url: 'https://example.test/jq', checksum: 'sha256:abc' }
    });
    assert.throws(() => validateManifest(document), {
      message: "Validation error: Malformed sha256 checksum 'sha256:abc'"
    });
  });

  it('rejects a checksum without a url', () => {
    const document = withLinux({
      ...PACKAGE_PLATFORM,
      installer: { type: 'package', checksum: 'md5:5d41402abc4b2a76b9719d911017c592' }
    });
    assert.throws(() => validateManifest(document), {
      message: "Validation error: dependency 'jq' (linux): a checksum is declared without an installer url"
    });
  });

  it('rejects an invalid version pattern', () => {
    const document = withLinux({ ...PACKAGE_PLATFORM, version_pattern: '(' });
    assert.throws(() => validateManifest(document), {
      message: "Validation error: dependency 'jq' (linux): version_pattern '(' is not a valid regular expression"
    });
  });
});

describe('manifest files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hostdeps-manifest-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads JSON manifests', async () => {
    const path = join(dir, 'hostdeps.json');
    await writeFile(path, JSON.stringify(withLinux(PACKAGE_PLATFORM)));

    const manifest = await loadManifest(path);

    assert.equal(manifest.name, 'demo-app');
    assert.deepEqual(manifest.dependencies[0].platforms.linux?.commands.install, ['apt-get', 'install', 'jq']);
  });

  it('finds the first manifest name present', async () => {
    await writeFile(join(dir, 'hostdeps.json'), '{}');
    await writeFile(join(dir, 'hostdeps.yaml'), 'version: 1\nname: demo-app\n');

    assert.equal(await findManifest(dir), join(dir, 'hostdeps.yaml'));
  });

  it('returns null when no manifest exists', async () => {
    assert.equal(await findManifest(dir), null);
  });
});
