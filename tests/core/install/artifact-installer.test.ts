import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { basename, join } from 'path';
import { tmpdir } from 'os';
import { ArtifactInstaller, artifactFileName } from '../../../src/core/install/artifact-installer.js';
import { fetchWithRetry } from '../../../src/core/install/artifact-fetcher.js';
import { CommandExecutor } from '../../../src/core/install/command-executor.js';
import { RecordingEnvironmentApplier } from '../../../src/core/install/environment-applier.js';
import {
  ChecksumMismatchError,
  DownloadFailedError,
  TemplateError,
  TimeoutError,
  ValidationError,
  VerificationFailedError
} from '../../../src/utils/errors.js';
import type { Dependency } from '../../../src/types/index.js';
import { FakeArtifactFetcher, FakeCommandRunner, bytes, testSettings, type CommandScript } from '../../helpers/fakes.js';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const TOOL_URL = 'https://example.test/downloads/tool-linux-amd64';

let root: string;
let downloadsDir: string;
let installRoot: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'hostdeps-installer-test-'));
  downloadsDir = join(root, 'downloads');
  installRoot = join(root, 'tools');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function setup(script: CommandScript, fetcher = new FakeArtifactFetcher()) {
  const runner = new FakeCommandRunner(script);
  const applier = new RecordingEnvironmentApplier({ PATH: '/usr/bin' }, ':');
  const sleeps: number[] = [];
  const installer = new ArtifactInstaller({
    executor: new CommandExecutor(runner),
    fetcher,
    applier,
    settings: testSettings(installRoot),
    downloadsDir,
    hostPlatform: 'linux',
    sleep: async ms => {
      sleeps.push(ms);
    }
  });
  return { runner, applier, fetcher, installer, sleeps };
}

const jq: Dependency = {
  name: 'jq',
  version: { required: '1.7.1' },
  platforms: {
    linux: {
      installer: { type: 'package' },
      commands: { install: ['apt-get', 'install', '-y', 'jq'], verify: ['jq', '--version'] }
    }
  }
};

function binaryTool(checksum: string | undefined): Dependency {
  return {
    name: 'tool',
    version: { required: '2.0.0' },
    platforms: {
      linux: {
        installer: checksum ? { type: 'binary', url: TOOL_URL, checksum } : { type: 'binary', url: TOOL_URL },
        commands: {
          install: ['install', '-m', '755', '{download_path}', '{install_dir}/tool'],
          verify: ['{install_dir}/tool', '--version']
        }
      }
    },
    environment: { path: ['{install_dir}'], variables: { TOOL_HOME: '{install_dir}' } }
  };
}

function linuxConfig(dependency: Dependency) {
  const config = dependency.platforms.linux;
  assert.ok(config);
  return config;
}

describe('ArtifactInstaller.install', () => {
  it('runs install then verify for a package-manager dependency', async () => {
    const { runner, fetcher, installer } = setup(argv => (argv[0] === 'jq' ? { output: 'jq-1.7.1' } : {}));

    const outcome = await installer.install(jq, linuxConfig(jq));

    assert.equal(outcome.verifyOutput, 'jq-1.7.1');
    assert.equal(outcome.installDir, join(installRoot, 'jq'));
    assert.deepEqual(runner.commands(), ['apt-get install -y jq', 'jq --version']);
    assert.equal(fetcher.calls.length, 0);
  });

  it('downloads, verifies and prepares a binary before installing it', async () => {
    let downloadPath = '';
    let executable = false;
    let content = '';
    const fetcher = new FakeArtifactFetcher().serve(TOOL_URL, bytes('hello'));
    const tool = binaryTool(`sha256:${HELLO_SHA256}`);
    const { runner, applier, installer } = setup(argv => {
      if (argv[0] === 'install') {
        downloadPath = argv[3];
        content = readFileSync(downloadPath, 'utf8');
        executable = (statSync(downloadPath).mode & 0o111) !== 0;
        return {};
      }
      return { output: 'tool 2.0.0' };
    }, fetcher);

    const outcome = await installer.install(tool, linuxConfig(tool));
    const installDir = join(installRoot, 'tool');

    assert.equal(basename(downloadPath), 'tool-linux-amd64');
    assert.equal(content, 'hello');
    assert.equal(executable, true);
    assert.deepEqual(runner.calls[1].argv, [`${installDir}/tool`, '--version']);
    assert.equal(outcome.verifyOutput, 'tool 2.0.0');
    assert.equal(existsSync(installDir), true);
    assert.equal(existsSync(downloadPath), false);
    assert.deepEqual(outcome.environment, { path: [installDir], variables: { TOOL_HOME: installDir } });
    assert.equal(applier.applied.length, 0);
  });

  it('applies the environment only when asked to', async () => {
    const { applier, installer } = setup(() => ({}));

    await installer.applyEnvironment({ path: [], variables: {} });
    assert.equal(applier.applied.length, 0);

    await installer.applyEnvironment({ path: ['/opt/tool/bin'], variables: { TOOL_HOME: '/opt/tool' } });
    assert.deepEqual(applier.applied, [{ path: ['/opt/tool/bin'], variables: { TOOL_HOME: '/opt/tool' } }]);
    assert.equal(applier.current().TOOL_HOME, '/opt/tool');
  });

  it('runs nothing when the checksum does not match', async () => {
    const fetcher = new FakeArtifactFetcher().serve(TOOL_URL, bytes('hello!'));
    const tool = binaryTool(HELLO_SHA256);
    const { runner, applier, installer } = setup(() => ({}), fetcher);

    await assert.rejects(
      installer.install(tool, linuxConfig(tool)),
      (error: unknown) => error instanceof ChecksumMismatchError && error.details?.expected === `sha256:${HELLO_SHA256}`
    );
    assert.equal(runner.calls.length, 0);
    assert.equal(applier.applied.length, 0);
    assert.deepEqual(readdirSync(downloadsDir), []);
  });

  it('reports a failing verify command as VerificationFailed and skips the environment', async () => {
    const { applier, installer } = setup(argv => (argv[0] === 'jq' ? { exitCode: 1, output: 'jq: not found' } : {}));

    await assert.rejects(
      installer.install(jq, linuxConfig(jq)),
      (error: unknown) =>
        error instanceof VerificationFailedError && error.exitCode === 1 && error.output === 'jq: not found'
    );
    assert.equal(applier.applied.length, 0);
  });

  it('rejects {download_path} when there is nothing to download, before fetching or spawning', async () => {
    const broken: Dependency = {
      ...jq,
      platforms: {
        linux: {
          installer: { type: 'package' },
          commands: { install: ['dpkg', '-i', '{download_path}'], verify: ['jq', '--version'] }
        }
      }
    };
    const { runner, fetcher, installer } = setup(() => ({}));

    await assert.rejects(installer.install(broken, linuxConfig(broken)), TemplateError);
    assert.equal(runner.calls.length, 0);
    assert.equal(fetcher.calls.length, 0);
  });

  it('retries a transient download failure', async () => {
    const fetcher = new FakeArtifactFetcher().serve(
      TOOL_URL,
      new DownloadFailedError(TOOL_URL, 'HTTP 503 Service Unavailable', true),
      bytes('hello')
    );
    const tool = binaryTool(HELLO_SHA256);
    const { installer, sleeps } = setup(() => ({ output: 'tool 2.0.0' }), fetcher);

    await installer.install(tool, linuxConfig(tool));

    assert.equal(fetcher.calls.length, 2);
    assert.deepEqual(sleeps, [10]);
  });

  it('does not retry a permanent download failure', async () => {
    const notFound = new DownloadFailedError(TOOL_URL, 'HTTP 404 Not Found', false);
    const fetcher = new FakeArtifactFetcher().serve(TOOL_URL, notFound);
    const tool = binaryTool(undefined);
    const { runner, installer } = setup(() => ({}), fetcher);

    await assert.rejects(installer.install(tool, linuxConfig(tool)), (error: unknown) => error === notFound);
    assert.equal(fetcher.calls.length, 1);
    assert.equal(runner.calls.length, 0);
  });
});

describe('ArtifactInstaller.uninstall', () => {
  const product: Dependency = {
    name: 'runtime',
    version: { required: '8.0.1' },
    platforms: {
      windows: {
        installer: { type: 'msi', url: 'https://example.test/runtime.msi' },
        product_id: 'PRODUCT-1234',
        commands: {
          install: ['msiexec', '/i', '{download_path}', '/qn'],
          verify: ['runtime', '--version'],
          uninstall: ['msiexec', '/x', '{product_id}', '/qn']
        }
      }
    }
  };

  it('runs the rendered uninstall command', async () => {
    const { runner, installer } = setup(() => ({}));
    const config = product.platforms.windows;
    assert.ok(config);

    await installer.uninstall(product, config);

    assert.deepEqual(runner.calls.map(call => call.argv), [['msiexec', '/x', 'PRODUCT-1234', '/qn']]);
  });

  it('requires an uninstall command', async () => {
    const { installer } = setup(() => ({}));
    await assert.rejects(installer.uninstall(jq, linuxConfig(jq)), ValidationError);
  });
});

describe('artifactFileName', () => {
  it('uses the last URL path segment', () => {
    assert.equal(artifactFileName('https://example.test/a/b/tool%20setup.exe?x=1', 'tool', 'binary'), 'tool setup.exe');
  });

  it('falls back to the dependency name', () => {
    assert.equal(artifactFileName('https://example.test/', 'runtime', 'msi'), 'runtime.msi');
    assert.equal(artifactFileName('https://example.test/', 'tool', 'archive'), 'tool');
  });
});

describe('fetchWithRetry', () => {
  it('backs off exponentially and gives up after the configured retries', async () => {
    const fetcher = new FakeArtifactFetcher().serve(TOOL_URL, new TimeoutError(`Download of ${TOOL_URL}`, 5));
    const sleeps: number[] = [];

    await assert.rejects(
      fetchWithRetry(fetcher, TOOL_URL, { timeoutMs: 5 }, { retries: 2, backoffMs: 100 }, async ms => {
        sleeps.push(ms);
      }),
      TimeoutError
    );
    assert.equal(fetcher.calls.length, 3);
    assert.deepEqual(sleeps, [100, 200]);
  });

  it('caps the number of retries', async () => {
    const fetcher = new FakeArtifactFetcher().serve(TOOL_URL, new DownloadFailedError(TOOL_URL, 'reset', true));

    await assert.rejects(
      fetchWithRetry(fetcher, TOOL_URL, { timeoutMs: 5 }, { retries: 50, backoffMs: 0 }, async () => {}),
      DownloadFailedError
    );
    assert.equal(fetcher.calls.length, 11);
  });
});
