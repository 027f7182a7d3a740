import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SemVer } from 'semver';
import { classifyUpdate, classifyVersion, extractInstalledVersion } from '../../../src/core/version/version-resolver.js';
import { ErrorCodes, UpdateKind } from '../../../src/types/index.js';
import { InvalidVersionFormatError } from '../../../src/utils/errors.js';

describe('classifyVersion', () => {
  it('reports an absent version as not installed', () => {
    for (const current of [null, undefined, '', '   ']) {
      assert.deepEqual(classifyVersion(current, '1.2.3'), {
        compatible: false,
        update: UpdateKind.NotInstalled,
        current: '',
        error: null
      });
    }
  });

  it('requires an exact match when no constraint is given', () => {
    assert.deepEqual(classifyVersion('1.2.3', '1.2.3'), {
      compatible: true,
      update: UpdateKind.NoUpdate,
      current: '1.2.3',
      error: null
    });

    const newer = classifyVersion('1.2.4', '1.2.3');
    assert.equal(newer.compatible, false);
    assert.equal(newer.update, UpdateKind.PatchUpdate);
  });

  it('accepts versions inside a caret range', () => {
    const result = classifyVersion('1.3.0', '1.2.3', '^1.2.0');
    assert.equal(result.compatible, true);
    assert.equal(result.update, UpdateKind.MinorUpdate);
  });

  it('rejects a different major under a caret range', () => {
    const result = classifyVersion('2.0.0', '1.2.3', '^1.2.0');
    assert.equal(result.compatible, false);
    assert.equal(result.update, UpdateKind.MajorUpdate);
  });

  it('applies tilde ranges to the patch level only', () => {
    const patch = classifyVersion('1.2.9', '1.2.3', '~1.2.3');
    assert.equal(patch.compatible, true);
    assert.equal(patch.update, UpdateKind.PatchUpdate);

    const minor = classifyVersion('1.3.0', '1.2.3', '~1.2.3');
    assert.equal(minor.compatible, false);
    assert.equal(minor.update, UpdateKind.MinorUpdate);
  });

  it('strips a leading v', () => {
    const result = classifyVersion('v1.2.3', '1.2.3');
    assert.equal(result.compatible, true);
    assert.equal(result.current, '1.2.3');
  });

  it('ignores pre-release and build metadata of a stable requirement', () => {
    const prerelease = classifyVersion('1.2.3-beta.1', '1.2.3');
    assert.equal(prerelease.compatible, true);
    assert.equal(prerelease.update, UpdateKind.NoUpdate);
    assert.equal(prerelease.current, '1.2.3-beta.1');

    const build = classifyVersion('1.2.3+build.5', '1.2.3');
    assert.equal(build.compatible, true);
    assert.equal(build.current, '1.2.3');
  });

  it('compares pre-releases when the requirement is one', () => {
    const exact = classifyVersion('2.0.0-rc.1', '2.0.0-rc.2');
    assert.equal(exact.compatible, false);
    assert.equal(exact.update, UpdateKind.PatchUpdate);

    const ranged = classifyVersion('2.0.0-rc.2', '2.0.0-rc.1', '^2.0.0-rc.1');
    assert.equal(ranged.compatible, true);
    assert.equal(ranged.update, UpdateKind.PatchUpdate);
  });

  it('treats an unparseable installed version as a broken install', () => {
    const result = classifyVersion('not-a-version', '1.2.3');
    assert.equal(result.compatible, false);
    assert.equal(result.update, UpdateKind.MajorUpdate);
    assert.equal(result.current, '');
    assert.ok(result.error instanceof InvalidVersionFormatError);
    assert.equal(result.error.code, ErrorCodes.INVALID_VERSION_FORMAT);
    assert.equal(result.error.message, "Invalid version format: 'not-a-version'");
  });

  it('reports an invalid required version the same way', () => {
    const result = classifyVersion('1.2.3', '1.x');
    assert.equal(result.compatible, false);
    assert.equal(result.update, UpdateKind.MajorUpdate);
    assert.ok(result.error instanceof InvalidVersionFormatError);
  });
});

describe('classifyUpdate', () => {
  it('lets the most significant differing component decide', () => {
    assert.equal(classifyUpdate(new SemVer('1.2.3'), new SemVer('2.0.0')), UpdateKind.MajorUpdate);
    assert.equal(classifyUpdate(new SemVer('1.2.3'), new SemVer('1.4.0')), UpdateKind.MinorUpdate);
    assert.equal(classifyUpdate(new SemVer('1.2.3'), new SemVer('1.2.0')), UpdateKind.PatchUpdate);
    assert.equal(classifyUpdate(new SemVer('1.2.3'), new SemVer('1.2.3')), UpdateKind.NoUpdate);
  });
});

describe('extractInstalledVersion', () => {
  it('finds the first x.y.z token', () => {
    assert.equal(extractInstalledVersion('git version 2.43.0\n'), '2.43.0');
    assert.equal(extractInstalledVersion('node v20.11.1'), '20.11.1');
    assert.equal(extractInstalledVersion('tool 1.2.3-rc.1+b7 (x64)'), '1.2.3-rc.1+b7');
  });

  it('returns null without a full version', () => {
    assert.equal(extractInstalledVersion('Python 3.12'), null);
    assert.equal(extractInstalledVersion(''), null);
  });

  it('uses the first capture group of a custom pattern', () => {
    assert.equal(extractInstalledVersion('jq-1.7.1', 'jq-(\\d+\\.\\d+\\.\\d+)'), '1.7.1');
    assert.equal(extractInstalledVersion('version: 3.4.5', '\\d+\\.\\d+\\.\\d+'), '3.4.5');
    assert.equal(extractInstalledVersion('nothing here', 'v(\\d+)'), null);
  });
});
