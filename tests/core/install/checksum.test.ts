import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { computeDigest, parseChecksum, verifyChecksum } from '../../../src/core/install/checksum.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { bytes } from '../../helpers/fakes.js';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

describe('parseChecksum', () => {
  it('reads algorithm-prefixed digests and lowercases them', () => {
    assert.deepEqual(parseChecksum(`SHA256:${HELLO_SHA256.toUpperCase()}`), {
      algorithm: 'sha256',
      digest: HELLO_SHA256
    });
  });

  it('takes a bare digest as sha256', () => {
    assert.deepEqual(parseChecksum(HELLO_SHA256), { algorithm: 'sha256', digest: HELLO_SHA256 });
  });

  it('rejects unknown algorithms and malformed digests', () => {
    assert.throws(() => parseChecksum(`sha384:${HELLO_SHA256}`), ValidationError);
    assert.throws(() => parseChecksum('sha256:xyz'), ValidationError);
    assert.throws(() => parseChecksum(`md5:${HELLO_SHA256}`), ValidationError);
  });
});

describe('computeDigest', () => {
  it('supports every declared algorithm', async () => {
    const content = bytes('hello');
    assert.equal(await computeDigest(content, 'sha256'), HELLO_SHA256);
    assert.equal(await computeDigest(content, 'sha1'), 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d');
    assert.equal(await computeDigest(content, 'md5'), '5d41402abc4b2a76b9719d911017c592');
  });
});

describe('verifyChecksum', () => {
  it('matches identical content', async () => {
    assert.deepEqual(await verifyChecksum(bytes('hello'), `sha256:${HELLO_SHA256}`), {
      matches: true,
      expected: `sha256:${HELLO_SHA256}`,
      actual: `sha256:${HELLO_SHA256}`
    });
  });

  it('reports the computed digest on mismatch', async () => {
    const result = await verifyChecksum(bytes('hello!'), HELLO_SHA256);
    assert.equal(result.matches, false);
    assert.equal(result.expected, `sha256:${HELLO_SHA256}`);
    assert.notEqual(result.actual, result.expected);
    assert.match(result.actual, /^sha256:[0-9a-f]{64}$/);
  });
});
