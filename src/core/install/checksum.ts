/**
 * Artifact checksums
 * Declared as `<algorithm>:<hex>`; a bare hex digest is taken as sha256.
 */

import { md5, sha1, sha256, sha512 } from 'hash-wasm';
import { ValidationError } from '../../utils/errors.js';
import { assertNever } from '../../utils/assert-never.js';

export const CHECKSUM_ALGORITHMS = ['sha256', 'sha512', 'sha1', 'md5'] as const;
export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];

export interface ParsedChecksum {
  algorithm: ChecksumAlgorithm;
  digest: string;
}

const DIGEST_LENGTHS: Record<ChecksumAlgorithm, number> = {
  sha256: 64,
  sha512: 128,
  sha1: 40,
  md5: 32
};

function isChecksumAlgorithm(value: string): value is ChecksumAlgorithm {
  return CHECKSUM_ALGORITHMS.some(algorithm => algorithm === value);
}

/**
 * Parse and validate a declared checksum.
 */
export function parseChecksum(declared: string): ParsedChecksum {
  const trimmed = declared.trim();
  const separator = trimmed.indexOf(':');
  const algorithm = separator === -1 ? 'sha256' : trimmed.slice(0, separator).toLowerCase();
  const digest = (separator === -1 ? trimmed : trimmed.slice(separator + 1)).toLowerCase();

  if (!isChecksumAlgorithm(algorithm)) {
    throw new ValidationError(
      `Unsupported checksum algorithm '${algorithm}'. Expected one of: ${CHECKSUM_ALGORITHMS.join(', ')}`
    );
  }
  if (!/^[0-9a-f]+$/.test(digest) || digest.length !== DIGEST_LENGTHS[algorithm]) {
    throw new ValidationError(`Malformed ${algorithm} checksum '${declared}'`);
  }
  return { algorithm, digest };
}

export async function computeDigest(content: Uint8Array, algorithm: ChecksumAlgorithm): Promise<string> {
  switch (algorithm) {
    case 'sha256':
      return sha256(content);
    case 'sha512':
      return sha512(content);
    case 'sha1':
      return sha1(content);
    case 'md5':
      return md5(content);
    default:
      return assertNever(algorithm);
  }
}

/**
 * Compare content against a declared checksum.
 * Returns the computed digest so callers can report it on mismatch.
 */
export async function verifyChecksum(
  content: Uint8Array,
  declared: string
): Promise<{ matches: boolean; expected: string; actual: string }> {
  const { algorithm, digest } = parseChecksum(declared);
  const actual = await computeDigest(content, algorithm);
  return { matches: actual === digest, expected: `${algorithm}:${digest}`, actual: `${algorithm}:${actual}` };
}
