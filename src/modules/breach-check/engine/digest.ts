import { createHash } from 'crypto';
import { InvalidDigestFormatError } from '../../../common/errors/breach.errors';
import { Digest } from '../types/breach.types';

export const DIGEST_LENGTH = 40;

const DIGEST_PATTERN = /^[0-9a-f]{40}$/;

export function digestOf(plaintext: string): Digest {
  return createHash('sha1').update(plaintext, 'utf8').digest('hex');
}

export function isDigest(input: string): boolean {
  return DIGEST_PATTERN.test(input);
}

/**
 * Trims and lower-cases a client-supplied digest, rejecting anything that is
 * not exactly 40 hexadecimal characters.
 */
export function normalizeDigest(input: string): Digest {
  const candidate = input.trim().toLowerCase();
  if (!candidate || candidate.length !== DIGEST_LENGTH) {
    throw new InvalidDigestFormatError();
  }
  if (!isDigest(candidate)) {
    throw new InvalidDigestFormatError(
      'Invalid SHA-1 hash provided: expected hexadecimal characters only.',
    );
  }
  return candidate;
}
