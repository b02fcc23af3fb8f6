/**
 * HOTP Engine
 * HMAC-based one-time passwords with RFC 4226 dynamic truncation
 */

import crypto from 'crypto';
import { HashAlgorithm, TotpError } from '../types';
import { Result, ok, err } from '../types/result';
import { invalidParameter } from '../utils/errors';

const MAX_COUNTER = 0xffffffffffffffffn;

/**
 * Node digest name for each supported algorithm
 */
export function digestName(algorithm: HashAlgorithm): 'sha1' | 'sha256' | 'sha512' {
  switch (algorithm) {
    case HashAlgorithm.SHA1:
      return 'sha1';
    case HashAlgorithm.SHA256:
      return 'sha256';
    case HashAlgorithm.SHA512:
      return 'sha512';
    default: {
      const unreachable: never = algorithm;
      throw new Error(`Unhandled hash algorithm: ${String(unreachable)}`);
    }
  }
}

export function isCounterInRange(counter: bigint): boolean {
  return counter >= 0n && counter <= MAX_COUNTER;
}

/**
 * Encode a counter as an 8-byte big-endian unsigned integer
 */
export function encodeCounter(counter: bigint): Result<Buffer, TotpError> {
  if (!isCounterInRange(counter)) {
    return err(invalidParameter('counter', `Counter ${counter} is outside the unsigned 64-bit range`));
  }

  const counterBuffer = Buffer.alloc(8);
  counterBuffer.writeBigUInt64BE(counter, 0);
  return ok(counterBuffer);
}

/**
 * Dynamic truncation (RFC 4226 §5.3): pick 4 bytes at the offset named by the
 * low nibble of the last digest byte and clear the sign bit.
 */
export function dynamicTruncate(digest: Buffer): number {
  const offset = digest.readUInt8(digest.length - 1) & 0x0f;
  return digest.readUInt32BE(offset) & 0x7fffffff;
}

/**
 * Compute the HOTP code for a counter.
 * Identical (key, counter, algorithm, digits) always yields the identical code.
 */
export function generateHotp(
  key: Uint8Array,
  counter: bigint,
  algorithm: HashAlgorithm,
  digits: number
): Result<string, TotpError> {
  const counterBytes = encodeCounter(counter);
  if (!counterBytes.ok) {
    return counterBytes;
  }

  const digest = crypto.createHmac(digestName(algorithm), key).update(counterBytes.value).digest();
  const code = dynamicTruncate(digest) % 10 ** digits;

  return ok(String(code).padStart(digits, '0'));
}
