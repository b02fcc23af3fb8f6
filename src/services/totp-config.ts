/**
 * TOTP Configuration
 * The single validation gate: a TotpConfig only exists once every
 * parameter has passed its range and membership checks.
 */

import { HashAlgorithm, TotpError, TotpParameters } from '../types';
import { Result, ok, err } from '../types/result';
import { base32Decode } from '../utils/base32';
import { invalidAlgorithm, invalidParameter, invalidSecret } from '../utils/errors';

export const DEFAULT_TIME_STEP = 30;
export const DEFAULT_T0 = 0;
export const DEFAULT_DIGITS = 6;
export const DEFAULT_ALGORITHM = HashAlgorithm.SHA1;
export const MIN_DIGITS = 6;
export const MAX_DIGITS = 10;

/**
 * Resolve an algorithm name case-insensitively ("sha1", "SHA256", ...)
 */
export function parseAlgorithm(name: string): Result<HashAlgorithm, TotpError> {
  switch (name.toUpperCase()) {
    case 'SHA1':
      return ok(HashAlgorithm.SHA1);
    case 'SHA256':
      return ok(HashAlgorithm.SHA256);
    case 'SHA512':
      return ok(HashAlgorithm.SHA512);
    default:
      return err(invalidAlgorithm(name));
  }
}

export class TotpConfig {
  private readonly key: Buffer;

  private constructor(
    readonly secret: string,
    key: Buffer,
    readonly timeStep: number,
    readonly t0: number,
    readonly digits: number,
    readonly algorithm: HashAlgorithm
  ) {
    this.key = Buffer.from(key);
    Object.freeze(this);
  }

  /**
   * Validate raw parameters and build a config
   */
  static create(params: TotpParameters): Result<TotpConfig, TotpError> {
    const {
      secret,
      timeStep = DEFAULT_TIME_STEP,
      t0 = DEFAULT_T0,
      digits = DEFAULT_DIGITS,
      algorithm = DEFAULT_ALGORITHM,
    } = params;

    if (secret.length === 0) {
      return err(invalidSecret('Secret key is required'));
    }

    if (!Number.isSafeInteger(timeStep) || timeStep <= 0) {
      return err(invalidParameter('time_step', 'Time step must be a positive integer'));
    }

    if (!Number.isSafeInteger(t0)) {
      return err(invalidParameter('t0', 'T0 must be an integer'));
    }

    if (!Number.isSafeInteger(digits) || digits < MIN_DIGITS || digits > MAX_DIGITS) {
      return err(invalidParameter('digits', `Digits must be between ${MIN_DIGITS} and ${MAX_DIGITS}`));
    }

    const hashAlgorithm = parseAlgorithm(algorithm);
    if (!hashAlgorithm.ok) {
      return hashAlgorithm;
    }

    const key = base32Decode(secret);
    if (!key.ok) {
      return key;
    }

    return ok(new TotpConfig(secret, key.value, timeStep, t0, digits, hashAlgorithm.value));
  }

  /**
   * Decoded key bytes (a copy, so callers cannot alter the config)
   */
  keyBytes(): Buffer {
    return Buffer.from(this.key);
  }
}
