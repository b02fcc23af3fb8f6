/**
 * TOTP Service
 * Time-based one-time passwords (RFC 6238): generation, windowed
 * verification and secret provisioning.
 */

import crypto from 'crypto';
import { OtpResult, TotpError, TotpParameters } from '../types';
import { Result, ok, err, map } from '../types/result';
import { counterAt, currentTimestamp, timeRemainingAt } from '../utils/counter-clock';
import { invalidLength, invalidParameter } from '../utils/errors';
import { generateHotp, isCounterInRange } from './hotp-engine';
import { createSecret } from './secret-generator';
import { TotpConfig } from './totp-config';

export { TotpConfig } from './totp-config';

export const DEFAULT_WINDOW = 1;
export const DEFAULT_SECRET_LENGTH = 32;
export const MIN_SECRET_LENGTH = 16;
export const MAX_SECRET_LENGTH = 64;

export function makeConfig(params: TotpParameters): Result<TotpConfig, TotpError> {
  return TotpConfig.create(params);
}

function resolveTimestamp(timestamp: number | undefined): Result<number, TotpError> {
  if (timestamp === undefined) {
    return ok(currentTimestamp());
  }
  if (!Number.isSafeInteger(timestamp)) {
    return err(invalidParameter('timestamp', 'Timestamp must be an integer'));
  }
  return ok(timestamp);
}

/**
 * Generate the code for the time step containing `timestamp` (default: now)
 */
export function generate(config: TotpConfig, timestamp?: number): Result<OtpResult, TotpError> {
  const resolved = resolveTimestamp(timestamp);
  if (!resolved.ok) {
    return resolved;
  }

  const now = resolved.value;
  const counter = counterAt(now, config.t0, config.timeStep);
  if (counter > BigInt(Number.MAX_SAFE_INTEGER)) {
    return err(invalidParameter('counter', `Counter ${counter} exceeds the largest exact integer`));
  }

  return map(generateHotp(config.keyBytes(), counter, config.algorithm, config.digits), (code) => ({
    code,
    counter: Number(counter),
    timeRemaining: timeRemainingAt(now, config.t0, config.timeStep),
    timestamp: now,
  }));
}

function codesMatch(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Counter offsets in probe order: 0, -1, +1, -2, +2, ...
 */
function* windowOffsets(window: number): Generator<bigint> {
  yield 0n;
  for (let i = 1; i <= window; i++) {
    yield BigInt(-i);
    yield BigInt(i);
  }
}

/**
 * Accept `code` if it matches any counter within `window` steps of the
 * current one. Neighbouring counters outside the unsigned 64-bit range
 * are skipped.
 */
export function verify(
  config: TotpConfig,
  code: string,
  timestamp?: number,
  window: number = DEFAULT_WINDOW
): Result<boolean, TotpError> {
  if (!Number.isSafeInteger(window) || window < 0) {
    return err(invalidParameter('window', 'Window must be a non-negative integer'));
  }

  const resolved = resolveTimestamp(timestamp);
  if (!resolved.ok) {
    return resolved;
  }

  const current = counterAt(resolved.value, config.t0, config.timeStep);
  if (!isCounterInRange(current)) {
    return err(invalidParameter('counter', `Counter ${current} is outside the unsigned 64-bit range`));
  }

  const key = config.keyBytes();
  for (const offset of windowOffsets(window)) {
    const counter = current + offset;
    if (!isCounterInRange(counter)) {
      continue;
    }

    const expected = generateHotp(key, counter, config.algorithm, config.digits);
    if (!expected.ok) {
      return expected;
    }
    if (codesMatch(code, expected.value)) {
      return ok(true);
    }
  }

  return ok(false);
}

/**
 * Generate a random Base32 secret of `lengthBytes` bytes
 */
export function generateSecret(lengthBytes: number = DEFAULT_SECRET_LENGTH): Result<string, TotpError> {
  if (!Number.isSafeInteger(lengthBytes) || lengthBytes < MIN_SECRET_LENGTH || lengthBytes > MAX_SECRET_LENGTH) {
    return err(invalidLength(MIN_SECRET_LENGTH, MAX_SECRET_LENGTH));
  }
  return ok(createSecret(lengthBytes));
}
