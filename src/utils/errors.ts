/**
 * TOTP error factories
 */

import { TotpError, TotpErrorKind } from '../types';

function totpError(kind: TotpErrorKind, message: string, field?: string): TotpError {
  return field === undefined ? { kind, message } : { kind, message, field };
}

export function invalidSecret(message: string): TotpError {
  return totpError(TotpErrorKind.INVALID_SECRET, message, 'secret');
}

export function invalidAlgorithm(name: string): TotpError {
  return totpError(
    TotpErrorKind.INVALID_ALGORITHM,
    `Unsupported algorithm: ${name}. Algorithm must be sha1, sha256, or sha512`,
    'algorithm'
  );
}

export function invalidParameter(field: string, message: string): TotpError {
  return totpError(TotpErrorKind.INVALID_PARAMETER, message, field);
}

export function invalidLength(min: number, max: number): TotpError {
  return totpError(TotpErrorKind.INVALID_LENGTH, `Length must be between ${min} and ${max}`, 'length');
}
