/**
 * Core type definitions for the TOTP service
 */

// ============================================================================
// ENUMS
// ============================================================================

export enum HashAlgorithm {
  SHA1 = 'SHA1',
  SHA256 = 'SHA256',
  SHA512 = 'SHA512'
}

export enum TotpErrorKind {
  INVALID_SECRET = 'InvalidSecret',
  INVALID_ALGORITHM = 'InvalidAlgorithm',
  INVALID_PARAMETER = 'InvalidParameter',
  INVALID_LENGTH = 'InvalidLength'
}

// ============================================================================
// CORE DOMAIN INTERFACES
// ============================================================================

export interface TotpError {
  kind: TotpErrorKind;
  message: string;
  field?: string;
}

export interface OtpResult {
  code: string;
  counter: number;
  timeRemaining: number;
  timestamp: number;
}

/**
 * Raw parameters accepted by makeConfig. Everything except the secret
 * falls back to the RFC 6238 defaults.
 */
export interface TotpParameters {
  secret: string;
  timeStep?: number;
  t0?: number;
  digits?: number;
  algorithm?: string;
}

// ============================================================================
// API REQUEST TYPES
// ============================================================================

export interface GenerateRequest extends TotpParameters {
  timestamp?: number;
}

export interface VerifyRequest extends GenerateRequest {
  otp: string;
  window?: number;
}

export interface GenerateSecretRequest {
  length?: number;
}

// ============================================================================
// VALIDATION TYPES
// ============================================================================

export interface ValidationError {
  field: string;
  message: string;
  code: string;
}
