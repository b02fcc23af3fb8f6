/**
 * Request validation for the HTTP layer.
 * Checks presence and JSON types only; range checks belong to the TOTP core.
 */

import {
  GenerateRequest,
  VerifyRequest,
  GenerateSecretRequest,
  ValidationError
} from '../types/index';
import { Result, ok, err } from '../types/result';

type RequestBody = Record<string, unknown>;

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

function isRecord(value: unknown): value is RequestBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function addError(errors: ValidationError[], field: string, message: string, code: string): void {
  errors.push({ field, message, code });
}

function readString(
  body: RequestBody,
  field: string,
  errors: ValidationError[],
  required: boolean,
  requiredMessage = `${field} is required`
): string | undefined {
  const value = body[field];
  if (value === undefined) {
    if (required) {
      addError(errors, field, requiredMessage, 'REQUIRED');
    }
    return undefined;
  }
  if (typeof value !== 'string') {
    addError(errors, field, `${field} must be a string`, 'INVALID_TYPE');
    return undefined;
  }
  return value;
}

function readInteger(body: RequestBody, field: string, errors: ValidationError[]): number | undefined {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    addError(errors, field, `${field} must be an integer`, 'INVALID_TYPE');
    return undefined;
  }
  return value;
}

// ============================================================================
// REQUEST PARSERS
// ============================================================================

function parseTotpFields(body: RequestBody, errors: ValidationError[]): GenerateRequest {
  return {
    secret: readString(body, 'secret', errors, true, 'Secret key is required') ?? '',
    timeStep: readInteger(body, 'time_step', errors),
    t0: readInteger(body, 't0', errors),
    digits: readInteger(body, 'digits', errors),
    algorithm: readString(body, 'algorithm', errors, false),
    timestamp: readInteger(body, 'timestamp', errors),
  };
}

export function parseGenerateRequest(body: unknown): Result<GenerateRequest, ValidationError[]> {
  if (!isRecord(body)) {
    return err([{ field: 'body', message: 'Request body must be a JSON object', code: 'INVALID_BODY' }]);
  }

  const errors: ValidationError[] = [];
  const request = parseTotpFields(body, errors);

  return errors.length > 0 ? err(errors) : ok(request);
}

export function parseVerifyRequest(body: unknown): Result<VerifyRequest, ValidationError[]> {
  if (!isRecord(body)) {
    return err([{ field: 'body', message: 'Request body must be a JSON object', code: 'INVALID_BODY' }]);
  }

  const errors: ValidationError[] = [];
  const request: VerifyRequest = {
    ...parseTotpFields(body, errors),
    otp: readString(body, 'otp', errors, true, 'OTP is required') ?? '',
    window: readInteger(body, 'window', errors),
  };

  return errors.length > 0 ? err(errors) : ok(request);
}

export function parseGenerateSecretQuery(query: unknown): Result<GenerateSecretRequest, ValidationError[]> {
  const raw = isRecord(query) ? query['length'] : undefined;
  if (raw === undefined) {
    return ok({});
  }

  if (typeof raw !== 'string' || !/^-?\d+$/.test(raw.trim())) {
    return err([{ field: 'length', message: 'length must be an integer', code: 'INVALID_TYPE' }]);
  }

  return ok({ length: Number(raw.trim()) });
}
