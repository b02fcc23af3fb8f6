/**
 * TOTP Routes
 * JSON endpoints for code generation, verification and secret provisioning
 */

import { Router, Request, Response } from 'express';
import { AppConfig } from '../config';
import { TotpError, ValidationError } from '../types';
import { flatMap } from '../types/result';
import { generate, generateSecret, makeConfig, verify } from '../services/totp-service';
import { parseGenerateRequest, parseGenerateSecretQuery, parseVerifyRequest } from '../utils/validation';
import { logger } from '../utils/logger';

function sendValidationError(res: Response, errors: ValidationError[]): void {
  res.status(400).json({
    success: false,
    error: 'ValidationError',
    message: errors.map(e => e.message).join('; '),
    details: errors,
  });
}

function sendTotpError(res: Response, error: TotpError): void {
  logger.debug('TOTP request rejected', { kind: error.kind, field: error.field });
  res.status(400).json({
    success: false,
    error: error.kind,
    message: error.message,
  });
}

export function createTotpRouter(config: AppConfig): Router {
  const router = Router();

  /**
   * POST /api/generate
   * Generate the current (or given timestamp's) TOTP code
   */
  router.post('/generate', (req: Request, res: Response) => {
    const parsed = parseGenerateRequest(req.body);
    if (!parsed.ok) {
      sendValidationError(res, parsed.error);
      return;
    }

    const request = parsed.value;
    const totpConfig = makeConfig(request);
    if (!totpConfig.ok) {
      sendTotpError(res, totpConfig.error);
      return;
    }

    const result = generate(totpConfig.value, request.timestamp);
    if (!result.ok) {
      sendTotpError(res, result.error);
      return;
    }

    const { timeStep, t0, digits, algorithm } = totpConfig.value;
    const otp = result.value;

    res.status(200).json({
      success: true,
      otp: otp.code,
      time_remaining: otp.timeRemaining,
      counter: otp.counter,
      timestamp: otp.timestamp,
      parameters: {
        time_step: timeStep,
        t0,
        digits,
        algorithm: algorithm.toLowerCase(),
      },
    });
  });

  /**
   * POST /api/verify
   * Check a candidate code against the window around the current time step
   */
  router.post('/verify', (req: Request, res: Response) => {
    const parsed = parseVerifyRequest(req.body);
    if (!parsed.ok) {
      sendValidationError(res, parsed.error);
      return;
    }

    const request = parsed.value;
    if (request.window !== undefined && request.window > config.totp.maxWindow) {
      sendValidationError(res, [{
        field: 'window',
        message: `Window must not exceed ${config.totp.maxWindow}`,
        code: 'OUT_OF_RANGE',
      }]);
      return;
    }

    const result = flatMap(makeConfig(request), c => verify(c, request.otp, request.timestamp, request.window));
    if (!result.ok) {
      sendTotpError(res, result.error);
      return;
    }

    logger.info('TOTP verification completed', { valid: result.value });
    res.status(200).json({
      success: true,
      valid: result.value,
    });
  });

  /**
   * GET /api/generate-secret
   * Generate a random Base32 secret; optional `length` query parameter in bytes
   */
  router.get('/generate-secret', (req: Request, res: Response) => {
    const parsed = parseGenerateSecretQuery(req.query);
    if (!parsed.ok) {
      sendValidationError(res, parsed.error);
      return;
    }

    const result = generateSecret(parsed.value.length ?? config.totp.defaultSecretLength);
    if (!result.ok) {
      sendTotpError(res, result.error);
      return;
    }

    res.status(200).json({
      success: true,
      secret: result.value,
    });
  });

  /**
   * GET /api/health
   * Liveness check
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: Math.floor(Date.now() / 1000),
    });
  });

  return router;
}
