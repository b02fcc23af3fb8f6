/**
 * Unit and Property-Based Tests for the TOTP service (RFC 6238)
 */

import * as fc from 'fast-check';
import { HashAlgorithm, TotpErrorKind, TotpParameters } from '../src/types';
import { base32Decode, base32Encode } from '../src/utils/base32';
import {
  TotpConfig,
  generate,
  generateSecret,
  makeConfig,
  verify,
} from '../src/services/totp-service';

const SHA1_SECRET = base32Encode(Buffer.from('12345678901234567890'));
const SHA256_SECRET = base32Encode(Buffer.from('12345678901234567890123456789012'));
const SHA512_SECRET = base32Encode(
  Buffer.from('1234567890123456789012345678901234567890123456789012345678901234')
);

function configOf(params: TotpParameters): TotpConfig {
  const result = makeConfig(params);
  if (!result.ok) {
    throw new Error(`Unexpected config error: ${result.error.message}`);
  }
  return result.value;
}

function codeAt(config: TotpConfig, timestamp: number): string {
  const result = generate(config, timestamp);
  if (!result.ok) {
    throw new Error(`Unexpected generate error: ${result.error.message}`);
  }
  return result.value.code;
}

describe('TOTP Service', () => {
  describe('makeConfig', () => {
    test('should apply RFC 6238 defaults', () => {
      const config = configOf({ secret: SHA1_SECRET });

      expect(config.timeStep).toBe(30);
      expect(config.t0).toBe(0);
      expect(config.digits).toBe(6);
      expect(config.algorithm).toBe(HashAlgorithm.SHA1);
      expect(config.keyBytes().toString()).toBe('12345678901234567890');
    });

    test('should accept algorithm names case-insensitively', () => {
      expect(configOf({ secret: SHA1_SECRET, algorithm: 'sha256' }).algorithm).toBe(HashAlgorithm.SHA256);
      expect(configOf({ secret: SHA1_SECRET, algorithm: 'Sha512' }).algorithm).toBe(HashAlgorithm.SHA512);
    });

    test('should accept digits at both bounds', () => {
      expect(makeConfig({ secret: SHA1_SECRET, digits: 6 }).ok).toBe(true);
      expect(makeConfig({ secret: SHA1_SECRET, digits: 10 }).ok).toBe(true);
    });

    const invalidParameters: Array<[Partial<TotpParameters>, string]> = [
      [{ digits: 5 }, 'digits'],
      [{ digits: 11 }, 'digits'],
      [{ digits: 6.5 }, 'digits'],
      [{ timeStep: 0 }, 'time_step'],
      [{ timeStep: -30 }, 'time_step'],
      [{ t0: 1.5 }, 't0'],
      [{ t0: Number.MAX_SAFE_INTEGER + 1 }, 't0'],
    ];

    test.each(invalidParameters)('should reject %o with InvalidParameter', (overrides, field) => {
      const result = makeConfig({ secret: SHA1_SECRET, ...overrides });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(TotpErrorKind.INVALID_PARAMETER);
        expect(result.error.field).toBe(field);
      }
    });

    test('should reject unknown algorithms', () => {
      const result = makeConfig({ secret: SHA1_SECRET, algorithm: 'md5' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(TotpErrorKind.INVALID_ALGORITHM);
        expect(result.error.message).toBe('Unsupported algorithm: md5. Algorithm must be sha1, sha256, or sha512');
      }
    });

    test('should reject undecodable and empty secrets', () => {
      for (const secret of ['NOT-BASE32!', '']) {
        const result = makeConfig({ secret });
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe(TotpErrorKind.INVALID_SECRET);
      }
    });

    test('should not expose a mutable key', () => {
      const config = configOf({ secret: SHA1_SECRET });
      config.keyBytes().fill(0);

      expect(config.keyBytes().toString()).toBe('12345678901234567890');
      expect(Object.isFrozen(config)).toBe(true);
    });
  });

  describe('generate', () => {
    test('should produce the RFC 6238 vector at T=59', () => {
      const result = generate(configOf({ secret: SHA1_SECRET, digits: 8 }), 59);

      expect(result).toEqual({
        ok: true,
        value: { code: '94287082', counter: 1, timeRemaining: 1, timestamp: 59 },
      });
    });

    const appendixB: Array<[number, string, string, string]> = [
      [59, '94287082', '46119246', '90693936'],
      [1111111109, '07081804', '68084774', '25091201'],
      [1111111111, '14050471', '67062674', '99943326'],
      [1234567890, '89005924', '91819424', '93441116'],
      [2000000000, '69279037', '90698825', '38618901'],
      [20000000000, '65353130', '77737706', '47863826'],
    ];

    test.each(appendixB)('should match RFC 6238 Appendix B at T=%d', (timestamp, sha1, sha256, sha512) => {
      expect(codeAt(configOf({ secret: SHA1_SECRET, digits: 8, algorithm: 'SHA1' }), timestamp)).toBe(sha1);
      expect(codeAt(configOf({ secret: SHA256_SECRET, digits: 8, algorithm: 'SHA256' }), timestamp)).toBe(sha256);
      expect(codeAt(configOf({ secret: SHA512_SECRET, digits: 8, algorithm: 'SHA512' }), timestamp)).toBe(sha512);
    });

    test('should use the current time when no timestamp is given', () => {
      const spy = jest.spyOn(Date, 'now').mockReturnValue(59_400);
      try {
        const result = generate(configOf({ secret: SHA1_SECRET, digits: 8 }));
        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.value.timestamp).toBe(59);
          expect(result.value.code).toBe('94287082');
        }
      } finally {
        spy.mockRestore();
      }
    });

    test('should honour t0 and the time step', () => {
      const config = configOf({ secret: SHA1_SECRET, t0: 1000, timeStep: 60 });
      const result = generate(config, 1100);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.counter).toBe(1);
        expect(result.value.timeRemaining).toBe(20);
        expect(result.value.code).toBe('287082');
      }
    });

    test('should reject timestamps whose counter is negative', () => {
      const result = generate(configOf({ secret: SHA1_SECRET, t0: 100 }), 50);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(TotpErrorKind.INVALID_PARAMETER);
        expect(result.error.field).toBe('counter');
      }
    });

    test('should reject counters too large to report exactly', () => {
      const config = configOf({ secret: SHA1_SECRET, timeStep: 1, t0: -Number.MAX_SAFE_INTEGER });
      const result = generate(config, 10);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(TotpErrorKind.INVALID_PARAMETER);
        expect(result.error.field).toBe('counter');
      }
    });

    test('should reject non-integer timestamps', () => {
      const result = generate(configOf({ secret: SHA1_SECRET }), 59.5);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.field).toBe('timestamp');
    });
  });

  describe('verify', () => {
    const config = configOf({ secret: SHA1_SECRET });

    test('should accept the current code', () => {
      expect(verify(config, '287082', 59, 0)).toEqual({ ok: true, value: true });
    });

    test('should accept adjacent steps within the default window', () => {
      // 287082 is counter 1; T=89 is counter 2, T=10 is counter 0
      expect(verify(config, '287082', 89)).toEqual({ ok: true, value: true });
      expect(verify(config, '287082', 10)).toEqual({ ok: true, value: true });
      expect(verify(config, '287082', 90)).toEqual({ ok: true, value: false });
    });

    test('should reject codes of the wrong length or content', () => {
      expect(verify(config, '28708', 59)).toEqual({ ok: true, value: false });
      expect(verify(config, '2870820', 59)).toEqual({ ok: true, value: false });
      expect(verify(config, '', 59)).toEqual({ ok: true, value: false });
      expect(verify(config, '28708a', 59)).toEqual({ ok: true, value: false });
    });

    test('should skip counters below zero at the start of time', () => {
      // Current counter 0, window reaches -1 which cannot be encoded
      expect(verify(config, '755224', 0, 1)).toEqual({ ok: true, value: true });
      expect(verify(config, '287082', 0, 1)).toEqual({ ok: true, value: true });
    });

    test('should reject a negative current counter', () => {
      const result = verify(configOf({ secret: SHA1_SECRET, t0: 100 }), '755224', 0);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe(TotpErrorKind.INVALID_PARAMETER);
    });

    test.each([-1, 1.5])('should reject window %d', (window) => {
      const result = verify(config, '287082', 59, window);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(TotpErrorKind.INVALID_PARAMETER);
        expect(result.error.field).toBe('window');
      }
    });

    test('Property: a generated code verifies at the same timestamp with window 0', () => {
      fc.assert(
        fc.property(
          fc.uint8Array({ minLength: 10, maxLength: 64 }),
          fc.integer({ min: 1, max: 300 }),
          fc.integer({ min: 6, max: 10 }),
          fc.constantFrom('sha1', 'sha256', 'sha512'),
          fc.integer({ min: 0, max: 4_000_000_000 }),
          (key, timeStep, digits, algorithm, timestamp) => {
            const cfg = configOf({ secret: base32Encode(key), timeStep, digits, algorithm });
            const code = codeAt(cfg, timestamp);
            expect(verify(cfg, code, timestamp, 0)).toEqual({ ok: true, value: true });
          }
        ),
        { numRuns: 50 }
      );
    });

    test('Property: acceptance ends exactly at the window boundary', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 3 }),
          fc.integer({ min: 1_000_000, max: 2_000_000_000 }),
          (window, timestamp) => {
            const cfg = configOf({ secret: SHA1_SECRET, digits: 10 });
            const code = codeAt(cfg, timestamp);

            expect(verify(cfg, code, timestamp + window * 30, window)).toEqual({ ok: true, value: true });
            expect(verify(cfg, code, timestamp + (window + 1) * 30, window)).toEqual({ ok: true, value: false });
          }
        ),
        { numRuns: 25 }
      );
    });
  });

  describe('generateSecret', () => {
    test('should produce a 32-byte secret by default', () => {
      const result = generateSecret();

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toMatch(/^[A-Z2-7]+=*$/);
        expect(result.value.length).toBe(56);
        const decoded = base32Decode(result.value);
        expect(decoded.ok && decoded.value.length).toBe(32);
      }
    });

    test('should not repeat secrets', () => {
      const first = generateSecret(32);
      const second = generateSecret(32);

      expect(first.ok && second.ok).toBe(true);
      if (first.ok && second.ok) expect(first.value).not.toBe(second.value);
    });

    test('should accept lengths at both policy bounds', () => {
      const min = generateSecret(16);
      const max = generateSecret(64);

      expect(min.ok && min.value.length).toBe(32);
      expect(max.ok && max.value.length).toBe(104);
    });

    test.each([15, 65, 0, 20.5])('should reject length %d with InvalidLength', (length) => {
      const result = generateSecret(length);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(TotpErrorKind.INVALID_LENGTH);
        expect(result.error.message).toBe('Length must be between 16 and 64');
      }
    });
  });
});
