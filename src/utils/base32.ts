/**
 * Base32 codec (RFC 4648)
 * Decodes user-supplied TOTP secrets and encodes generated key material.
 */

import { TotpError } from '../types';
import { Result, ok, err } from '../types/result';
import { invalidSecret } from './errors';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const BLOCK_SIZE = 8;

// Number of data characters a final 8-character block may carry. 1, 3 and 6
// never come out of an encoder.
const VALID_TAIL_LENGTHS = new Set([0, 2, 4, 5, 7]);

/**
 * Encode bytes as uppercase, `=`-padded Base32
 */
export function base32Encode(buffer: Uint8Array): string {
  let bits = 0;
  let value = 0;
  let output = '';

  for (const byte of buffer) {
    value = ((value << 8) | byte) & 0xffff;
    bits += 8;

    while (bits >= 5) {
      output += BASE32_ALPHABET.charAt((value >>> (bits - 5)) & 31);
      bits -= 5;
    }
  }

  if (bits > 0) {
    output += BASE32_ALPHABET.charAt((value << (5 - bits)) & 31);
  }

  const remainder = output.length % BLOCK_SIZE;
  return remainder === 0 ? output : output + '='.repeat(BLOCK_SIZE - remainder);
}

/**
 * Decode Base32 text into key bytes.
 *
 * Input is case-insensitive. Missing padding is repaired by right-padding
 * with `=` to the next multiple of 8 characters, and surplus trailing
 * padding is ignored.
 */
export function base32Decode(input: string): Result<Buffer, TotpError> {
  // Checked before uppercasing: Unicode case mapping turns 'ı' into 'I' and 'ß' into 'SS'
  const foreign = /[^A-Za-z2-7=]/.exec(input);
  if (foreign) {
    return err(invalidSecret(`Invalid secret key: unexpected character '${foreign[0]}'`));
  }

  let text = input.toUpperCase();
  const remainder = text.length % BLOCK_SIZE;
  if (remainder !== 0) {
    text += '='.repeat(BLOCK_SIZE - remainder);
  }

  const paddingStart = text.indexOf('=');
  const data = paddingStart === -1 ? text : text.slice(0, paddingStart);

  if (paddingStart !== -1 && /[^=]/.test(text.slice(paddingStart))) {
    return err(invalidSecret('Invalid secret key: padding may only appear at the end'));
  }

  if (!VALID_TAIL_LENGTHS.has(data.length % BLOCK_SIZE)) {
    return err(invalidSecret('Invalid secret key: incorrect padding'));
  }

  let bits = 0;
  let value = 0;
  const bytes: number[] = [];

  for (const ch of data) {
    const idx = BASE32_ALPHABET.indexOf(ch);
    if (idx === -1) {
      return err(invalidSecret(`Invalid secret key: unexpected character '${ch}'`));
    }
    value = ((value << 5) | idx) & 0xffff;
    bits += 5;

    if (bits >= 8) {
      bytes.push((value >>> (bits - 8)) & 255);
      bits -= 8;
    }
  }

  return ok(Buffer.from(bytes));
}
