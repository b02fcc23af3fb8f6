/**
 * Secret Generator
 * Random TOTP key material, Base32-encoded
 */

import crypto from 'crypto';
import { base32Encode } from '../utils/base32';

/**
 * Draw `lengthBytes` bytes from the CSPRNG and Base32-encode them.
 * Length policy is enforced by callers; any positive length works here.
 */
export function createSecret(lengthBytes: number): string {
  return base32Encode(crypto.randomBytes(lengthBytes));
}
