/**
 * At-rest encryption for indexed email content (AES-256-GCM)
 */

import * as crypto from 'crypto';
import { ConfigurationError } from '../../types/errors';

export const DECRYPTION_FAILED = '[Decryption Failed]';

const DEV_FALLBACK_SECRET = 'insecure-development-key-do-not-use';

export type AppEnvironment = 'dev' | 'test' | 'prod';

export class DataEncryptor {
  private readonly key: Buffer;
  private readonly algorithm = 'aes-256-gcm';

  constructor(secret: string | undefined, appEnv: AppEnvironment = 'dev') {
    if (!secret) {
      if (appEnv === 'prod') {
        throw new ConfigurationError('ENCRYPTION_KEY is required in production');
      }
      console.warn('⚠️ [SECURITY] ENCRYPTION_KEY not set, using an insecure development key. Indexed data is NOT protected.');
      secret = DEV_FALLBACK_SECRET;
    }

    // Derive a 32-byte key from the configured secret
    this.key = crypto.createHash('sha256').update(secret, 'utf8').digest();
  }

  /**
   * Encrypts text into an `iv:tag:ciphertext` hex token. Empty input stays empty.
   */
  encrypt(plaintext: string): string {
    if (!plaintext) {
      return '';
    }

    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv(this.algorithm, this.key, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');
    const tag = cipher.getAuthTag();

    return `${iv.toString('hex')}:${tag.toString('hex')}:${encrypted}`;
  }

  /**
   * Decrypts a token produced by encrypt(). Malformed, tampered or
   * foreign-key tokens yield the DECRYPTION_FAILED sentinel.
   */
  decrypt(token: string): string {
    if (!token) {
      return '';
    }

    try {
      const parts = token.split(':');
      if (parts.length !== 3) {
        throw new Error('Invalid encrypted token format');
      }

      const [ivHex, tagHex, data] = parts;
      const decipher = crypto.createDecipheriv(this.algorithm, this.key, Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(tagHex, 'hex'));

      let decrypted = decipher.update(data, 'hex', 'utf8');
      decrypted += decipher.final('utf8');
      return decrypted;
    } catch (error) {
      console.error('❌ [SECURITY] Failed to decrypt value:', error instanceof Error ? error.message : error);
      return DECRYPTION_FAILED;
    }
  }
}
