import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  createCipheriv,
  createDecipheriv,
  pbkdf2Sync,
  randomBytes,
} from 'crypto';
import { EncryptionError } from '../common/errors/domain.errors';
import {
  decodeRawEncryptionKey,
  ENCRYPTION_KEY_BYTES,
  SECURITY_SETTINGS,
  SecuritySettings,
} from '../config/security.config';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH_BYTES = 12;
const AUTH_TAG_LENGTH_BYTES = 16;

/**
 * EncryptionService
 *
 * AES-256-GCM for configuration values at rest. Ciphertext is
 * base64url(iv | authTag | ciphertext), so the same plaintext never encrypts
 * to the same text twice. The empty string is passed through in both
 * directions.
 */
@Injectable()
export class EncryptionService {
  private readonly logger = new Logger(EncryptionService.name);
  private readonly key: Buffer;

  constructor(@Inject(SECURITY_SETTINGS) settings: SecuritySettings) {
    this.key = deriveEncryptionKey(
      settings.encryptionKey,
      settings.kdfSalt,
      settings.kdfIterations,
    );
  }

  encrypt(plaintext: string): string {
    if (!plaintext) return plaintext;
    const iv = randomBytes(IV_LENGTH_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, {
      authTagLength: AUTH_TAG_LENGTH_BYTES,
    });
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, 'utf8'),
      cipher.final(),
    ]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString(
      'base64url',
    );
  }

  /** @throws EncryptionError when the input is corrupted, tampered with or from another key. */
  decrypt(encoded: string): string {
    if (!encoded) return encoded;
    const raw = Buffer.from(encoded, 'base64url');
    if (raw.length < IV_LENGTH_BYTES + AUTH_TAG_LENGTH_BYTES) {
      throw new EncryptionError();
    }
    const iv = raw.subarray(0, IV_LENGTH_BYTES);
    const authTag = raw.subarray(
      IV_LENGTH_BYTES,
      IV_LENGTH_BYTES + AUTH_TAG_LENGTH_BYTES,
    );
    const ciphertext = raw.subarray(IV_LENGTH_BYTES + AUTH_TAG_LENGTH_BYTES);
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv, {
        authTagLength: AUTH_TAG_LENGTH_BYTES,
      });
      decipher.setAuthTag(authTag);
      return Buffer.concat([
        decipher.update(ciphertext),
        decipher.final(),
      ]).toString('utf8');
    } catch (e) {
      this.logger.warn(
        `Decryption failed: ${e instanceof Error ? e.message : String(e)}`,
      );
      throw new EncryptionError();
    }
  }
}

/**
 * Use ENCRYPTION_KEY directly when it is already a base64/base64url encoded
 * 32-byte key; otherwise stretch it with PBKDF2-HMAC-SHA256.
 */
export function deriveEncryptionKey(
  secret: string,
  salt: Buffer | null,
  iterations: number,
): Buffer {
  const direct = decodeRawEncryptionKey(secret);
  if (direct) return direct;
  if (!salt) {
    throw new Error('A key-derivation salt is required for a passphrase ENCRYPTION_KEY');
  }
  return pbkdf2Sync(secret, salt, iterations, ENCRYPTION_KEY_BYTES, 'sha256');
}
