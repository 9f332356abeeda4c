import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { existsSync, readFileSync, writeFileSync } from 'fs';

export const SECURITY_SETTINGS = Symbol('SECURITY_SETTINGS');

/** Salt the first releases derived encryption keys with. Kept for `legacy` KDF mode only. */
export const LEGACY_KDF_SALT = 'konfig_salt_change_in_production';

export type KdfMode = 'random-salt' | 'legacy';

/**
 * Secrets and tuning shared by the crypto services. Built once at startup,
 * frozen, and injected; nothing reads process.env after this point.
 */
export interface SecuritySettings {
  readonly jwtSecret: string;
  readonly accessTokenExpireMinutes: number;
  readonly refreshTokenExpireDays: number;
  readonly encryptionKey: string;
  /** Null when encryptionKey is a raw key and PBKDF2 never runs. */
  readonly kdfSalt: Buffer | null;
  readonly kdfIterations: number;
  readonly bcryptRounds: number;
}

const logger = new Logger('SecurityConfig');

export const getSecuritySettings = (
  configService: ConfigService,
): SecuritySettings => {
  const mode = configService.get<KdfMode>('ENCRYPTION_KDF_MODE', 'random-salt');
  const encryptionKey = configService.getOrThrow<string>('ENCRYPTION_KEY');
  return Object.freeze({
    jwtSecret: configService.getOrThrow<string>('JWT_SECRET'),
    accessTokenExpireMinutes: Number(
      configService.get('ACCESS_TOKEN_EXPIRE_MINUTES', 30),
    ),
    refreshTokenExpireDays: Number(
      configService.get('REFRESH_TOKEN_EXPIRE_DAYS', 7),
    ),
    encryptionKey,
    kdfSalt: decodeRawEncryptionKey(encryptionKey)
      ? null
      : resolveKdfSalt(
          mode,
          configService.get<string>('ENCRYPTION_SALT'),
          configService.get<string>('ENCRYPTION_SALT_FILE', '.encryption-salt'),
        ),
    kdfIterations: 100_000,
    bcryptRounds: Number(configService.get('BCRYPT_ROUNDS', 12)),
  });
};

export const ENCRYPTION_KEY_BYTES = 32;

/** The key itself when ENCRYPTION_KEY is a base64/base64url encoded 32-byte key. */
export function decodeRawEncryptionKey(secret: string): Buffer | null {
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(secret)) return null;
  const decoded = Buffer.from(secret, 'base64');
  return decoded.length === ENCRYPTION_KEY_BYTES ? decoded : null;
}

/**
 * Salt for PBKDF2 when ENCRYPTION_KEY is not already a raw 32-byte key.
 *
 * Order: legacy fixed salt (compat mode), explicit ENCRYPTION_SALT, then the
 * salt file, which is generated on first boot and reused afterwards. Losing
 * the file makes existing ciphertext unreadable.
 */
export function resolveKdfSalt(
  mode: KdfMode,
  explicitSalt: string | undefined,
  saltFile: string,
): Buffer {
  if (mode === 'legacy') {
    logger.warn('ENCRYPTION_KDF_MODE=legacy: deriving the encryption key with the fixed legacy salt');
    return Buffer.from(LEGACY_KDF_SALT, 'utf8');
  }
  if (explicitSalt) {
    return Buffer.from(explicitSalt, 'base64');
  }
  if (existsSync(saltFile)) {
    return Buffer.from(readFileSync(saltFile, 'utf8').trim(), 'base64');
  }
  const salt = randomBytes(16);
  writeFileSync(saltFile, salt.toString('base64'), { mode: 0o600 });
  logger.log(`Generated new key-derivation salt at ${saltFile}`);
  return salt;
}
