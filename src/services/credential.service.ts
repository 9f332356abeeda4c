import { Inject, Injectable } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import { createHash, randomBytes } from 'crypto';
import {
  SECURITY_SETTINGS,
  SecuritySettings,
} from '../config/security.config';

export const API_KEY_PREFIX = 'konfig_';
export const API_KEY_LOOKUP_LENGTH = 12;

export interface GeneratedApiKey {
  secret: string;
  prefix: string;
}

/**
 * CredentialService
 *
 * Passwords and API-key secrets are reduced to a SHA-256 digest (44 base64
 * chars) before bcrypt, which only reads the first 72 bytes of its input.
 */
@Injectable()
export class CredentialService {
  private readonly rounds: number;
  private decoyHash?: Promise<string>;

  constructor(@Inject(SECURITY_SETTINGS) settings: SecuritySettings) {
    this.rounds = settings.bcryptRounds;
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(predigest(password), this.rounds);
  }

  async verifyPassword(password: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(predigest(password), hash);
    } catch {
      // malformed stored hash
      return false;
    }
  }

  /**
   * Runs a bcrypt check at the configured cost against a throwaway hash, so a
   * login for an unknown email takes as long as a wrong password.
   */
  async verifyUnknownPassword(password: string): Promise<false> {
    if (!this.decoyHash) {
      this.decoyHash = this.hashPassword(randomBytes(16).toString('hex'));
    }
    await this.verifyPassword(password, await this.decoyHash);
    return false;
  }

  generateApiKey(): GeneratedApiKey {
    const secret = `${API_KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
    return { secret, prefix: apiKeyLookupPrefix(secret) };
  }

  async hashApiKey(secret: string): Promise<string> {
    return this.hashPassword(secret);
  }

  async verifyApiKey(secret: string, hash: string): Promise<boolean> {
    return this.verifyPassword(secret, hash);
  }
}

export function apiKeyLookupPrefix(secret: string): string {
  return secret.slice(0, API_KEY_LOOKUP_LENGTH);
}

function predigest(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64');
}
