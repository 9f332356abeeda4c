import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import {
  SECURITY_SETTINGS,
  SecuritySettings,
} from '../config/security.config';

export type TokenType = 'access' | 'refresh';

export interface TokenPayload {
  sub: string;
  type: TokenType;
  exp: number;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
  expires_in: number;
}

/**
 * TokenService
 *
 * HS256 session tokens. decode() returns null for every failure (bad
 * signature, expired, malformed, wrong shape) so callers cannot tell a forged
 * token from an expired one.
 */
@Injectable()
export class TokenService {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(SECURITY_SETTINGS) private readonly settings: SecuritySettings,
  ) {}

  get accessTokenTtlSeconds(): number {
    return this.settings.accessTokenExpireMinutes * 60;
  }

  get refreshTokenTtlSeconds(): number {
    return this.settings.refreshTokenExpireDays * 24 * 60 * 60;
  }

  issueAccessToken(subject: string): Promise<string> {
    return this.sign(subject, 'access', this.accessTokenTtlSeconds);
  }

  issueRefreshToken(subject: string): Promise<string> {
    return this.sign(subject, 'refresh', this.refreshTokenTtlSeconds);
  }

  async issueTokenPair(subject: string): Promise<TokenPair> {
    const [access_token, refresh_token] = await Promise.all([
      this.issueAccessToken(subject),
      this.issueRefreshToken(subject),
    ]);
    return {
      access_token,
      refresh_token,
      token_type: 'bearer',
      expires_in: this.accessTokenTtlSeconds,
    };
  }

  async decode(token: string): Promise<TokenPayload | null> {
    let payload: unknown;
    try {
      payload = await this.jwtService.verifyAsync<Record<string, unknown>>(token, {
        secret: this.settings.jwtSecret,
        algorithms: ['HS256'],
      });
    } catch {
      return null;
    }
    return isTokenPayload(payload) ? payload : null;
  }

  private sign(subject: string, type: TokenType, ttlSeconds: number): Promise<string> {
    return this.jwtService.signAsync(
      { sub: subject, type },
      {
        secret: this.settings.jwtSecret,
        algorithm: 'HS256',
        expiresIn: ttlSeconds,
      },
    );
  }
}

function isTokenPayload(value: unknown): value is TokenPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sub' in value &&
    typeof value.sub === 'string' &&
    'type' in value &&
    (value.type === 'access' || value.type === 'refresh') &&
    'exp' in value &&
    typeof value.exp === 'number'
  );
}
