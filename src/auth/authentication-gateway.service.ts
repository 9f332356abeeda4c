import { Injectable, Logger } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import { AuthenticationError } from '../common/errors/domain.errors';
import { MetricsService } from '../services/metrics.service';
import { ApiKeyAuthenticator } from './authenticators/api-key.authenticator';
import { Authenticator } from './authenticators/authenticator';
import { BearerTokenAuthenticator } from './authenticators/bearer-token.authenticator';
import { AuthMethod, Principal } from './principal';

export const ALL_AUTH_METHODS: readonly AuthMethod[] = ['api_key', 'user'];

/**
 * AuthenticationGateway
 *
 * Runs the authenticator chain in priority order (API key, then bearer token).
 * The first strategy whose credential is present decides the outcome; a
 * rejected credential never falls through to the next strategy.
 */
@Injectable()
export class AuthenticationGateway {
  private readonly logger = new Logger(AuthenticationGateway.name);
  private readonly chain: readonly Authenticator[];

  constructor(
    apiKeyAuthenticator: ApiKeyAuthenticator,
    bearerTokenAuthenticator: BearerTokenAuthenticator,
    private readonly metrics: MetricsService,
  ) {
    this.chain = [apiKeyAuthenticator, bearerTokenAuthenticator];
  }

  async authenticate(
    headers: IncomingHttpHeaders,
    allowed: readonly AuthMethod[] = ALL_AUTH_METHODS,
  ): Promise<Principal> {
    for (const authenticator of this.chain) {
      if (!allowed.includes(authenticator.method)) continue;

      let principal: Principal | null;
      try {
        principal = await authenticator.authenticate(headers);
      } catch (error) {
        if (error instanceof AuthenticationError) {
          this.metrics.authAttemptsTotal.labels(authenticator.method, 'failure').inc();
          this.logger.warn(`Rejected ${authenticator.method} credential: ${error.message}`);
        }
        throw error;
      }
      if (principal) {
        this.metrics.authAttemptsTotal.labels(authenticator.method, 'success').inc();
        return principal;
      }
    }
    throw new AuthenticationError();
  }
}
