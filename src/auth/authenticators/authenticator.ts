import type { IncomingHttpHeaders } from 'http';
import { AuthMethod, Principal } from '../principal';

/**
 * One credential strategy in the authentication chain.
 *
 * Returns null when its credential is absent ("not applicable"); throws
 * AuthenticationError when the credential is present but unusable.
 */
export interface Authenticator {
  readonly method: AuthMethod;
  authenticate(headers: IncomingHttpHeaders): Promise<Principal | null>;
}

export function headerValue(
  headers: IncomingHttpHeaders,
  name: string,
): string | undefined {
  const raw = headers[name.toLowerCase()];
  return Array.isArray(raw) ? raw[0] : raw;
}
