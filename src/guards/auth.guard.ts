import {
  CanActivate,
  ExecutionContext,
  Injectable,
  SetMetadata,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthenticationGateway } from '../auth/authentication-gateway.service';
import { AuthenticatedRequest } from '../auth/principal';

export const USER_ONLY_KEY = 'auth:userOnly';

/** Restricts a route or controller to bearer-token users; API keys are not tried. */
export const UserOnly = () => SetMetadata(USER_ONLY_KEY, true);

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private readonly gateway: AuthenticationGateway,
    private readonly reflector: Reflector,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const userOnly = this.reflector.getAllAndOverride<boolean | undefined>(
      USER_ONLY_KEY,
      [context.getHandler(), context.getClass()],
    );
    req.principal = await this.gateway.authenticate(
      req.headers,
      userOnly ? ['user'] : undefined,
    );
    return true;
  }
}
