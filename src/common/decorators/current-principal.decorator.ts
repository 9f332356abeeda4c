import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { AuthenticationError } from '../errors/domain.errors';
import { AuthenticatedRequest, Principal } from '../../auth/principal';

export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.principal) {
      throw new AuthenticationError();
    }
    return request.principal;
  },
);
