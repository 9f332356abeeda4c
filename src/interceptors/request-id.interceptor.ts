import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { Response } from 'express';
import { randomUUID } from 'crypto';
import { Observable } from 'rxjs';
import { AuthenticatedRequest } from '../auth/principal';

export const REQUEST_ID_HEADER = 'x-request-id';

// Accept caller ids that are safe to echo back into a header and a log line.
const SAFE_ID = /^[A-Za-z0-9._:-]{1,128}$/;

@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const res = context.switchToHttp().getResponse<Response>();
    const incoming = req.headers[REQUEST_ID_HEADER] ?? req.headers['x-correlation-id'];
    const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
    const id = candidate && SAFE_ID.test(candidate) ? candidate : randomUUID();
    req.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    return next.handle();
  }
}
