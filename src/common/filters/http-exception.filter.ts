import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { AuthenticatedRequest } from '../../auth/principal';
import { DomainError } from '../errors/domain.errors';

export interface ErrorEnvelope {
  success: false;
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  path: string;
  traceId?: string;
  timestamp: string;
}

interface ErrorShape {
  status: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

const ERROR_CODE = /^[A-Z][A-Z0-9_]*$/;

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<AuthenticatedRequest>();

    const shape = this.describe(exception);
    if (shape.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.originalUrl} failed: ${shape.code}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }
    if (shape.status === HttpStatus.UNAUTHORIZED) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }

    const payload: ErrorEnvelope = {
      success: false,
      statusCode: shape.status,
      code: shape.code,
      message: shape.message,
      path: request.originalUrl,
      traceId: request.requestId ?? firstHeader(request.headers['x-request-id']),
      timestamp: new Date().toISOString(),
    };
    if (shape.details) payload.details = shape.details;

    response.status(shape.status).json(payload);
  }

  private describe(exception: unknown): ErrorShape {
    if (exception instanceof DomainError) {
      return {
        status: exception.status,
        code: exception.code,
        message: exception.message,
        details: exception.details,
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const fallbackCode = HttpStatus[status] ?? 'HTTP_ERROR';
      const res = exception.getResponse();
      if (typeof res === 'string') {
        return { status, code: fallbackCode, message: res };
      }

      let message = exception.message;
      let code = fallbackCode;
      let details: Record<string, unknown> | undefined;
      if ('message' in res) {
        const raw: unknown = res.message;
        if (Array.isArray(raw)) {
          message = raw.map(String).join('; ');
          details = { errors: raw };
        } else if (typeof raw === 'string') {
          message = raw;
        }
      }
      if ('error' in res && typeof res.error === 'string' && ERROR_CODE.test(res.error)) {
        code = res.error;
      }
      if ('details' in res && isRecord(res.details)) {
        details = res.details;
      }
      return { status, code, message, details };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
  }
}

// Guard rejections happen before RequestIdInterceptor runs.
function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
