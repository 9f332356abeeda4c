import { HttpStatus } from '@nestjs/common';

/**
 * Base class for errors raised by the configuration store and the auth kernel.
 *
 * Services never throw Nest HttpExceptions directly; HttpExceptionFilter maps
 * `status` and `code` onto the response at the boundary.
 */
export abstract class DomainError extends Error {
  abstract readonly status: HttpStatus;

  constructor(
    message: string,
    readonly code: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing, malformed, expired or otherwise unusable credential. */
export class AuthenticationError extends DomainError {
  readonly status = HttpStatus.UNAUTHORIZED;

  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHENTICATED');
  }
}

/** Valid principal without the role or scope an operation needs. */
export class AuthorizationError extends DomainError {
  readonly status = HttpStatus.FORBIDDEN;

  constructor(message = 'Insufficient permissions') {
    super(message, 'FORBIDDEN');
  }
}

/** Absent entity, or an entity that belongs to another tenant. */
export class NotFoundError extends DomainError {
  readonly status = HttpStatus.NOT_FOUND;

  constructor(entity: string) {
    super(`${entity} not found`, 'NOT_FOUND');
  }
}

export class ConflictError extends DomainError {
  readonly status = HttpStatus.CONFLICT;

  constructor(message: string, code = 'CONFLICT') {
    super(message, code);
  }
}

/** A value that does not fit its declared type or validation schema. */
export class ValidationError extends DomainError {
  readonly status = HttpStatus.BAD_REQUEST;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/** Request would break an ownership invariant (self-deletion, last owner, ...). */
export class PolicyViolationError extends DomainError {
  readonly status = HttpStatus.BAD_REQUEST;

  constructor(message: string) {
    super(message, 'POLICY_VIOLATION');
  }
}

/** Stored ciphertext could not be decrypted with the configured key. */
export class EncryptionError extends DomainError {
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(message = 'Stored value could not be decrypted') {
    super(message, 'ENCRYPTION_ERROR');
  }
}
