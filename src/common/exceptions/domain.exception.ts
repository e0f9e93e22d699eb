import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Machine-readable error kinds rendered in every error payload as `code`.
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'ValidationError',
  INVALID_PARAMETER = 'InvalidParameter',
  INVALID_ORDERING_FIELD = 'InvalidOrderingField',
  DUPLICATE_REVIEW = 'DuplicateReview',
  INVALID_OR_EXPIRED_TOKEN = 'InvalidOrExpiredToken',
  EMAIL_ALREADY_REGISTERED = 'EmailAlreadyRegistered',
  EMAIL_NOT_FOUND = 'EmailNotFound',
  ACCOUNT_LOCKED = 'AccountLocked',
  NOT_AUTHENTICATED = 'NotAuthenticated',
  PERMISSION_DENIED = 'PermissionDenied',
  NOT_FOUND = 'NotFound',
  CONFLICT = 'Conflict',
  METADATA_UNAVAILABLE = 'MetadataUnavailable',
  SERVER_ERROR = 'ServerError',
}

export type ErrorBody = {
  success: false;
  code: ErrorCode;
  message: string;
};

/**
 * Base class for every error the domain raises on purpose. The message is
 * already translated by the time it gets here.
 */
export abstract class DomainException extends HttpException {
  protected constructor(
    readonly code: ErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    const body: ErrorBody = { success: false, code, message };
    super(body, status);
  }
}

/* ================= 400 ================= */

export class InvalidParameterException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.INVALID_PARAMETER, message, HttpStatus.BAD_REQUEST);
  }
}

export class InvalidOrderingFieldException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.INVALID_ORDERING_FIELD, message, HttpStatus.BAD_REQUEST);
  }
}

export class DuplicateReviewException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.DUPLICATE_REVIEW, message, HttpStatus.BAD_REQUEST);
  }
}

export class InvalidOrExpiredTokenException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.INVALID_OR_EXPIRED_TOKEN, message, HttpStatus.BAD_REQUEST);
  }
}

export class EmailAlreadyRegisteredException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.EMAIL_ALREADY_REGISTERED, message, HttpStatus.BAD_REQUEST);
  }
}

export class EmailNotFoundException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.EMAIL_NOT_FOUND, message, HttpStatus.BAD_REQUEST);
  }
}

/* ================= 401 / 403 ================= */

export class AccountLockedException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.ACCOUNT_LOCKED, message, HttpStatus.UNAUTHORIZED);
  }
}

export class NotAuthenticatedException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.NOT_AUTHENTICATED, message, HttpStatus.UNAUTHORIZED);
  }
}

export class PermissionDeniedException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.PERMISSION_DENIED, message, HttpStatus.FORBIDDEN);
  }
}

/* ================= 404 / 409 / 503 ================= */

export class ResourceNotFoundException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message, HttpStatus.NOT_FOUND);
  }
}

export class ConflictException extends DomainException {
  constructor(message: string) {
    super(ErrorCode.CONFLICT, message, HttpStatus.CONFLICT);
  }
}

export class MetadataUnavailableException extends DomainException {
  constructor(message: string) {
    super(
      ErrorCode.METADATA_UNAVAILABLE,
      message,
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}
