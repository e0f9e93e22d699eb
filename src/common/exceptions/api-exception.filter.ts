import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { DomainException, ErrorCode } from './domain.exception';
import { FormattedErrors, ValidationException } from './validation.exception';

export type ApiErrorPayload = {
  success: false;
  code: ErrorCode;
  error: string;
  errors?: FormattedErrors;
};

const CODE_BY_STATUS: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ErrorCode.VALIDATION_ERROR,
  [HttpStatus.UNAUTHORIZED]: ErrorCode.NOT_AUTHENTICATED,
  [HttpStatus.FORBIDDEN]: ErrorCode.PERMISSION_DENIED,
  [HttpStatus.NOT_FOUND]: ErrorCode.NOT_FOUND,
  [HttpStatus.CONFLICT]: ErrorCode.CONFLICT,
};

const SERVER_ERROR_MESSAGE = 'A server error occurred.';

/**
 * Renders every failure as `{ success: false, code, error }`.
 *
 *  ValidationException  → 400 ValidationError, first field message + `errors`
 *  DomainException      → its own status and code
 *  other HttpException  → status mapped to the closest code
 *  anything else        → logged, 500 ServerError with a generic message
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toPayload(exception);

    response.status(status).json(body);
  }

  toPayload(exception: unknown): { status: number; body: ApiErrorPayload } {
    if (exception instanceof ValidationException) {
      return {
        status: HttpStatus.BAD_REQUEST,
        body: {
          success: false,
          code: ErrorCode.VALIDATION_ERROR,
          error: exception.firstMessage,
          errors: exception.validationErrors,
        },
      };
    }

    if (exception instanceof DomainException) {
      return {
        status: exception.getStatus(),
        body: { success: false, code: exception.code, error: exception.message },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();

      if (status >= 500) {
        this.logger.error(exception.message, exception.stack);
        return this.serverError(status);
      }

      return {
        status,
        body: {
          success: false,
          code: CODE_BY_STATUS[status] ?? ErrorCode.VALIDATION_ERROR,
          error: exception.message,
        },
      };
    }

    if (exception instanceof Error) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.error(`Non-error thrown: ${String(exception)}`);
    }

    return this.serverError(HttpStatus.INTERNAL_SERVER_ERROR);
  }

  private serverError(status: number): {
    status: number;
    body: ApiErrorPayload;
  } {
    return {
      status,
      body: {
        success: false,
        code: ErrorCode.SERVER_ERROR,
        error: SERVER_ERROR_MESSAGE,
      },
    };
  }
}
