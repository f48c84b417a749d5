import {
  Catch,
  HttpException,
  HttpStatus,
  Logger,
  type ArgumentsHost,
  type ExceptionFilter,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  DomainError,
  DuplicateEntryError,
  InvalidCodeError,
  TooSoonError,
  ValidationError,
  type DomainErrorCode,
  type FieldError,
} from '@campus-id/domain';

const statusByCode: { readonly [C in DomainErrorCode]: HttpStatus } = {
  VALIDATION_FAILED: HttpStatus.BAD_REQUEST,
  FORBIDDEN: HttpStatus.FORBIDDEN,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  CONFLICT: HttpStatus.CONFLICT,
  DUPLICATE_ENTRY: HttpStatus.CONFLICT,
  CODE_EXPIRED: HttpStatus.UNPROCESSABLE_ENTITY,
  INVALID_CODE: HttpStatus.UNPROCESSABLE_ENTITY,
  TOO_MANY_ATTEMPTS: HttpStatus.UNPROCESSABLE_ENTITY,
  TOO_SOON: HttpStatus.TOO_MANY_REQUESTS,
  INVALID_STATUS: HttpStatus.CONFLICT,
  INVALID_INVITATION: HttpStatus.UNPROCESSABLE_ENTITY,
  INVALID_CREDENTIALS: HttpStatus.UNAUTHORIZED,
  NO_ROWS_AFFECTED: HttpStatus.CONFLICT,
};

export type ErrorResponseBody = {
  code: DomainErrorCode | 'INTERNAL_ERROR';
  message: string;
  fields?: ReadonlyArray<FieldError>;
  field?: string;
  attemptsLeft?: number;
};

function toErrorResponse(error: DomainError): {
  status: HttpStatus;
  body: ErrorResponseBody;
} {
  const body: ErrorResponseBody = { code: error.code, message: error.message };
  if (error instanceof ValidationError) {
    body.fields = error.fields;
  }
  if (error instanceof DuplicateEntryError) {
    body.field = error.field;
  }
  if (error instanceof InvalidCodeError) {
    body.attemptsLeft = error.attemptsLeft;
  }
  return { status: statusByCode[error.code], body };
}

/**
 * Maps domain errors to `{ code, message }` responses. Nest HTTP exceptions
 * keep their own status and body. Anything else is logged and answered
 * with a bare 500.
 */
@Catch()
export class DomainErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof DomainError) {
      const { status, body } = toErrorResponse(exception);
      if (exception instanceof TooSoonError) {
        response.setHeader(
          'Retry-After',
          String(Math.ceil(exception.retryAfterMs / 1000))
        );
      }
      response.status(status).json(body);
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      response
        .status(status)
        .json(
          typeof body === 'string' ? { statusCode: status, message: body } : body
        );
      return;
    }

    this.logger.error(
      'Unhandled error',
      exception instanceof Error ? exception.stack : String(exception)
    );
    const body: ErrorResponseBody = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}
