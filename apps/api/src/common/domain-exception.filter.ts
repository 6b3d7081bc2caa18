import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import {
  PortfolioNotFoundError,
  PortfolioPreconditionError,
  ValidationError,
} from '@folio/db';
import type { Response } from 'express';

type DomainError = ValidationError | PortfolioNotFoundError | PortfolioPreconditionError;

export function statusOf(error: DomainError): HttpStatus {
  if (error instanceof ValidationError) return HttpStatus.BAD_REQUEST;
  if (error instanceof PortfolioNotFoundError) return HttpStatus.NOT_FOUND;
  return HttpStatus.CONFLICT;
}

/** Domain errors to `{ statusCode, message, error }`, like Nest's own exceptions. */
@Catch(ValidationError, PortfolioNotFoundError, PortfolioPreconditionError)
export class DomainExceptionFilter implements ExceptionFilter<DomainError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: DomainError, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const status = statusOf(exception);

    this.logger.warn(exception.message);

    res.status(status).json({
      statusCode: status,
      message: exception.message,
      error: exception.name,
      ...(exception instanceof ValidationError ? { violations: exception.violations } : {}),
    });
  }
}
