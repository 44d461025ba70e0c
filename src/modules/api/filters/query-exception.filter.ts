import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { httpExceptionMessage, ResolvedError } from '../../../common/filters/http-error.util';
import { QueryDeadlineExceededError, QueryValidationError } from '../../../common/errors/rag.errors';
import { errorMessage } from '../../../common/utils/error.util';

/**
 * Renders query failures as `{ error }`.
 */
@Catch()
export class QueryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(QueryExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, message } = this.resolve(exception);
    response.status(status).json({ error: message });
  }

  resolve(exception: unknown): ResolvedError {
    if (exception instanceof QueryValidationError) {
      return { status: HttpStatus.BAD_REQUEST, message: exception.message };
    }
    if (exception instanceof QueryDeadlineExceededError) {
      return { status: HttpStatus.GATEWAY_TIMEOUT, message: exception.message };
    }
    if (exception instanceof HttpException) {
      return { status: exception.getStatus(), message: httpExceptionMessage(exception) };
    }

    this.logger.error(`❌ Unhandled query error: ${errorMessage(exception)}`);
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error' };
  }
}
