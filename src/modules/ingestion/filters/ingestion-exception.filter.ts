import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { httpExceptionMessage, ResolvedError } from '../../../common/filters/http-error.util';
import {
    DimensionMismatchError,
    InvalidChunkError,
    UnsupportedUploadError,
} from '../../../common/errors/rag.errors';
import { errorMessage } from '../../../common/utils/error.util';

/**
 * Renders ingestion failures as `{ success: false, message }`.
 */
@Catch()
export class IngestionExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(IngestionExceptionFilter.name);

    catch(exception: unknown, host: ArgumentsHost): void {
        const response = host.switchToHttp().getResponse<Response>();
        const { status, message } = this.resolve(exception);
        response.status(status).json({ success: false, message });
    }

    resolve(exception: unknown): ResolvedError {
        if (exception instanceof UnsupportedUploadError) {
            return { status: HttpStatus.BAD_REQUEST, message: exception.message };
        }
        if (exception instanceof DimensionMismatchError || exception instanceof InvalidChunkError) {
            this.logger.warn(`⚠️ Insertion rejected: ${exception.message}`);
            return { status: HttpStatus.UNPROCESSABLE_ENTITY, message: exception.message };
        }
        if (exception instanceof HttpException) {
            return { status: exception.getStatus(), message: httpExceptionMessage(exception) };
        }

        this.logger.error(`❌ Ingestion failed: ${errorMessage(exception)}`);
        return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error' };
    }
}
