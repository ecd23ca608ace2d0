// src/api/middlewares/error-handler.middleware.ts
import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { BaseException } from '../../shared/exceptions/base.exception';
import { ValidationException } from '../../shared/exceptions/validation.exception';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { ApiErrorBody } from '../../shared/types/common.types';
import { logger } from '../../infrastructure/monitoring/logger.service';

export interface ErrorHandlerOptions {
    /** Hide messages of unexpected errors from clients. */
    exposeInternalErrors: boolean;
}

function isClientError(statusCode: number | undefined): statusCode is number {
    return statusCode !== undefined && statusCode >= 400 && statusCode < 500;
}

export function toErrorResponse(
    error: FastifyError,
    options: ErrorHandlerOptions
): { statusCode: number; body: ApiErrorBody } {
    if (error instanceof ValidationException) {
        return {
            statusCode: error.statusCode,
            body: {
                success: false,
                message: error.message,
                code: error.code,
                errors: error.validationErrors
            }
        };
    }

    if (error instanceof BaseException) {
        const internal = error.statusCode >= HTTP_STATUS.INTERNAL_ERROR && !options.exposeInternalErrors;
        return {
            statusCode: error.statusCode,
            body: {
                success: false,
                message: error.message,
                code: error.code,
                ...(error.details !== undefined && !internal && { errors: error.details })
            }
        };
    }

    // Fastify's own rejections: malformed JSON, unsupported media type, ...
    if (isClientError(error.statusCode)) {
        return {
            statusCode: error.statusCode,
            body: {
                success: false,
                message: error.message,
                code: error.code || 'BAD_REQUEST'
            }
        };
    }

    return {
        statusCode: HTTP_STATUS.INTERNAL_ERROR,
        body: {
            success: false,
            message: options.exposeInternalErrors ? error.message : 'An internal server error occurred',
            code: 'INTERNAL_ERROR'
        }
    };
}

export function createErrorHandler(options: ErrorHandlerOptions) {
    return (error: FastifyError, request: FastifyRequest, reply: FastifyReply): FastifyReply => {
        const { statusCode, body } = toErrorResponse(error, options);
        const meta = {
            method: request.method,
            url: request.url,
            statusCode,
            code: body.code
        };

        if (statusCode >= HTTP_STATUS.INTERNAL_ERROR) {
            logger.error('Request failed', error, meta);
        } else {
            logger.warn('Request rejected', { ...meta, message: body.message });
        }

        return reply.status(statusCode).send(body);
    };
}
