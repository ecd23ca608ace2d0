// src/shared/exceptions/infrastructure.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';

export class InfrastructureException extends BaseException {
    constructor(
        message: string,
        code: string = 'INFRASTRUCTURE_ERROR',
        statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
        details?: unknown
    ) {
        super(message, code, statusCode, details);
    }
}

/**
 * The document store could not be reached or is misconfigured.
 * Only the diagnostic endpoint reports this as 503; business endpoints
 * let raw store errors surface as a 500.
 */
export class StoreUnavailableException extends InfrastructureException {
    constructor(message: string = 'Document store unavailable', details?: unknown) {
        super(message, 'STORE_UNAVAILABLE', HTTP_STATUS.SERVICE_UNAVAILABLE, details);
    }
}
