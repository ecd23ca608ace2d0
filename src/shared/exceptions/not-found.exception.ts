// src/shared/exceptions/not-found.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';

export class NotFoundException extends BaseException {
    constructor(message: string, details?: unknown) {
        super(message, 'NOT_FOUND_ERROR', HTTP_STATUS.NOT_FOUND, details);
    }
}
