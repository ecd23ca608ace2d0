// src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';
import { HTTP_STATUS } from '../constants/status-codes';

export interface FieldViolation {
    field: string;
    message: string;
}

export class ValidationException extends BaseException {
    public readonly validationErrors: FieldViolation[];

    constructor(message: string, validationErrors: FieldViolation[] = []) {
        super(message, 'VALIDATION_ERROR', HTTP_STATUS.BAD_REQUEST, validationErrors);
        this.validationErrors = validationErrors;
    }
}
