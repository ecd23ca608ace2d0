// src/shared/constants/status-codes.ts
export const HTTP_STATUS = {
    // Success
    SUCCESS: 200,
    CREATED: 201,

    // Client Errors
    BAD_REQUEST: 400,
    NOT_FOUND: 404,

    // Server Errors
    INTERNAL_ERROR: 500,
    SERVICE_UNAVAILABLE: 503
} as const;
