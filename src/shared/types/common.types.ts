// src/shared/types/common.types.ts

/** Source of "now" for defaults and due-date checks. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface ApiErrorBody {
    success: false;
    message: string;
    code: string;
    errors?: unknown;
}
