// src/core/domain/entities/share.entity.ts
import { v4 as uuid } from 'uuid';

export const SHARE_TOKEN_LENGTH = 10;

/**
 * Bearer capability over one client's data. Never expires.
 */
export type ShareRecord = {
    client_id: string;
    token: string;
    created_at: Date;
};

/**
 * First 10 hex digits of a v4 UUID (about 40 bits). Collisions are not
 * checked; lookups return the first matching share.
 */
export function generateShareToken(): string {
    return uuid().replace(/-/g, '').slice(0, SHARE_TOKEN_LENGTH);
}

export function buildShare(clientId: string, token: string, now: Date): ShareRecord {
    return {
        client_id: clientId,
        token,
        created_at: now
    };
}
