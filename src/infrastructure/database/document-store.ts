// src/infrastructure/database/document-store.ts
import { ObjectId } from 'mongodb';
import { TransactionRecord } from '../../core/domain/entities/transaction.entity';
import { RecurringRecord } from '../../core/domain/entities/recurring.entity';
import { ShareRecord } from '../../core/domain/entities/share.entity';

export interface EntityRecords {
    transaction: TransactionRecord;
    recurring: RecurringRecord;
    share: ShareRecord;
}

export type EntityKind = keyof EntityRecords;

/**
 * Entity kind -> collection name. Declared once; nothing derives a
 * collection from a type name.
 */
export const COLLECTIONS = {
    transaction: 'transaction',
    recurring: 'recurring',
    share: 'share'
} as const satisfies Record<EntityKind, string>;

export type DocumentFields = Record<string, unknown>;

/**
 * A document as read back from the store. Fields are untyped: the store
 * may hold documents written by older versions of the service.
 */
export type StoredDocument = DocumentFields & { _id: ObjectId | string };

/** Exact-match equality on every listed field. */
export type DocumentFilter = Readonly<Record<string, string>>;

export interface StoreStatus {
    name: string;
    collections: string[];
}

export interface DocumentStore {
    insert<K extends EntityKind>(kind: K, document: EntityRecords[K]): Promise<string>;
    /** No ordering is guaranteed. Without `limit` every match is returned. */
    find(kind: EntityKind, filter: DocumentFilter, limit?: number): Promise<StoredDocument[]>;
    /** Throws StoreUnavailableException when the store cannot be reached. */
    describe(): Promise<StoreStatus>;
}
