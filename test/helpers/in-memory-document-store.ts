import { ObjectId } from 'mongodb';
import {
    COLLECTIONS,
    DocumentFields,
    DocumentFilter,
    DocumentStore,
    EntityKind,
    EntityRecords,
    StoreStatus,
    StoredDocument
} from '../../src/infrastructure/database/document-store';
import { StoreUnavailableException } from '../../src/shared/exceptions/infrastructure.exception';

/**
 * In-process stand-in for MongoDocumentStore. Documents come back in
 * insertion order, which is what an unsorted Mongo find usually yields.
 */
export class InMemoryDocumentStore implements DocumentStore {
    private readonly collections = new Map<string, StoredDocument[]>();
    private failure: Error | null = null;

    async insert<K extends EntityKind>(kind: K, document: EntityRecords[K]): Promise<string> {
        this.throwIfFailing();
        const id = new ObjectId();
        this.documents(kind).push({ ...document, _id: id });
        return id.toHexString();
    }

    async find(kind: EntityKind, filter: DocumentFilter, limit?: number): Promise<StoredDocument[]> {
        this.throwIfFailing();
        const matches = this.documents(kind)
            .filter(document => Object.entries(filter).every(([field, value]) => document[field] === value))
            .map(document => ({ ...document }));

        return limit === undefined ? matches : matches.slice(0, limit);
    }

    async describe(): Promise<StoreStatus> {
        if (this.failure) {
            throw new StoreUnavailableException('Document store unavailable', { reason: this.failure.message });
        }
        return { name: 'in-memory', collections: [...this.collections.keys()] };
    }

    /** Writes a raw document, bypassing entity rules (legacy or malformed data). */
    seed(kind: EntityKind, fields: DocumentFields): string {
        const id = new ObjectId();
        this.documents(kind).push({ ...fields, _id: id });
        return id.toHexString();
    }

    all(kind: EntityKind): StoredDocument[] {
        return this.documents(kind).map(document => ({ ...document }));
    }

    /** Every following call fails with `error` until `recover()`. */
    failWith(error: Error): void {
        this.failure = error;
    }

    recover(): void {
        this.failure = null;
    }

    private throwIfFailing(): void {
        if (this.failure) {
            throw this.failure;
        }
    }

    private documents(kind: EntityKind): StoredDocument[] {
        const name = COLLECTIONS[kind];
        let documents = this.collections.get(name);
        if (!documents) {
            documents = [];
            this.collections.set(name, documents);
        }
        return documents;
    }
}
