import { Collection, Db } from 'mongodb';
import {
    COLLECTIONS,
    DocumentFilter,
    DocumentStore,
    EntityKind,
    EntityRecords,
    StoreStatus,
    StoredDocument
} from '../document-store';
import { StoreUnavailableException } from '../../../shared/exceptions/infrastructure.exception';
import { logger as rootLogger } from '../../monitoring/logger.service';

const logger = rootLogger.child({ component: 'MongoDocumentStore' });

const MAX_LISTED_COLLECTIONS = 10;

export class MongoDocumentStore implements DocumentStore {
    constructor(private readonly db: Db) {}

    async insert<K extends EntityKind>(kind: K, document: EntityRecords[K]): Promise<string> {
        try {
            const result = await this.collection(kind).insertOne({ ...document });
            const id = result.insertedId.toHexString();

            logger.database('Document inserted', { collection: COLLECTIONS[kind], id });
            return id;
        } catch (error) {
            logger.error('MongoDB insert failed', error, { collection: COLLECTIONS[kind] });
            throw error;
        }
    }

    async find(kind: EntityKind, filter: DocumentFilter, limit?: number): Promise<StoredDocument[]> {
        try {
            const cursor = this.collection(kind).find({ ...filter }, limit === undefined ? {} : { limit });
            const documents = await cursor.toArray();

            logger.database('Documents fetched', {
                collection: COLLECTIONS[kind],
                filter,
                limit,
                count: documents.length
            });

            return documents;
        } catch (error) {
            logger.error('MongoDB find failed', error, { collection: COLLECTIONS[kind], filter, limit });
            throw error;
        }
    }

    async describe(): Promise<StoreStatus> {
        try {
            await this.db.command({ ping: 1 });
            const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();

            return {
                name: this.db.databaseName,
                collections: collections.map(info => info.name).slice(0, MAX_LISTED_COLLECTIONS)
            };
        } catch (error) {
            logger.error('MongoDB health check failed', error);
            throw new StoreUnavailableException('Document store unavailable', {
                reason: error instanceof Error ? error.message : String(error)
            });
        }
    }

    private collection(kind: EntityKind): Collection {
        return this.db.collection(COLLECTIONS[kind]);
    }
}
