import { MongoClient, MongoServerSelectionError } from 'mongodb';
import { MongoDocumentStore } from '../../../src/infrastructure/database/mongodb/mongo-document-store';
import { LoggerService } from '../../../src/infrastructure/monitoring/logger.service';
import { StoreUnavailableException } from '../../../src/shared/exceptions/infrastructure.exception';

// Nothing listens on port 1, so every operation fails server selection.
describe('MongoDocumentStore with an unreachable server', () => {
    let client: MongoClient;
    let store: MongoDocumentStore;
    let errorSpy: jest.SpyInstance;

    beforeAll(() => {
        client = new MongoClient('mongodb://127.0.0.1:1', {
            directConnection: true,
            serverSelectionTimeoutMS: 100
        });
        store = new MongoDocumentStore(client.db('spendings_test'));
    });

    afterAll(async () => {
        await client.close();
    });

    beforeEach(() => {
        errorSpy = jest.spyOn(LoggerService.prototype, 'error');
    });

    afterEach(() => {
        errorSpy.mockRestore();
    });

    it('should log and rethrow the driver error on insert', async () => {
        await expect(store.insert('share', {
            client_id: 'c1',
            token: 'abcdef0123',
            created_at: new Date('2024-06-15T12:00:00.000Z')
        })).rejects.toBeInstanceOf(MongoServerSelectionError);

        expect(errorSpy).toHaveBeenCalledWith(
            'MongoDB insert failed',
            expect.any(MongoServerSelectionError),
            { collection: 'share' }
        );
    });

    it('should log and rethrow the driver error on find', async () => {
        await expect(store.find('share', { token: 'abcdef0123' }, 1))
            .rejects.toBeInstanceOf(MongoServerSelectionError);

        expect(errorSpy).toHaveBeenCalledWith(
            'MongoDB find failed',
            expect.any(MongoServerSelectionError),
            { collection: 'share', filter: { token: 'abcdef0123' }, limit: 1 }
        );
    });

    it('should report the store as unavailable on describe', async () => {
        await expect(store.describe()).rejects.toBeInstanceOf(StoreUnavailableException);
    });
});
