import { MongoClient, Db } from 'mongodb';
import { logger as rootLogger } from '../../monitoring/logger.service';

const logger = rootLogger.child({ component: 'MongoDB' });

export interface MongoConnection {
    client: MongoClient;
    db: Db;
}

export interface MongoConnectionOptions {
    uri: string;
    dbName: string;
}

export function maskMongoUri(uri: string): string {
    return uri.replace(/:[^:@/]*@/, ':[HIDDEN]@');
}

/**
 * Opens the client and pings the database. The caller owns the returned
 * connection and must pass it to `disconnectMongoDB` on shutdown.
 */
export async function connectMongoDB({ uri, dbName }: MongoConnectionOptions): Promise<MongoConnection> {
    const client = new MongoClient(uri, {
        maxPoolSize: 20,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
        // Handlers never retry; a failed write surfaces to the caller.
        retryWrites: false,
        retryReads: false
    });

    try {
        await client.connect();
        const db = client.db(dbName);

        await db.command({ ping: 1 });
        logger.info('MongoDB connection established', { dbName });
        return { client, db };
    } catch (error) {
        logger.error('Failed to connect to MongoDB', error, { uri: maskMongoUri(uri) });
        await client.close();
        throw error;
    }
}

export async function disconnectMongoDB(connection: MongoConnection): Promise<void> {
    try {
        await connection.client.close();
        logger.info('MongoDB connection closed gracefully');
    } catch (error) {
        logger.error('Error closing MongoDB connection', error);
        throw error;
    }
}
