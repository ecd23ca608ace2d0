import dotenv from 'dotenv';
import path from 'path';

const envFile = process.env.NODE_ENV === 'production'
    ? '.env.production'
    : process.env.NODE_ENV === 'test'
        ? '.env.test'
        : '.env.development';

dotenv.config({ path: path.join(__dirname, '..', envFile) });
dotenv.config(); // Fallback to default .env

import App from './app';
import { ConfigService } from './config/environment';
import { connectMongoDB, disconnectMongoDB, MongoConnection } from './infrastructure/database/mongodb/connection';
import { MongoDocumentStore } from './infrastructure/database/mongodb/mongo-document-store';
import { logger } from './infrastructure/monitoring/logger.service';

/**
 * Owns the process lifecycle: configuration, the Mongo connection handed to
 * every handler, and graceful shutdown.
 */
class Server {
    private app: App | null = null;
    private connection: MongoConnection | null = null;

    constructor(private readonly config: ConfigService) {
        this.setupShutdownHandlers();
    }

    private setupShutdownHandlers(): void {
        const gracefulShutdown = async (signal: string): Promise<void> => {
            logger.info(`${signal} received. Starting graceful shutdown...`);

            try {
                await this.stop();
                logger.info('Graceful shutdown completed');
                process.exit(0);
            } catch (error) {
                logger.error('Error during shutdown', error);
                process.exit(1);
            }
        };

        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

        process.on('uncaughtException', (error) => {
            logger.fatal('Uncaught exception', error);
            process.exit(1);
        });

        process.on('unhandledRejection', (reason) => {
            logger.fatal('Unhandled rejection', reason);
            process.exit(1);
        });
    }

    public async start(): Promise<void> {
        this.connection = await connectMongoDB({
            uri: this.config.get('MONGODB_URI'),
            dbName: this.config.get('MONGODB_DB')
        });

        this.app = new App(
            { store: new MongoDocumentStore(this.connection.db) },
            {
                environment: this.config.get('NODE_ENV'),
                host: this.config.get('HOST'),
                port: this.config.get('PORT'),
                corsOrigin: this.config.getCorsOrigin(),
                enableSwagger: this.config.get('ENABLE_SWAGGER')
            }
        );

        await this.app.initialize();
        await this.app.start();
    }

    public async stop(): Promise<void> {
        if (this.app) {
            await this.app.close();
            this.app = null;
        }
        if (this.connection) {
            await disconnectMongoDB(this.connection);
            this.connection = null;
        }
        logger.flush();
    }
}

async function main(): Promise<void> {
    const server = new Server(new ConfigService());
    await server.start();
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.fatal('Failed to start application', error);
        process.exit(1);
    });
}

export default Server;
