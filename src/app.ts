import fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import transactionRoutes from './api/routes/transaction.fastify';
import recurringRoutes from './api/routes/recurring.fastify';
import shareRoutes from './api/routes/share.fastify';
import reportRoutes from './api/routes/report.fastify';
import healthRoutes from './api/routes/health.fastify';
import { createErrorHandler } from './api/middlewares/error-handler.middleware';
import { DocumentStore } from './infrastructure/database/document-store';
import { logger } from './infrastructure/monitoring/logger.service';
import { HTTP_STATUS } from './shared/constants/status-codes';
import { Clock, systemClock } from './shared/types/common.types';

export interface AppConfig {
    apiPrefix: string;
    environment: 'development' | 'test' | 'production';
    host: string;
    port: number;
    corsOrigin: string | string[];
    enableSwagger: boolean;
}

export interface AppDependencies {
    store: DocumentStore;
    clock?: Clock;
}

const DEFAULT_CONFIG: AppConfig = {
    apiPrefix: '/api',
    environment: 'development',
    host: '0.0.0.0',
    port: 8000,
    corsOrigin: '*',
    enableSwagger: false
};

export class App {
    private readonly fastify: FastifyInstance;
    private readonly config: AppConfig;
    private readonly store: DocumentStore;
    private readonly clock: Clock;

    constructor(dependencies: AppDependencies, config: Partial<AppConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.store = dependencies.store;
        this.clock = dependencies.clock ?? systemClock;

        this.fastify = fastify({
            logger: false,
            trustProxy: true,
            requestTimeout: 30000,
            bodyLimit: 1048576 // 1MB
        });
    }

    public async initialize(): Promise<void> {
        try {
            await this.setupPlugins();
            this.setupHooks();
            await this.setupRoutes();
            await this.fastify.ready();

            logger.info('Application initialized', { environment: this.config.environment });
        } catch (error) {
            logger.error('Failed to initialize application', error);
            throw error;
        }
    }

    private async setupPlugins(): Promise<void> {
        await this.fastify.register(cors, {
            origin: this.config.corsOrigin
        });

        if (this.config.enableSwagger) {
            await this.fastify.register(swagger, {
                openapi: {
                    info: {
                        title: 'Spendings API',
                        description: 'Income and expense tracking, recurring reminders and shareable dashboards',
                        version: '1.0.0'
                    },
                    tags: [
                        { name: 'Health', description: 'Store diagnostics' },
                        { name: 'Transactions', description: 'Transaction intake and balance' },
                        { name: 'Recurring', description: 'Recurring schedules and reminders' },
                        { name: 'Sharing', description: 'Read-only dashboard links' },
                        { name: 'Reports', description: 'Category aggregation' }
                    ]
                }
            });

            await this.fastify.register(swaggerUi, {
                routePrefix: '/docs',
                uiConfig: {
                    docExpansion: 'list',
                    deepLinking: false
                }
            });
        }
    }

    private setupHooks(): void {
        this.fastify.setErrorHandler(createErrorHandler({
            exposeInternalErrors: this.config.environment !== 'production'
        }));

        this.fastify.addHook('onResponse', async (request, reply) => {
            logger.http(`${request.method} ${request.url}`, {
                statusCode: reply.statusCode,
                responseTime: Math.round(reply.elapsedTime)
            });
        });
    }

    private async setupRoutes(): Promise<void> {
        const prefix = this.config.apiPrefix;
        const dependencies = { store: this.store, clock: this.clock };

        this.fastify.get('/', async (request, reply) => {
            return reply.code(HTTP_STATUS.SUCCESS).send({ message: 'Spendings API running' });
        });

        await this.fastify.register(healthRoutes, { prefix, store: this.store });
        await this.fastify.register(transactionRoutes, { prefix, ...dependencies });
        await this.fastify.register(recurringRoutes, { prefix, ...dependencies });
        await this.fastify.register(shareRoutes, { prefix, ...dependencies });
        await this.fastify.register(reportRoutes, { prefix, ...dependencies });
    }

    public async start(): Promise<void> {
        await this.fastify.listen({
            host: this.config.host,
            port: this.config.port
        });

        logger.info(`Server is running on http://${this.config.host}:${this.config.port}`);
    }

    public async close(): Promise<void> {
        await this.fastify.close();
        logger.info('Server closed');
    }

    public getFastifyInstance(): FastifyInstance {
        return this.fastify;
    }
}

export default App;
