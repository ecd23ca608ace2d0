// src/api/routes/health.fastify.ts
import { FastifyPluginAsync } from 'fastify';
import { RouteDependencies } from './route.types';

/**
 * Store diagnostic. A store that cannot be reached surfaces here as 503
 * through StoreUnavailableException.
 */
const healthRoutes: FastifyPluginAsync<Pick<RouteDependencies, 'store'>> = async (fastify, { store }) => {
    fastify.get('/health', {
        schema: { tags: ['Health'], description: 'Backend and document store status' }
    }, async () => {
        const status = await store.describe();

        return {
            status: 'healthy',
            backend: 'running',
            database: 'connected',
            database_name: status.name,
            collections: status.collections,
            uptime: process.uptime(),
            timestamp: new Date().toISOString()
        };
    });
};

export default healthRoutes;
