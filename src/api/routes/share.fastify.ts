import { FastifyPluginAsync } from 'fastify';
import { ShareFastifyController } from '../controllers/share.fastify.controller';
import { RouteDependencies } from './route.types';

const shareRoutes: FastifyPluginAsync<RouteDependencies> = async (fastify, { store, clock }) => {
    const controller = new ShareFastifyController(store, clock);

    fastify.post('/share', {
        schema: { tags: ['Sharing'], description: 'Issue a read-only dashboard token for a client' }
    }, controller.create.bind(controller));

    fastify.get('/share/:token', {
        schema: { tags: ['Sharing'], description: 'Shared dashboard: balance, transactions and category totals' }
    }, controller.resolve.bind(controller));
};

export default shareRoutes;
