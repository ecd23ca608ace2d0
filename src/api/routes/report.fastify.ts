import { FastifyPluginAsync } from 'fastify';
import { ReportFastifyController } from '../controllers/report.fastify.controller';
import { RouteDependencies } from './route.types';

const reportRoutes: FastifyPluginAsync<RouteDependencies> = async (fastify, { store }) => {
    const controller = new ReportFastifyController(store);

    fastify.get('/categories', {
        schema: { tags: ['Reports'], description: 'Per-category totals for a client' }
    }, controller.categoryTotals.bind(controller));
};

export default reportRoutes;
