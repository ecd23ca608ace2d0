import { FastifyPluginAsync } from 'fastify';
import { RecurringFastifyController } from '../controllers/recurring.fastify.controller';
import { RouteDependencies } from './route.types';

const recurringRoutes: FastifyPluginAsync<RouteDependencies> = async (fastify, { store, clock }) => {
    const controller = new RecurringFastifyController(store, clock);

    fastify.post('/recurring', {
        schema: { tags: ['Recurring'], description: 'Create a recurring payment schedule' }
    }, controller.create.bind(controller));

    fastify.get('/recurring', {
        schema: { tags: ['Recurring'], description: 'List a client\'s recurring schedules' }
    }, controller.list.bind(controller));

    fastify.get('/reminders', {
        schema: { tags: ['Recurring'], description: 'Recurring items whose next due date has passed' }
    }, controller.reminders.bind(controller));
};

export default recurringRoutes;
