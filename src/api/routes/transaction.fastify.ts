import { FastifyPluginAsync } from 'fastify';
import { TransactionFastifyController } from '../controllers/transaction.fastify.controller';
import { RouteDependencies } from './route.types';

const transactionRoutes: FastifyPluginAsync<RouteDependencies> = async (fastify, { store, clock }) => {
    const controller = new TransactionFastifyController(store, clock);

    fastify.post('/transactions', {
        schema: {
            tags: ['Transactions'],
            description: 'Record an income or expense; the sign of the amount follows the type'
        }
    }, controller.create.bind(controller));

    fastify.get('/transactions', {
        schema: {
            tags: ['Transactions'],
            description: 'List a client\'s transactions, newest first'
        }
    }, controller.list.bind(controller));

    fastify.get('/balance', {
        schema: {
            tags: ['Transactions'],
            description: 'Sum of every transaction amount for a client'
        }
    }, controller.balance.bind(controller));
};

export default transactionRoutes;
