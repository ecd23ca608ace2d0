// src/api/controllers/transaction.fastify.controller.ts
import { FastifyRequest, FastifyReply } from 'fastify';
import { CreateTransactionUseCase } from '../../core/application/use-cases/transaction/create-transaction.use-case';
import { ListTransactionsUseCase } from '../../core/application/use-cases/transaction/list-transactions.use-case';
import { GetBalanceUseCase } from '../../core/application/use-cases/transaction/get-balance.use-case';
import { validateInput } from '../../core/validator';
import { DocumentStore } from '../../infrastructure/database/document-store';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { Clock } from '../../shared/types/common.types';
import {
    clientQuerySchema,
    createTransactionSchema,
    listTransactionsQuerySchema
} from '../validators/transaction.validator';

export class TransactionFastifyController {
    private readonly createTransactionUseCase: CreateTransactionUseCase;
    private readonly listTransactionsUseCase: ListTransactionsUseCase;
    private readonly getBalanceUseCase: GetBalanceUseCase;

    constructor(store: DocumentStore, clock: Clock) {
        this.createTransactionUseCase = new CreateTransactionUseCase(store, clock);
        this.listTransactionsUseCase = new ListTransactionsUseCase(store);
        this.getBalanceUseCase = new GetBalanceUseCase(store);
    }

    /**
     * POST /transactions
     */
    async create(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const body = validateInput(createTransactionSchema, request.body, 'body');

        const result = await this.createTransactionUseCase.execute({
            clientId: body.client_id,
            amount: body.amount,
            category: body.category,
            note: body.note,
            type: body.type,
            date: body.date
        });

        return reply.code(HTTP_STATUS.CREATED).send(result);
    }

    /**
     * GET /transactions?client_id&category&limit
     */
    async list(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const query = validateInput(listTransactionsQuerySchema, request.query, 'query');

        const result = await this.listTransactionsUseCase.execute({
            clientId: query.client_id,
            category: query.category,
            limit: query.limit
        });

        return reply.code(HTTP_STATUS.SUCCESS).send(result);
    }

    /**
     * GET /balance?client_id
     */
    async balance(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const query = validateInput(clientQuerySchema, request.query, 'query');
        const result = await this.getBalanceUseCase.execute({ clientId: query.client_id });

        return reply.code(HTTP_STATUS.SUCCESS).send(result);
    }
}
