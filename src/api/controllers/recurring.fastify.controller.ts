import { FastifyRequest, FastifyReply } from 'fastify';
import { CreateRecurringUseCase } from '../../core/application/use-cases/recurring/create-recurring.use-case';
import { ListRecurringUseCase } from '../../core/application/use-cases/recurring/list-recurring.use-case';
import { ListRemindersUseCase } from '../../core/application/use-cases/recurring/list-reminders.use-case';
import { validateInput } from '../../core/validator';
import { DocumentStore } from '../../infrastructure/database/document-store';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { Clock } from '../../shared/types/common.types';
import { createRecurringSchema } from '../validators/recurring.validator';
import { clientQuerySchema } from '../validators/transaction.validator';

export class RecurringFastifyController {
    private readonly createRecurringUseCase: CreateRecurringUseCase;
    private readonly listRecurringUseCase: ListRecurringUseCase;
    private readonly listRemindersUseCase: ListRemindersUseCase;

    constructor(store: DocumentStore, clock: Clock) {
        this.createRecurringUseCase = new CreateRecurringUseCase(store, clock);
        this.listRecurringUseCase = new ListRecurringUseCase(store);
        this.listRemindersUseCase = new ListRemindersUseCase(store, clock);
    }

    async create(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const body = validateInput(createRecurringSchema, request.body, 'body');

        const result = await this.createRecurringUseCase.execute({
            clientId: body.client_id,
            label: body.label,
            amount: body.amount,
            category: body.category,
            frequency: body.frequency,
            type: body.type,
            nextDueDate: body.next_due_date
        });

        return reply.code(HTTP_STATUS.CREATED).send(result);
    }

    async list(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const query = validateInput(clientQuerySchema, request.query, 'query');
        const result = await this.listRecurringUseCase.execute({ clientId: query.client_id });

        return reply.code(HTTP_STATUS.SUCCESS).send(result);
    }

    async reminders(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const query = validateInput(clientQuerySchema, request.query, 'query');
        const result = await this.listRemindersUseCase.execute({ clientId: query.client_id });

        return reply.code(HTTP_STATUS.SUCCESS).send(result);
    }
}
