import { FastifyRequest, FastifyReply } from 'fastify';
import { GetCategoryTotalsUseCase } from '../../core/application/use-cases/report/get-category-totals.use-case';
import { validateInput } from '../../core/validator';
import { DocumentStore } from '../../infrastructure/database/document-store';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { clientQuerySchema } from '../validators/transaction.validator';

export class ReportFastifyController {
    private readonly getCategoryTotalsUseCase: GetCategoryTotalsUseCase;

    constructor(store: DocumentStore) {
        this.getCategoryTotalsUseCase = new GetCategoryTotalsUseCase(store);
    }

    async categoryTotals(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const query = validateInput(clientQuerySchema, request.query, 'query');
        const result = await this.getCategoryTotalsUseCase.execute({ clientId: query.client_id });

        return reply.code(HTTP_STATUS.SUCCESS).send(result);
    }
}
