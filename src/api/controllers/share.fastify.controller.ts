import { FastifyRequest, FastifyReply } from 'fastify';
import { CreateShareUseCase } from '../../core/application/use-cases/share/create-share.use-case';
import { ResolveShareUseCase } from '../../core/application/use-cases/share/resolve-share.use-case';
import { validateInput } from '../../core/validator';
import { DocumentStore } from '../../infrastructure/database/document-store';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { Clock } from '../../shared/types/common.types';
import { createShareSchema, shareParamsSchema } from '../validators/share.validator';

export class ShareFastifyController {
    private readonly createShareUseCase: CreateShareUseCase;
    private readonly resolveShareUseCase: ResolveShareUseCase;

    constructor(store: DocumentStore, clock: Clock) {
        this.createShareUseCase = new CreateShareUseCase(store, clock);
        this.resolveShareUseCase = new ResolveShareUseCase(store);
    }

    /**
     * POST /share
     */
    async create(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const body = validateInput(createShareSchema, request.body, 'body');
        const result = await this.createShareUseCase.execute({ clientId: body.client_id });

        return reply.code(HTTP_STATUS.CREATED).send(result);
    }

    /**
     * GET /share/:token, 404 for an unknown token.
     */
    async resolve(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> {
        const params = validateInput(shareParamsSchema, request.params, 'params');
        const result = await this.resolveShareUseCase.execute({ token: params.token });

        return reply.code(HTTP_STATUS.SUCCESS).send(result);
    }
}
