import { buildShare, generateShareToken } from '../../../domain/entities/share.entity';
import { DocumentStore } from '../../../../infrastructure/database/document-store';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { Clock, systemClock } from '../../../../shared/types/common.types';

export interface CreateShareUseCaseRequest {
    clientId: string;
}

export interface CreateShareUseCaseResponse {
    token: string;
}

export class CreateShareUseCase {
    constructor(
        private readonly store: DocumentStore,
        private readonly clock: Clock = systemClock,
        private readonly generateToken: () => string = generateShareToken
    ) {}

    async execute(request: CreateShareUseCaseRequest): Promise<CreateShareUseCaseResponse> {
        const share = buildShare(request.clientId, this.generateToken(), this.clock());

        await this.store.insert('share', share);
        logger.info('Share link created', { clientId: share.client_id });

        return { token: share.token };
    }
}
