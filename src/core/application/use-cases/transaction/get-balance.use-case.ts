import { computeBalance } from '../../../domain/services/ledger.service';
import { DocumentStore } from '../../../../infrastructure/database/document-store';

export interface GetBalanceUseCaseRequest {
    clientId: string;
}

export interface GetBalanceUseCaseResponse {
    balance: number;
}

export class GetBalanceUseCase {
    constructor(private readonly store: DocumentStore) {}

    async execute(request: GetBalanceUseCaseRequest): Promise<GetBalanceUseCaseResponse> {
        const transactions = await this.store.find('transaction', { client_id: request.clientId });
        return { balance: computeBalance(transactions) };
    }
}
