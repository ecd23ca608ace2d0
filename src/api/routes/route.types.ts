import { DocumentStore } from '../../infrastructure/database/document-store';
import { Clock } from '../../shared/types/common.types';

/** Options every route plugin is registered with. */
export interface RouteDependencies {
    store: DocumentStore;
    clock: Clock;
}
