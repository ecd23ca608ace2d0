// src/shared/utils/serialization.util.ts
import { StoredDocument } from '../../infrastructure/database/document-store';

export type SerializedDocument = Record<string, unknown> & { _id: string };

/**
 * Wire form of a stored document: the identifier as text and every
 * top-level timestamp as ISO-8601.
 */
export function serializeDocument(document: StoredDocument): SerializedDocument {
    const serialized: Record<string, unknown> = {};

    for (const [field, value] of Object.entries(document)) {
        serialized[field] = value instanceof Date ? value.toISOString() : value;
    }

    return { ...serialized, _id: String(document._id) };
}

export function serializeDocuments(documents: readonly StoredDocument[]): SerializedDocument[] {
    return documents.map(serializeDocument);
}
