// src/api/validators/share.validator.ts
import { z } from 'zod';
import { clientIdField } from '../../shared/utils/validation.util';

export const createShareSchema = z.object({
    client_id: clientIdField
});

export const shareParamsSchema = z.object({
    token: z.string().min(1, 'token must not be empty')
});

export type CreateShareInput = z.infer<typeof createShareSchema>;
export type ShareParams = z.infer<typeof shareParamsSchema>;
