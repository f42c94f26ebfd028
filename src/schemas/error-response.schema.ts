import { z } from 'zod';

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.enum(['VALIDATION_ERROR', 'NOT_FOUND', 'TRANSIENT_ERROR', 'INTERNAL_ERROR']),
    message: z.string(),
    requestId: z.string(),
    retryable: z.boolean().optional(),
  }),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;

export type ErrorCode = ErrorResponse['error']['code'];
