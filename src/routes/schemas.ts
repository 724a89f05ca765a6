// Shared route schemas.

import { z } from 'zod';

/** Shape produced by the error-handler plugin for every failed request. */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    statusCode: z.number(),
    stack: z.string().optional(),
  }),
  requestId: z.string(),
  timestamp: z.string(),
});

export const errorResponses = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  500: ErrorResponseSchema,
  501: ErrorResponseSchema,
} as const;

export const ObjectParamsSchema = z.object({
  '*': z.string().min(1).describe('Object path inside the storage backend'),
});

export interface ObjectParams {
  '*': string;
}
