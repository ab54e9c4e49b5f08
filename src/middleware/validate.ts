import { ZodType, ZodTypeDef } from 'zod';
import { ErrorResponse } from '../types.js';

export type ParseResult<T> = { ok: true; data: T } | { ok: false; error: ErrorResponse };

export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): ParseResult<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
        return {
            ok: false,
            error: {
                error: {
                    code: 'VALIDATION_ERROR',
                    message: 'Invalid request body',
                    details: result.error.flatten(),
                },
            },
        };
    }
    return { ok: true, data: result.data };
}
