import { Request } from 'express';
import { z } from 'zod';
import { ValidationError } from '../utils/errors';

export function parseRequest<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
        throw new ValidationError(result.error.issues.map(issue => {
            const field = issue.path.join('.');
            return field ? `${field}: ${issue.message}` : issue.message;
        }));
    }
    return result.data;
}

export const paginationSchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    page_size: z.coerce.number().int().min(1).max(100).default(20),
});

/** Query-string booleans arrive as text. */
export const queryBoolean = z.enum(['true', 'false']).transform(v => v === 'true');

export function requestMeta(req: Request): { ip_address: string | null; user_agent: string | null } {
    return {
        ip_address: req.ip ?? null,
        user_agent: req.get('user-agent') ?? null,
    };
}
