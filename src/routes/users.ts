import { Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler } from '../middleware/async_handler';
import { AuthenticatedRequest, currentUser, requireAuth, requireCapability } from '../middleware/auth_middleware';
import { paginationSchema, parseRequest, queryBoolean, requestMeta } from '../middleware/validate';

const roleSchema = z.enum(['superadmin', 'bank_manager', 'loan_officer']);

const createUserSchema = z.object({
    username: z.string().min(3).max(50),
    email: z.string().email(),
    full_name: z.string().min(1),
    password: z.string(),
    role: roleSchema,
});

const updateUserSchema = z.object({
    email: z.string().email().optional(),
    full_name: z.string().min(1).optional(),
    role: roleSchema.optional(),
    is_active: z.boolean().optional(),
    is_disabled: z.boolean().optional(),
});

const listQuerySchema = paginationSchema.extend({
    role: roleSchema.optional(),
    is_active: queryBoolean.optional(),
});

const idParam = z.object({ id: z.coerce.number().int().positive() });

export function userRoutes(ctx: AppContext): Router {
    const router = Router();
    router.use(requireAuth(ctx.auth), requireCapability('users:manage'));

    router.post('/', asyncHandler(async (req: AuthenticatedRequest, res) => {
        const actor = currentUser(req);
        const created = await ctx.auth.createUser(parseRequest(createUserSchema, req.body), actor);
        await ctx.audit.log({
            user_id: actor.id,
            action: 'user_created',
            resource_type: 'user',
            resource_id: String(created.id),
            details: `${created.username} (${created.role})`,
            ...requestMeta(req),
        });
        res.status(201).json(created);
    }));

    router.get('/', asyncHandler(async (req, res) => {
        const { page, page_size, role, is_active } = parseRequest(listQuerySchema, req.query);
        res.json(await ctx.auth.listUsers({ role, is_active }, page, page_size));
    }));

    router.get('/:id', asyncHandler(async (req, res) => {
        const { id } = parseRequest(idParam, req.params);
        res.json(await ctx.auth.getUser(id));
    }));

    router.put('/:id', asyncHandler(async (req: AuthenticatedRequest, res) => {
        const actor = currentUser(req);
        const { id } = parseRequest(idParam, req.params);
        const changes = parseRequest(updateUserSchema, req.body);
        const updated = await ctx.auth.updateUser(id, changes, actor);
        await ctx.audit.log({
            user_id: actor.id,
            action: 'user_updated',
            resource_type: 'user',
            resource_id: String(id),
            details: Object.keys(changes).join(','),
            ...requestMeta(req),
        });
        res.json(updated);
    }));

    router.delete('/:id', asyncHandler(async (req: AuthenticatedRequest, res) => {
        const actor = currentUser(req);
        const { id } = parseRequest(idParam, req.params);
        const disabled = await ctx.auth.disableUser(id, actor);
        await ctx.audit.log({ user_id: actor.id, action: 'user_disabled', resource_type: 'user', resource_id: String(id), ...requestMeta(req) });
        res.json({ message: `User ${disabled.username} disabled`, user: disabled });
    }));

    return router;
}
