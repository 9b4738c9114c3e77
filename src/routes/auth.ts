import { Response, Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler } from '../middleware/async_handler';
import { AuthenticatedRequest, currentUser, requireAuth } from '../middleware/auth_middleware';
import { capabilitiesOf } from '../middleware/roles';
import { parseRequest, requestMeta } from '../middleware/validate';
import { toPublicUser } from '../services/auth_service';
import { AuthenticationError } from '../utils/errors';

const loginSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
});

const changePasswordSchema = z.object({
    current_password: z.string().min(1),
    new_password: z.string(),
    confirm_password: z.string(),
});

export function authRoutes(ctx: AppContext): Router {
    const router = Router();
    const authenticated = requireAuth(ctx.auth);

    router.post('/login', asyncHandler(async (req, res) => {
        const { username, password } = parseRequest(loginSchema, req.body);
        try {
            const result = await ctx.auth.login(username, password);
            await ctx.audit.log({
                user_id: result.user.id,
                action: 'login_success',
                resource_type: 'user',
                resource_id: String(result.user.id),
                ...requestMeta(req),
            });
            res.json(result);
        } catch (error) {
            if (error instanceof AuthenticationError) {
                await ctx.audit.log({ action: 'login_failed', resource_type: 'user', details: `username=${username}`, ...requestMeta(req) });
            }
            throw error;
        }
    }));

    router.post('/logout', authenticated, asyncHandler(async (req: AuthenticatedRequest, res) => {
        const user = currentUser(req);
        await ctx.audit.log({ user_id: user.id, action: 'logout', resource_type: 'user', resource_id: String(user.id), ...requestMeta(req) });
        res.json({ message: 'Successfully logged out' });
    }));

    router.get('/me', authenticated, (req: AuthenticatedRequest, res: Response) => {
        const user = currentUser(req);
        res.json({ ...toPublicUser(user), capabilities: capabilitiesOf(user.role) });
    });

    router.put('/change-password', authenticated, asyncHandler(async (req: AuthenticatedRequest, res) => {
        const user = currentUser(req);
        const body = parseRequest(changePasswordSchema, req.body);
        await ctx.auth.changePassword(user, body.current_password, body.new_password, body.confirm_password);
        await ctx.audit.log({ user_id: user.id, action: 'password_changed', resource_type: 'user', resource_id: String(user.id), ...requestMeta(req) });
        res.json({ message: 'Password changed successfully' });
    }));

    return router;
}
