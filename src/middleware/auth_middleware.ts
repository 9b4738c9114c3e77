import { NextFunction, Request, Response } from 'express';
import { AuthService } from '../services/auth_service';
import { User } from '../types';
import { AuthenticationError, AuthorizationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { asyncHandler } from './async_handler';
import { Capability, hasCapability } from './roles';

const log = createLogger('AuthMiddleware');

export interface AuthenticatedRequest extends Request {
    user?: User;
}

export function bearerToken(req: Request): string | null {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
    return authHeader.slice('Bearer '.length).trim() || null;
}

/** The user attached by requireAuth. */
export function currentUser(req: AuthenticatedRequest): User {
    if (!req.user) throw new AuthenticationError();
    return req.user;
}

/**
 * Verifies the bearer token and re-reads the user, rejecting disabled accounts.
 */
export function requireAuth(auth: AuthService) {
    return asyncHandler(async (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
        const token = bearerToken(req);
        if (!token) {
            log.warn(`Unauthorized access attempt to ${req.originalUrl}`);
            throw new AuthenticationError('Not authenticated');
        }
        req.user = await auth.authenticate(token);
        next();
    });
}

export function requireCapability(capability: Capability) {
    return (req: AuthenticatedRequest, _res: Response, next: NextFunction): void => {
        const user = currentUser(req);
        if (!hasCapability(user.role, capability)) {
            log.warn(`${user.username} (${user.role}) denied ${capability} on ${req.originalUrl}`);
            throw new AuthorizationError();
        }
        next();
    };
}
