import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UserListFilters, UserRepository } from '../repositories/user_repository';
import { Page, PublicUser, User, UserRole } from '../types';
import {
    AuthenticationError, ConflictError, NotFoundError, ValidationError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { toPage } from './pagination';

const log = createLogger('AuthService');

const BCRYPT_ROUNDS = 10;
export const MIN_PASSWORD_LENGTH = 8;

export interface AuthConfig {
    jwtSecret: string;
    tokenTtlMinutes: number;
}

export interface TokenClaims {
    sub: string;
    user_id: number;
    role: UserRole;
}

export interface LoginResult {
    access_token: string;
    token_type: 'bearer';
    expires_in: number;
    user: PublicUser;
}

export interface CreateUserInput {
    username: string;
    email: string;
    full_name: string;
    password: string;
    role: UserRole;
}

export interface UpdateUserInput {
    email?: string;
    full_name?: string;
    role?: UserRole;
    is_active?: boolean;
    is_disabled?: boolean;
}

const claimsSchema = z.object({
    sub: z.string(),
    user_id: z.number().int(),
    role: z.enum(['superadmin', 'bank_manager', 'loan_officer']),
});

export function toPublicUser(user: User): PublicUser {
    const { hashed_password: _omit, ...rest } = user;
    return rest;
}

export const hashPassword = (password: string): Promise<string> => bcrypt.hash(password, BCRYPT_ROUNDS);

export class AuthService {
    constructor(
        private readonly users: UserRepository,
        private readonly config: AuthConfig,
    ) {}

    issueToken(user: User): string {
        const claims: TokenClaims = { sub: user.username, user_id: user.id, role: user.role };
        return jwt.sign(claims, this.config.jwtSecret, {
            algorithm: 'HS256',
            expiresIn: this.config.tokenTtlMinutes * 60,
        });
    }

    verifyToken(token: string): TokenClaims {
        try {
            return claimsSchema.parse(jwt.verify(token, this.config.jwtSecret, { algorithms: ['HS256'] }));
        } catch {
            throw new AuthenticationError();
        }
    }

    /**
     * Resolves a bearer token to a current user. The user is re-read on every call,
     * so disabling an account invalidates tokens already issued to it.
     */
    async authenticate(token: string): Promise<User> {
        const claims = this.verifyToken(token);
        const user = await this.users.findById(claims.user_id);
        if (!user || user.username !== claims.sub) {
            throw new AuthenticationError();
        }
        if (user.is_disabled || !user.is_active) {
            throw new AuthenticationError('User account is disabled');
        }
        return user;
    }

    async login(username: string, password: string): Promise<LoginResult> {
        const user = await this.users.findByUsername(username);
        if (!user || !(await bcrypt.compare(password, user.hashed_password))) {
            throw new AuthenticationError('Incorrect username or password');
        }
        if (user.is_disabled || !user.is_active) {
            throw new AuthenticationError('User account is disabled');
        }

        await this.users.touchLastLogin(user.id, new Date());
        log.info(`User ${user.username} logged in`);

        return {
            access_token: this.issueToken(user),
            token_type: 'bearer',
            expires_in: this.config.tokenTtlMinutes * 60,
            user: toPublicUser(user),
        };
    }

    async changePassword(user: User, currentPassword: string, newPassword: string, confirmPassword: string): Promise<void> {
        if (!(await bcrypt.compare(currentPassword, user.hashed_password))) {
            throw new ValidationError('Current password is incorrect');
        }
        if (newPassword !== confirmPassword) {
            throw new ValidationError('New password and confirmation do not match');
        }
        if (newPassword.length < MIN_PASSWORD_LENGTH) {
            throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
        }

        await this.users.update(user.id, { hashed_password: await hashPassword(newPassword) }, new Date());
        log.info(`Password changed for ${user.username}`);
    }

    async createUser(input: CreateUserInput, createdBy: User | null): Promise<PublicUser> {
        if (input.password.length < MIN_PASSWORD_LENGTH) {
            throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
        }
        const existing = await this.users.findByUsernameOrEmail(input.username, input.email);
        if (existing) {
            throw new ConflictError(existing.username === input.username
                ? 'Username already registered'
                : 'Email already registered');
        }

        const user = await this.users.create({
            username: input.username,
            email: input.email,
            full_name: input.full_name,
            hashed_password: await hashPassword(input.password),
            role: input.role,
            created_by_id: createdBy?.id ?? null,
        });
        log.info(`User ${user.username} created with role ${user.role}`);
        return toPublicUser(user);
    }

    async listUsers(filters: UserListFilters, page: number, pageSize: number): Promise<Page<PublicUser>> {
        const { items, total } = await this.users.list(filters, pageSize, (page - 1) * pageSize);
        return toPage(items.map(toPublicUser), total, page, pageSize);
    }

    async getUser(id: number): Promise<PublicUser> {
        const user = await this.users.findById(id);
        if (!user) throw new NotFoundError(`User ${id} not found`);
        return toPublicUser(user);
    }

    async updateUser(id: number, changes: UpdateUserInput, actor: User): Promise<PublicUser> {
        if (id === actor.id && (changes.is_disabled === true || changes.is_active === false)) {
            throw new ValidationError('You cannot disable your own account');
        }
        if (changes.email !== undefined) {
            const clash = await this.users.findByEmail(changes.email);
            if (clash && clash.id !== id) throw new ConflictError('Email already registered');
        }

        const updated = await this.users.update(id, changes, new Date());
        if (!updated) throw new NotFoundError(`User ${id} not found`);
        return toPublicUser(updated);
    }

    /** Soft delete: the account is disabled and kept for the audit trail. */
    async disableUser(id: number, actor: User): Promise<PublicUser> {
        if (id === actor.id) {
            throw new ValidationError('You cannot delete your own account');
        }
        const updated = await this.users.update(id, { is_disabled: true, is_active: false }, new Date());
        if (!updated) throw new NotFoundError(`User ${id} not found`);
        log.info(`User ${updated.username} disabled by ${actor.username}`);
        return toPublicUser(updated);
    }
}
