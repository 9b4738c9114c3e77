import { Pool } from 'pg';
import { z } from 'zod';
import { User, UserRole } from '../types';
import { Paged, WhereBuilder, nullableNumeric, nullableTimestamp, readCount, timestamp } from './sql';

export interface NewUser {
    username: string;
    email: string;
    full_name: string;
    hashed_password: string;
    role: UserRole;
    created_by_id: number | null;
}

export type UserChanges = Partial<Pick<User, 'email' | 'full_name' | 'role' | 'is_active' | 'is_disabled' | 'hashed_password'>>;

export interface UserListFilters {
    role?: UserRole;
    is_active?: boolean;
}

export interface UserRepository {
    findById(id: number): Promise<User | null>;
    findByUsername(username: string): Promise<User | null>;
    findByEmail(email: string): Promise<User | null>;
    findByUsernameOrEmail(username: string, email: string): Promise<User | null>;
    create(user: NewUser): Promise<User>;
    update(id: number, changes: UserChanges, at: Date): Promise<User | null>;
    list(filters: UserListFilters, limit: number, offset: number): Promise<Paged<User>>;
    touchLastLogin(id: number, at: Date): Promise<void>;
    countAll(): Promise<number>;
}

const userRowSchema = z.object({
    id: z.number(),
    username: z.string(),
    email: z.string(),
    full_name: z.string(),
    hashed_password: z.string(),
    role: z.enum(['superadmin', 'bank_manager', 'loan_officer']),
    is_active: z.boolean(),
    is_disabled: z.boolean(),
    created_by_id: nullableNumeric,
    last_login: nullableTimestamp,
    created_at: timestamp,
    updated_at: timestamp,
});

const mapUserRow = (row: unknown): User => userRowSchema.parse(row);

// Columns a caller may change through update(); keys double as column names.
const UPDATABLE: ReadonlyArray<keyof UserChanges> = ['email', 'full_name', 'role', 'is_active', 'is_disabled', 'hashed_password'];

export class PgUserRepository implements UserRepository {
    constructor(private readonly pool: Pool) {}

    async findById(id: number): Promise<User | null> {
        const { rows } = await this.pool.query('SELECT * FROM users WHERE id = $1', [id]);
        return rows.length > 0 ? mapUserRow(rows[0]) : null;
    }

    async findByUsername(username: string): Promise<User | null> {
        const { rows } = await this.pool.query('SELECT * FROM users WHERE username = $1', [username]);
        return rows.length > 0 ? mapUserRow(rows[0]) : null;
    }

    async findByEmail(email: string): Promise<User | null> {
        const { rows } = await this.pool.query('SELECT * FROM users WHERE email = $1', [email]);
        return rows.length > 0 ? mapUserRow(rows[0]) : null;
    }

    async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
        const { rows } = await this.pool.query(
            'SELECT * FROM users WHERE username = $1 OR email = $2 LIMIT 1',
            [username, email]
        );
        return rows.length > 0 ? mapUserRow(rows[0]) : null;
    }

    async create(user: NewUser): Promise<User> {
        const { rows } = await this.pool.query(
            `INSERT INTO users (username, email, full_name, hashed_password, role, created_by_id)
             VALUES ($1, $2, $3, $4, $5, $6)
             RETURNING *`,
            [user.username, user.email, user.full_name, user.hashed_password, user.role, user.created_by_id]
        );
        return mapUserRow(rows[0]);
    }

    async update(id: number, changes: UserChanges, at: Date): Promise<User | null> {
        const params: unknown[] = [id];
        const sets: string[] = [];
        for (const column of UPDATABLE) {
            const value = changes[column];
            if (value === undefined) continue;
            params.push(value);
            sets.push(`${column} = $${params.length}`);
        }
        params.push(at);
        sets.push(`updated_at = $${params.length}`);

        const { rows } = await this.pool.query(
            `UPDATE users SET ${sets.join(', ')} WHERE id = $1 RETURNING *`,
            params
        );
        return rows.length > 0 ? mapUserRow(rows[0]) : null;
    }

    async list(filters: UserListFilters, limit: number, offset: number): Promise<Paged<User>> {
        const where = new WhereBuilder()
            .addIf(filters.role !== undefined, 'role = ?', filters.role)
            .addIf(filters.is_active !== undefined, 'is_active = ?', filters.is_active);
        const clause = where.toSql();

        const countResult = await this.pool.query(`SELECT COUNT(*) AS total FROM users ${clause}`, where.params);
        const limitParam = where.next(limit);
        const offsetParam = where.next(offset);
        const { rows } = await this.pool.query(
            `SELECT * FROM users ${clause} ORDER BY created_at DESC LIMIT ${limitParam} OFFSET ${offsetParam}`,
            where.params
        );
        return { items: rows.map(mapUserRow), total: readCount(countResult.rows) };
    }

    async touchLastLogin(id: number, at: Date): Promise<void> {
        await this.pool.query('UPDATE users SET last_login = $2 WHERE id = $1', [id, at]);
    }

    async countAll(): Promise<number> {
        const { rows } = await this.pool.query('SELECT COUNT(*) AS total FROM users');
        return readCount(rows);
    }
}
