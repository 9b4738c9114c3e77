import { Pool } from 'pg';
import { z } from 'zod';
import { AuditLogEntry, NewAuditLogEntry } from '../types';
import { Paged, WhereBuilder, nullableNumeric, readCount, timestamp } from './sql';

export interface AuditLogFilters {
    user_id?: number;
    action?: string;
    resource_type?: string;
    date_from?: Date;
    date_to?: Date;
}

export interface AuditRepository {
    insert(entry: NewAuditLogEntry): Promise<void>;
    list(filters: AuditLogFilters, limit: number, offset: number): Promise<Paged<AuditLogEntry>>;
}

const auditRowSchema = z.object({
    id: z.number(),
    user_id: nullableNumeric,
    username: z.string().nullable(),
    action: z.string(),
    resource_type: z.string().nullable(),
    resource_id: z.string().nullable(),
    details: z.string().nullable(),
    ip_address: z.string().nullable(),
    user_agent: z.string().nullable(),
    created_at: timestamp,
});

export class PgAuditRepository implements AuditRepository {
    constructor(private readonly pool: Pool) {}

    async insert(entry: NewAuditLogEntry): Promise<void> {
        await this.pool.query(
            `INSERT INTO audit_logs (user_id, action, resource_type, resource_id, details, ip_address, user_agent)
             VALUES ($1, $2, $3, $4, $5, $6, $7)`,
            [entry.user_id, entry.action, entry.resource_type, entry.resource_id, entry.details, entry.ip_address, entry.user_agent]
        );
    }

    async list(filters: AuditLogFilters, limit: number, offset: number): Promise<Paged<AuditLogEntry>> {
        const where = new WhereBuilder()
            .addIf(filters.user_id !== undefined, 'a.user_id = ?', filters.user_id)
            .addIf(Boolean(filters.action), 'a.action ILIKE ?', `%${filters.action}%`)
            .addIf(filters.resource_type !== undefined, 'a.resource_type = ?', filters.resource_type)
            .addIf(filters.date_from !== undefined, 'a.created_at >= ?', filters.date_from)
            .addIf(filters.date_to !== undefined, 'a.created_at <= ?', filters.date_to);
        const clause = where.toSql();

        const countResult = await this.pool.query(`SELECT COUNT(*) AS total FROM audit_logs a ${clause}`, where.params);
        const limitParam = where.next(limit);
        const offsetParam = where.next(offset);
        const { rows } = await this.pool.query(
            `SELECT a.*, u.username
               FROM audit_logs a
               LEFT JOIN users u ON u.id = a.user_id
               ${clause}
              ORDER BY a.created_at DESC
              LIMIT ${limitParam} OFFSET ${offsetParam}`,
            where.params
        );
        return { items: rows.map(r => auditRowSchema.parse(r)), total: readCount(countResult.rows) };
    }
}
