import { AuditLogFilters, AuditRepository } from '../repositories/audit_repository';
import { AuditLogEntry, Page } from '../types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { toPage } from './pagination';

const log = createLogger('Audit');

export interface AuditEvent {
    user_id?: number | null;
    action: string;
    resource_type?: string | null;
    resource_id?: string | null;
    details?: string | null;
    ip_address?: string | null;
    user_agent?: string | null;
}

export class AuditService {
    constructor(private readonly repository: AuditRepository) {}

    /** Best effort: a failed write is logged and never reaches the caller. */
    async log(event: AuditEvent): Promise<void> {
        try {
            await this.repository.insert({
                user_id: event.user_id ?? null,
                action: event.action,
                resource_type: event.resource_type ?? null,
                resource_id: event.resource_id ?? null,
                details: event.details ?? null,
                ip_address: event.ip_address ?? null,
                user_agent: event.user_agent ?? null,
            });
        } catch (error) {
            log.error(`Failed to record audit event '${event.action}': ${errorMessage(error)}`);
        }
    }

    async list(filters: AuditLogFilters, page: number, pageSize: number): Promise<Page<AuditLogEntry>> {
        const { items, total } = await this.repository.list(filters, pageSize, (page - 1) * pageSize);
        return toPage(items, total, page, pageSize);
    }
}
