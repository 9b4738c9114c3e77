/**
 * In-memory stand-ins for the Postgres repositories, plus fixtures shared by the test suites.
 */

import { AuditLogFilters, AuditRepository } from '../repositories/audit_repository';
import {
    AdminDecision, DailyDecisionCount, LoanListFilters, LoanRepository, LoanSummary, NewLoanApplication, SummaryWindows,
} from '../repositories/loan_repository';
import { Paged } from '../repositories/sql';
import { NewUser, UserChanges, UserListFilters, UserRepository } from '../repositories/user_repository';
import { WeightRepository, WeightUpdate } from '../repositories/weight_repository';
import { AuditLogEntry, FeatureWeightRow, LoanApplicationInput, LoanApplicationRecord, NewAuditLogEntry, User } from '../types';

const page = <T>(items: T[], limit: number, offset: number): Paged<T> => ({
    items: items.slice(offset, offset + limit),
    total: items.length,
});

const newestFirst = <T extends { created_at: string }>(items: T[]): T[] =>
    [...items].sort((a, b) => b.created_at.localeCompare(a.created_at));

export class InMemoryLoanRepository implements LoanRepository {
    readonly rows: LoanApplicationRecord[] = [];
    failWrites = false;

    async create(application: NewLoanApplication): Promise<void> {
        if (this.failWrites) throw new Error('connection refused');
        const now = new Date().toISOString();
        this.rows.push({
            ...application,
            final_status: null,
            admin_notes: null,
            reviewed_by_id: null,
            admin_decision_date: null,
            created_at: now,
            updated_at: now,
        });
    }

    async findById(applicationId: string): Promise<LoanApplicationRecord | null> {
        return this.rows.find(r => r.application_id === applicationId) ?? null;
    }

    async updateAdminDecision(applicationId: string, decision: AdminDecision, at: Date): Promise<LoanApplicationRecord | null> {
        const row = this.rows.find(r => r.application_id === applicationId);
        if (!row) return null;
        Object.assign(row, decision, { admin_decision_date: at.toISOString(), updated_at: at.toISOString() });
        return row;
    }

    async listForReview(minRiskScore: number, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>> {
        return page(newestFirst(this.rows.filter(r => r.final_status === null && r.risk_score > minRiskScore)), limit, offset);
    }

    async list(filters: LoanListFilters, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>> {
        const matches = this.rows.filter(r => {
            if (filters.status === 'pending' && r.final_status !== null) return false;
            if (filters.status === 'approved' && r.final_status !== 'Yes') return false;
            if (filters.status === 'rejected' && r.final_status !== 'No') return false;
            if (filters.risk_category && r.risk_category !== filters.risk_category) return false;
            if (filters.date_from && Date.parse(r.created_at) < filters.date_from.getTime()) return false;
            if (filters.date_to && Date.parse(r.created_at) > filters.date_to.getTime()) return false;
            if (filters.min_loan_amount !== undefined && r.loan_amount < filters.min_loan_amount) return false;
            if (filters.max_loan_amount !== undefined && r.loan_amount > filters.max_loan_amount) return false;
            if (filters.property_area && r.property_area !== filters.property_area) return false;
            if (filters.search && !r.application_id.toLowerCase().includes(filters.search.toLowerCase())) return false;
            return true;
        });
        return page(newestFirst(matches), limit, offset);
    }

    async listReviewed(since?: Date): Promise<LoanApplicationRecord[]> {
        return this.rows
            .filter(r => r.final_status !== null && (!since || Date.parse(r.created_at) >= since.getTime()))
            .sort((a, b) => a.created_at.localeCompare(b.created_at));
    }

    async summarize(windows: SummaryWindows): Promise<LoanSummary> {
        const since = (d: Date) => this.rows.filter(r => Date.parse(r.created_at) >= d.getTime()).length;
        const approved = this.rows.filter(r => r.final_status === 'Yes');
        const sum = (rows: LoanApplicationRecord[]) => rows.reduce((s, r) => s + r.loan_amount, 0);
        const byCategory = (c: LoanApplicationRecord['risk_category']) => this.rows.filter(r => r.risk_category === c).length;

        return {
            total: this.rows.length,
            pending: this.rows.filter(r => r.final_status === null).length,
            approved: approved.length,
            rejected: this.rows.filter(r => r.final_status === 'No').length,
            avg_risk_score: this.rows.length > 0 ? this.rows.reduce((s, r) => s + r.risk_score, 0) / this.rows.length : 0,
            total_loan_amount: sum(this.rows),
            approved_loan_amount: sum(approved),
            today: since(windows.todayStart),
            this_week: since(windows.weekStart),
            this_month: since(windows.monthStart),
            risk_distribution: { Low: byCategory('Low'), Medium: byCategory('Medium'), High: byCategory('High') },
        };
    }

    async decisionsByDay(from: Date): Promise<DailyDecisionCount[]> {
        const days = new Map<string, DailyDecisionCount>();
        for (const r of this.rows) {
            if (!r.admin_decision_date || Date.parse(r.admin_decision_date) < from.getTime()) continue;
            const day = r.admin_decision_date.slice(0, 10);
            const entry = days.get(day) ?? { day, approved: 0, rejected: 0 };
            if (r.final_status === 'Yes') entry.approved += 1;
            if (r.final_status === 'No') entry.rejected += 1;
            days.set(day, entry);
        }
        return [...days.values()];
    }
}

export class InMemoryWeightRepository implements WeightRepository {
    readonly rows = new Map<string, FeatureWeightRow>();
    failReads = false;

    async list(): Promise<FeatureWeightRow[]> {
        if (this.failReads) throw new Error('connection refused');
        return [...this.rows.values()].sort((a, b) => b.weight - a.weight);
    }

    async upsert(update: WeightUpdate, at: Date): Promise<FeatureWeightRow> {
        const existing = this.rows.get(update.feature_name);
        const row: FeatureWeightRow = {
            feature_name: update.feature_name,
            weight: update.weight,
            description: update.description ?? existing?.description ?? null,
            is_active: update.is_active ?? existing?.is_active ?? true,
            created_at: existing?.created_at ?? at.toISOString(),
            updated_at: at.toISOString(),
        };
        this.rows.set(row.feature_name, row);
        return row;
    }
}

export class InMemoryUserRepository implements UserRepository {
    readonly rows: User[] = [];
    private nextId = 1;

    async findById(id: number): Promise<User | null> {
        return this.rows.find(u => u.id === id) ?? null;
    }

    async findByUsername(username: string): Promise<User | null> {
        return this.rows.find(u => u.username === username) ?? null;
    }

    async findByEmail(email: string): Promise<User | null> {
        return this.rows.find(u => u.email === email) ?? null;
    }

    async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
        return this.rows.find(u => u.username === username || u.email === email) ?? null;
    }

    async create(user: NewUser): Promise<User> {
        const now = new Date().toISOString();
        const row: User = {
            ...user,
            id: this.nextId++,
            is_active: true,
            is_disabled: false,
            last_login: null,
            created_at: now,
            updated_at: now,
        };
        this.rows.push(row);
        return row;
    }

    async update(id: number, changes: UserChanges, at: Date): Promise<User | null> {
        const row = this.rows.find(u => u.id === id);
        if (!row) return null;
        Object.assign(row, changes, { updated_at: at.toISOString() });
        return row;
    }

    async list(filters: UserListFilters, limit: number, offset: number): Promise<Paged<User>> {
        const matches = this.rows.filter(u =>
            (filters.role === undefined || u.role === filters.role)
            && (filters.is_active === undefined || u.is_active === filters.is_active));
        return page(matches, limit, offset);
    }

    async touchLastLogin(id: number, at: Date): Promise<void> {
        const row = this.rows.find(u => u.id === id);
        if (row) row.last_login = at.toISOString();
    }

    async countAll(): Promise<number> {
        return this.rows.length;
    }
}

export class InMemoryAuditRepository implements AuditRepository {
    readonly rows: AuditLogEntry[] = [];
    failWrites = false;

    constructor(private readonly users?: InMemoryUserRepository) {}

    async insert(entry: NewAuditLogEntry): Promise<void> {
        if (this.failWrites) throw new Error('disk full');
        this.rows.push({ ...entry, id: this.rows.length + 1, created_at: new Date().toISOString() });
    }

    async list(filters: AuditLogFilters, limit: number, offset: number): Promise<Paged<AuditLogEntry>> {
        const matches = this.rows.filter(e =>
            (filters.user_id === undefined || e.user_id === filters.user_id)
            && (!filters.action || e.action.toLowerCase().includes(filters.action.toLowerCase()))
            && (filters.resource_type === undefined || e.resource_type === filters.resource_type));
        const withNames = matches.map(e => ({
            ...e,
            username: this.users?.rows.find(u => u.id === e.user_id)?.username ?? null,
        }));
        return page([...withNames].reverse(), limit, offset);
    }
}

/** Approves under the default weights: risk 11, Low. */
export const sampleApplication = (): LoanApplicationInput => ({
    gender: 'Male',
    married: 'Yes',
    dependents: 1,
    education: 'Graduate',
    self_employed: 'No',
    applicant_income: 5849,
    coapplicant_income: 0,
    loan_amount: 128,
    loan_amount_term: 360,
    credit_history: 1,
    property_area: 'Urban',
});

/** Rejected under the default weights. */
export const weakApplication = (): LoanApplicationInput => ({
    gender: 'Female',
    married: 'No',
    dependents: 3,
    education: 'Not Graduate',
    self_employed: 'Yes',
    applicant_income: 1500,
    coapplicant_income: 0,
    loan_amount: 300,
    loan_amount_term: 360,
    credit_history: 0,
    property_area: 'Rural',
});

let sequence = 0;

/** A stored application; override fields to shape a scenario. */
export function storedApplication(overrides: Partial<LoanApplicationRecord> = {}): LoanApplicationRecord {
    sequence += 1;
    const created = overrides.created_at ?? new Date().toISOString();
    return {
        ...sampleApplication(),
        application_id: `LOAN_TEST_${String(sequence).padStart(4, '0')}`,
        total_income: 5849,
        emi: 355.56,
        emi_income_ratio: 0.0608,
        predicted_approval: 'Yes',
        risk_score: 11,
        risk_category: 'Low',
        recommendation: 'Approve',
        confidence_score: 0.89,
        ml_justification: 'test',
        prediction_method: 'rule_based',
        final_status: null,
        admin_notes: null,
        reviewed_by_id: null,
        admin_decision_date: null,
        created_at: created,
        updated_at: created,
        ...overrides,
    };
}
