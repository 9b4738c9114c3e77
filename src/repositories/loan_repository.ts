import { Pool } from 'pg';
import { z } from 'zod';
import { LoanApplicationRecord, LoanDecision, LoanStatus, PropertyArea, RiskCategory } from '../types';
import { Paged, WhereBuilder, nullableNumeric, nullableTimestamp, numeric, readCount, timestamp } from './sql';

export type NewLoanApplication = Omit<
    LoanApplicationRecord,
    'final_status' | 'admin_notes' | 'reviewed_by_id' | 'admin_decision_date' | 'created_at' | 'updated_at'
>;

export interface AdminDecision {
    final_status: LoanDecision;
    admin_notes: string | null;
    reviewed_by_id: number | null;
}

export interface LoanListFilters {
    status?: LoanStatus;
    risk_category?: RiskCategory;
    date_from?: Date;
    date_to?: Date;
    min_loan_amount?: number;
    max_loan_amount?: number;
    property_area?: PropertyArea;
    search?: string;
}

export interface SummaryWindows {
    todayStart: Date;
    weekStart: Date;
    monthStart: Date;
}

export interface LoanSummary {
    total: number;
    pending: number;
    approved: number;
    rejected: number;
    avg_risk_score: number;
    total_loan_amount: number;
    approved_loan_amount: number;
    today: number;
    this_week: number;
    this_month: number;
    risk_distribution: Record<RiskCategory, number>;
}

export interface DailyDecisionCount {
    /** yyyy-MM-dd, UTC */
    day: string;
    approved: number;
    rejected: number;
}

export interface LoanRepository {
    create(application: NewLoanApplication): Promise<void>;
    findById(applicationId: string): Promise<LoanApplicationRecord | null>;
    updateAdminDecision(applicationId: string, decision: AdminDecision, at: Date): Promise<LoanApplicationRecord | null>;
    listForReview(minRiskScore: number, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>>;
    list(filters: LoanListFilters, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>>;
    listReviewed(since?: Date): Promise<LoanApplicationRecord[]>;
    summarize(windows: SummaryWindows): Promise<LoanSummary>;
    decisionsByDay(from: Date): Promise<DailyDecisionCount[]>;
}

const STATUS_CONDITION: Record<LoanStatus, string> = {
    pending: 'final_status IS NULL',
    approved: "final_status = 'Yes'",
    rejected: "final_status = 'No'",
};

const yesNo = z.enum(['Yes', 'No']);

const loanRowSchema = z.object({
    application_id: z.string(),
    gender: z.enum(['Male', 'Female']),
    married: yesNo,
    dependents: numeric,
    education: z.enum(['Graduate', 'Not Graduate']),
    self_employed: yesNo,
    applicant_income: numeric,
    coapplicant_income: numeric,
    loan_amount: numeric,
    loan_amount_term: numeric,
    credit_history: numeric.pipe(z.union([z.literal(0), z.literal(1)])),
    property_area: z.enum(['Urban', 'Semiurban', 'Rural']),
    total_income: numeric,
    emi: numeric,
    emi_income_ratio: numeric,
    predicted_approval: yesNo,
    risk_score: numeric,
    risk_category: z.enum(['Low', 'Medium', 'High']),
    recommendation: z.string(),
    confidence_score: nullableNumeric,
    ml_justification: z.string(),
    prediction_method: z.enum(['ml', 'rule_based']),
    final_status: yesNo.nullable(),
    admin_notes: z.string().nullable(),
    reviewed_by_id: nullableNumeric,
    admin_decision_date: nullableTimestamp,
    created_at: timestamp,
    updated_at: timestamp,
});

const dailyRowSchema = z.object({ day: z.string(), approved: numeric, rejected: numeric });

const summaryRowSchema = z.object({
    total: numeric,
    pending: numeric,
    approved: numeric,
    rejected: numeric,
    avg_risk_score: numeric,
    total_loan_amount: numeric,
    approved_loan_amount: numeric,
    today: numeric,
    this_week: numeric,
    this_month: numeric,
    low_risk: numeric,
    medium_risk: numeric,
    high_risk: numeric,
});

export function mapLoanRow(row: unknown): LoanApplicationRecord {
    return loanRowSchema.parse(row);
}

export class PgLoanRepository implements LoanRepository {
    constructor(private readonly pool: Pool) {}

    async create(a: NewLoanApplication): Promise<void> {
        await this.pool.query(
            `INSERT INTO loan_applications (
                application_id, gender, married, dependents, education, self_employed,
                applicant_income, coapplicant_income, loan_amount, loan_amount_term, credit_history,
                property_area, total_income, emi, emi_income_ratio, predicted_approval, risk_score,
                risk_category, recommendation, confidence_score, ml_justification, prediction_method
            ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20,$21,$22)`,
            [
                a.application_id, a.gender, a.married, a.dependents, a.education, a.self_employed,
                a.applicant_income, a.coapplicant_income, a.loan_amount, a.loan_amount_term, a.credit_history,
                a.property_area, a.total_income, a.emi, a.emi_income_ratio, a.predicted_approval, a.risk_score,
                a.risk_category, a.recommendation, a.confidence_score, a.ml_justification, a.prediction_method,
            ]
        );
    }

    async findById(applicationId: string): Promise<LoanApplicationRecord | null> {
        const { rows } = await this.pool.query(
            'SELECT * FROM loan_applications WHERE application_id = $1',
            [applicationId]
        );
        return rows.length > 0 ? mapLoanRow(rows[0]) : null;
    }

    async updateAdminDecision(applicationId: string, decision: AdminDecision, at: Date): Promise<LoanApplicationRecord | null> {
        const { rows } = await this.pool.query(
            `UPDATE loan_applications
                SET final_status = $2, admin_notes = $3, reviewed_by_id = $4,
                    admin_decision_date = $5, updated_at = $5
              WHERE application_id = $1
          RETURNING *`,
            [applicationId, decision.final_status, decision.admin_notes, decision.reviewed_by_id, at]
        );
        return rows.length > 0 ? mapLoanRow(rows[0]) : null;
    }

    async listForReview(minRiskScore: number, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>> {
        const where = new WhereBuilder()
            .add('final_status IS NULL')
            .add('risk_score > ?', minRiskScore);
        return this.page(where, limit, offset);
    }

    async list(filters: LoanListFilters, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>> {
        const where = new WhereBuilder()
            .addIf(filters.status !== undefined, STATUS_CONDITION[filters.status ?? 'pending'])
            .addIf(filters.risk_category !== undefined, 'risk_category = ?', filters.risk_category)
            .addIf(filters.date_from !== undefined, 'created_at >= ?', filters.date_from)
            .addIf(filters.date_to !== undefined, 'created_at <= ?', filters.date_to)
            .addIf(filters.min_loan_amount !== undefined, 'loan_amount >= ?', filters.min_loan_amount)
            .addIf(filters.max_loan_amount !== undefined, 'loan_amount <= ?', filters.max_loan_amount)
            .addIf(filters.property_area !== undefined, 'property_area = ?', filters.property_area)
            .addIf(Boolean(filters.search), 'application_id ILIKE ?', `%${filters.search}%`);
        return this.page(where, limit, offset);
    }

    private async page(where: WhereBuilder, limit: number, offset: number): Promise<Paged<LoanApplicationRecord>> {
        const clause = where.toSql();
        const countResult = await this.pool.query(
            `SELECT COUNT(*) AS total FROM loan_applications ${clause}`,
            where.params
        );
        const limitParam = where.next(limit);
        const offsetParam = where.next(offset);
        const { rows } = await this.pool.query(
            `SELECT * FROM loan_applications ${clause}
              ORDER BY created_at DESC
              LIMIT ${limitParam} OFFSET ${offsetParam}`,
            where.params
        );
        return { items: rows.map(mapLoanRow), total: readCount(countResult.rows) };
    }

    async listReviewed(since?: Date): Promise<LoanApplicationRecord[]> {
        const where = new WhereBuilder()
            .add('final_status IS NOT NULL')
            .addIf(since !== undefined, 'created_at >= ?', since);
        const { rows } = await this.pool.query(
            `SELECT * FROM loan_applications ${where.toSql()} ORDER BY created_at ASC`,
            where.params
        );
        return rows.map(mapLoanRow);
    }

    async summarize(windows: SummaryWindows): Promise<LoanSummary> {
        const { rows } = await this.pool.query(
            `SELECT
                COUNT(*) AS total,
                COUNT(*) FILTER (WHERE final_status IS NULL) AS pending,
                COUNT(*) FILTER (WHERE final_status = 'Yes') AS approved,
                COUNT(*) FILTER (WHERE final_status = 'No') AS rejected,
                COALESCE(AVG(risk_score), 0) AS avg_risk_score,
                COALESCE(SUM(loan_amount), 0) AS total_loan_amount,
                COALESCE(SUM(loan_amount) FILTER (WHERE final_status = 'Yes'), 0) AS approved_loan_amount,
                COUNT(*) FILTER (WHERE created_at >= $1) AS today,
                COUNT(*) FILTER (WHERE created_at >= $2) AS this_week,
                COUNT(*) FILTER (WHERE created_at >= $3) AS this_month,
                COUNT(*) FILTER (WHERE risk_category = 'Low') AS low_risk,
                COUNT(*) FILTER (WHERE risk_category = 'Medium') AS medium_risk,
                COUNT(*) FILTER (WHERE risk_category = 'High') AS high_risk
             FROM loan_applications`,
            [windows.todayStart, windows.weekStart, windows.monthStart]
        );
        const r = summaryRowSchema.parse(rows[0]);
        return {
            total: r.total,
            pending: r.pending,
            approved: r.approved,
            rejected: r.rejected,
            avg_risk_score: r.avg_risk_score,
            total_loan_amount: r.total_loan_amount,
            approved_loan_amount: r.approved_loan_amount,
            today: r.today,
            this_week: r.this_week,
            this_month: r.this_month,
            risk_distribution: { Low: r.low_risk, Medium: r.medium_risk, High: r.high_risk },
        };
    }

    async decisionsByDay(from: Date): Promise<DailyDecisionCount[]> {
        const { rows } = await this.pool.query(
            `SELECT to_char(admin_decision_date AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day,
                    COUNT(*) FILTER (WHERE final_status = 'Yes') AS approved,
                    COUNT(*) FILTER (WHERE final_status = 'No') AS rejected
               FROM loan_applications
              WHERE admin_decision_date >= $1
              GROUP BY 1`,
            [from]
        );
        return rows.map(r => dailyRowSchema.parse(r));
    }
}
