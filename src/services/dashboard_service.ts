import { subDays } from 'date-fns';
import { round } from '../engines/feature_engine';
import { LoanListFilters, LoanRepository } from '../repositories/loan_repository';
import { LoanApplicationRecord, LoanStatus, Page, RiskCategory } from '../types';
import { toPage } from './pagination';

export const TREND_DAYS = 7;
export const RECENT_APPLICATIONS = 10;

export interface DashboardStats {
    total_applications: number;
    pending_applications: number;
    approved_applications: number;
    rejected_applications: number;
    approval_rate: number;
    average_risk_score: number;
    total_loan_amount: number;
    approved_loan_amount: number;
    applications_today: number;
    applications_this_week: number;
    applications_this_month: number;
}

export interface ApprovalTrend {
    date: string;
    approved: number;
    rejected: number;
    total: number;
}

export interface RecentApplication {
    application_id: string;
    loan_amount: number;
    risk_score: number;
    risk_category: RiskCategory;
    status: LoanStatus;
    created_at: string;
}

export interface Dashboard {
    stats: DashboardStats;
    risk_distribution: Record<RiskCategory, number>;
    approval_trends: ApprovalTrend[];
    recent_applications: RecentApplication[];
}

export type FiltersApplied = { [K in keyof LoanListFilters]?: string | number };

export interface LoanList extends Page<LoanApplicationRecord> {
    filters_applied: FiltersApplied;
}

export function statusOf(application: Pick<LoanApplicationRecord, 'final_status'>): LoanStatus {
    if (application.final_status === 'Yes') return 'approved';
    if (application.final_status === 'No') return 'rejected';
    return 'pending';
}

export function describeFilters(filters: LoanListFilters): FiltersApplied {
    const applied: FiltersApplied = {};
    if (filters.status) applied.status = filters.status;
    if (filters.risk_category) applied.risk_category = filters.risk_category;
    if (filters.date_from) applied.date_from = filters.date_from.toISOString();
    if (filters.date_to) applied.date_to = filters.date_to.toISOString();
    if (filters.min_loan_amount !== undefined) applied.min_loan_amount = filters.min_loan_amount;
    if (filters.max_loan_amount !== undefined) applied.max_loan_amount = filters.max_loan_amount;
    if (filters.property_area) applied.property_area = filters.property_area;
    if (filters.search) applied.search = filters.search;
    return applied;
}

const utcDay = (date: Date): string => date.toISOString().slice(0, 10);

const utcDayStart = (date: Date): Date =>
    new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

export class DashboardService {
    constructor(private readonly loans: LoanRepository) {}

    async getDashboard(now: Date = new Date()): Promise<Dashboard> {
        const summary = await this.loans.summarize({
            todayStart: utcDayStart(now),
            weekStart: subDays(now, 7),
            monthStart: subDays(now, 30),
        });

        const decided = summary.approved + summary.rejected;
        const trendStart = utcDayStart(subDays(now, TREND_DAYS - 1));
        const daily = new Map((await this.loans.decisionsByDay(trendStart)).map(d => [d.day, d]));

        // Newest day first, zero-filled.
        const trends: ApprovalTrend[] = [];
        for (let i = 0; i < TREND_DAYS; i++) {
            const day = utcDay(subDays(now, i));
            const approved = daily.get(day)?.approved ?? 0;
            const rejected = daily.get(day)?.rejected ?? 0;
            trends.push({ date: day, approved, rejected, total: approved + rejected });
        }

        const recent = await this.loans.list({}, RECENT_APPLICATIONS, 0);

        return {
            stats: {
                total_applications: summary.total,
                pending_applications: summary.pending,
                approved_applications: summary.approved,
                rejected_applications: summary.rejected,
                approval_rate: decided > 0 ? round((summary.approved / decided) * 100, 2) : 0,
                average_risk_score: round(summary.avg_risk_score, 2),
                total_loan_amount: summary.total_loan_amount,
                approved_loan_amount: summary.approved_loan_amount,
                applications_today: summary.today,
                applications_this_week: summary.this_week,
                applications_this_month: summary.this_month,
            },
            risk_distribution: summary.risk_distribution,
            approval_trends: trends,
            recent_applications: recent.items.map(a => ({
                application_id: a.application_id,
                loan_amount: a.loan_amount,
                risk_score: a.risk_score,
                risk_category: a.risk_category,
                status: statusOf(a),
                created_at: a.created_at,
            })),
        };
    }

    async listLoans(filters: LoanListFilters, page: number, pageSize: number): Promise<LoanList> {
        const { items, total } = await this.loans.list(filters, pageSize, (page - 1) * pageSize);

        return { ...toPage(items, total, page, pageSize), filters_applied: describeFilters(filters) };
    }
}
