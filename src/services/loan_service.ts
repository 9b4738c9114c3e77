import { format, subDays } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { featureEngine, round } from '../engines/feature_engine';
import { LlmExplainer } from '../engines/llm_explainer';
import { LoanPredictor, PredictorStats } from '../engines/prediction/predictor';
import { LoanRepository } from '../repositories/loan_repository';
import {
    LoanApplicationRecord, LoanDecision, LoanPredictionResponse, OffsetPage, PredictionMethod, RiskCategory,
} from '../types';
import { NotFoundError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { validateLoanApplication } from '../utils/validators';
import { toOffsetPage } from './pagination';
import { WeightStore } from './weight_store';

const log = createLogger('LoanService');

export const REVIEW_RISK_THRESHOLD = 60;
export const METRICS_PERIOD_DAYS = 30;

export interface ReviewMetrics {
    accuracy: number | null;
    total_applications: number;
    correct_predictions: number;
    period_days: number;
    risk_distribution: Record<RiskCategory, number>;
}

export interface PerformanceMetrics {
    database_metrics: ReviewMetrics;
    predictor_metrics: PredictorStats & {
        predictor_loaded: boolean;
        prediction_method: PredictionMethod;
    };
    generated_at: string;
}

export function generateApplicationId(now: Date = new Date()): string {
    const suffix = uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();
    return `LOAN_${format(now, 'yyyyMMdd')}_${suffix}`;
}

/** Agreement between predicted and admin decisions over already reviewed applications. */
export function reviewMetrics(applications: LoanApplicationRecord[], periodDays = METRICS_PERIOD_DAYS): ReviewMetrics {
    const reviewed = applications.filter(a => a.final_status !== null);
    const correct = reviewed.filter(a => a.predicted_approval === a.final_status).length;
    const distribution: Record<RiskCategory, number> = { Low: 0, Medium: 0, High: 0 };
    for (const app of reviewed) distribution[app.risk_category] += 1;

    return {
        accuracy: reviewed.length > 0 ? round(correct / reviewed.length, 4) : null,
        total_applications: reviewed.length,
        correct_predictions: correct,
        period_days: periodDays,
        risk_distribution: distribution,
    };
}

export class LoanService {
    constructor(
        private readonly predictor: LoanPredictor,
        private readonly weights: WeightStore,
        private readonly explainer: LlmExplainer,
        private readonly loans: LoanRepository,
    ) {}

    /**
     * Validate, score, explain and respond. Persisting the application is best effort:
     * a storage failure is logged and the caller still gets the prediction.
     */
    async processApplication(raw: unknown, now: Date = new Date()): Promise<LoanPredictionResponse> {
        const applicationId = generateApplicationId(now);
        log.info(`Processing application ${applicationId}`);

        const input = validateLoanApplication(raw);
        const weights = await this.weights.getActiveWeights();
        const record = featureEngine.enrich(input);

        const prediction = this.predictor.predict(record, weights);
        const justification = await this.explainer.explain(input, prediction);

        const response: LoanPredictionResponse = {
            application_id: applicationId,
            loan_decision: prediction.loan_decision,
            risk_score: prediction.risk_score,
            risk_category: prediction.risk_category,
            justification,
            recommendation: prediction.recommendation,
            confidence_score: prediction.confidence_score,
            key_risk_factors: prediction.key_risk_factors,
            key_positive_factors: prediction.key_positive_factors,
            suggested_loan_amount: prediction.suggested_loan_amount,
            debt_to_income_ratio: prediction.debt_to_income_ratio,
            prediction_method: prediction.prediction_method,
            ...prediction.risk_breakdown,
        };

        try {
            await this.loans.create({
                ...input,
                application_id: applicationId,
                total_income: record.total_income,
                emi: record.emi,
                emi_income_ratio: record.emi_income_ratio,
                predicted_approval: prediction.loan_decision,
                risk_score: prediction.risk_score,
                risk_category: prediction.risk_category,
                recommendation: prediction.recommendation,
                confidence_score: prediction.confidence_score,
                ml_justification: justification,
                prediction_method: prediction.prediction_method,
            });
        } catch (error) {
            log.error(`Failed to persist application ${applicationId}: ${errorMessage(error)}`);
        }

        log.info(`Application ${applicationId}: ${prediction.loan_decision} (risk ${prediction.risk_score}, ${prediction.prediction_method})`);
        return response;
    }

    async getApplication(applicationId: string): Promise<LoanApplicationRecord> {
        const application = await this.loans.findById(applicationId);
        if (!application) {
            throw new NotFoundError(`Application ${applicationId} not found`);
        }
        return application;
    }

    async updateAdminDecision(
        applicationId: string,
        finalStatus: LoanDecision,
        adminNotes: string | null,
        reviewerId: number | null,
    ): Promise<LoanApplicationRecord> {
        const updated = await this.loans.updateAdminDecision(
            applicationId,
            { final_status: finalStatus, admin_notes: adminNotes, reviewed_by_id: reviewerId },
            new Date()
        );
        if (!updated) {
            throw new NotFoundError(`Application ${applicationId} not found`);
        }
        log.info(`Admin decision for ${applicationId}: ${finalStatus} (predicted ${updated.predicted_approval})`);
        return updated;
    }

    /** Undecided applications whose risk score is above the review threshold, newest first. */
    async getApplicationsForReview(limit: number, offset: number): Promise<OffsetPage<LoanApplicationRecord>> {
        const { items, total } = await this.loans.listForReview(REVIEW_RISK_THRESHOLD, limit, offset);
        return toOffsetPage(items, total, limit, offset);
    }

    async getPerformanceMetrics(now: Date = new Date()): Promise<PerformanceMetrics> {
        const reviewed = await this.loans.listReviewed(subDays(now, METRICS_PERIOD_DAYS));
        const info = this.predictor.getModelInfo();

        return {
            database_metrics: reviewMetrics(reviewed),
            predictor_metrics: {
                predictor_loaded: info.model_loaded,
                prediction_method: info.prediction_method,
                ...info.stats,
            },
            generated_at: now.toISOString(),
        };
    }
}
