import { subDays } from 'date-fns';
import { round } from '../engines/feature_engine';
import { ModelInfo, LoanPredictor } from '../engines/prediction/predictor';
import { ArtifactPaths, saveModelArtifacts } from '../engines/prediction/model_artifacts';
import { MIN_TRAINING_SAMPLES, trainLogisticModel } from '../engines/prediction/trainer';
import { LoanRepository } from '../repositories/loan_repository';
import { FeatureWeightRow, LoanApplicationRecord, RiskCategory } from '../types';
import { createLogger } from '../utils/logger';
import { Job, JobService } from './job_service';
import { METRICS_PERIOD_DAYS, ReviewMetrics, reviewMetrics } from './loan_service';
import { WeightStore } from './weight_store';

const log = createLogger('AdminService');

export const RETRAINING_JOB = 'model_retraining';
const DRIFT_WINDOW_DAYS = 7;

export interface ModelPerformanceReport {
    basic_metrics: ReviewMetrics;
    total_applications: number;
    approved_applications: number;
    rejected_applications: number;
    accuracy_by_risk: Partial<Record<RiskCategory, number>>;
    model_drift_score: number;
    recommendation: string;
}

export type RetrainingResponse =
    | { success: false; message: string; sample_count: number }
    | { success: true; message: string; sample_count: number; job: Job };

export interface RetrainingOutcome {
    model_version: string;
    accuracy: number;
    training_samples: number;
    holdout_samples: number;
    model_loaded: boolean;
}

const accuracyOf = (apps: LoanApplicationRecord[]): number =>
    apps.length > 0 ? apps.filter(a => a.predicted_approval === a.final_status).length / apps.length : 0;

export function retrainingRecommendation(accuracy: number, driftScore: number, sampleCount: number): string {
    if (accuracy < 0.7) {
        return 'URGENT: Model accuracy is below 70%. Immediate retraining recommended.';
    }
    if (driftScore > 0.1) {
        return 'WARNING: Significant model drift detected. Retraining recommended.';
    }
    if (sampleCount > 500 && accuracy < 0.85) {
        return 'ADVISORY: Consider retraining to improve model performance.';
    }
    return 'OK: Model performance is acceptable. Continue monitoring.';
}

export class AdminService {
    constructor(
        private readonly predictor: LoanPredictor,
        private readonly weights: WeightStore,
        private readonly loans: LoanRepository,
        private readonly jobs: JobService,
        private readonly artifactPaths: ArtifactPaths,
    ) {}

    async getAllFeatureWeights(): Promise<FeatureWeightRow[]> {
        return this.weights.listWeights();
    }

    async updateFeatureWeight(featureName: string, weight: number, description?: string | null): Promise<FeatureWeightRow> {
        return this.weights.upsertWeight(featureName, weight, description);
    }

    getModelInfo(): ModelInfo {
        return this.predictor.getModelInfo();
    }

    async getModelPerformanceReport(now: Date = new Date()): Promise<ModelPerformanceReport> {
        const applications = await this.loans.listReviewed();
        const periodStart = subDays(now, METRICS_PERIOD_DAYS).getTime();
        const basic = reviewMetrics(applications.filter(a => Date.parse(a.created_at) >= periodStart));
        // Older reviews still say something about the model when the last 30 days are empty.
        const accuracy = basic.accuracy ?? accuracyOf(applications);

        const accuracyByRisk: Partial<Record<RiskCategory, number>> = {};
        for (const category of ['Low', 'Medium', 'High'] as const) {
            const inCategory = applications.filter(a => a.risk_category === category);
            if (inCategory.length > 0) accuracyByRisk[category] = round(accuracyOf(inCategory), 4);
        }

        const recentStart = subDays(now, DRIFT_WINDOW_DAYS).getTime();
        const recent = applications.filter(a => Date.parse(a.created_at) > recentStart);
        const drift = recent.length > 0 && applications.length > recent.length
            ? round(Math.abs(accuracyOf(recent) - accuracy), 4)
            : 0;

        return {
            basic_metrics: basic,
            total_applications: applications.length,
            approved_applications: applications.filter(a => a.final_status === 'Yes').length,
            rejected_applications: applications.filter(a => a.final_status === 'No').length,
            accuracy_by_risk: accuracyByRisk,
            model_drift_score: drift,
            recommendation: applications.length > 0
                ? retrainingRecommendation(accuracy, drift, applications.length)
                : 'No applications with admin decisions found.',
        };
    }

    /** Starts retraining on the admin decisions as a background job; refuses below the sample minimum. */
    async triggerRetraining(): Promise<RetrainingResponse> {
        const samples = await this.loans.listReviewed();
        if (samples.length < MIN_TRAINING_SAMPLES) {
            return {
                success: false,
                message: `Insufficient training data (minimum ${MIN_TRAINING_SAMPLES} samples required)`,
                sample_count: samples.length,
            };
        }

        const job = this.jobs.submit(RETRAINING_JOB, { sample_count: samples.length }, () => this.retrain(samples));
        return {
            success: true,
            message: 'Model retraining started',
            sample_count: samples.length,
            job,
        };
    }

    private async retrain(samples: LoanApplicationRecord[]): Promise<RetrainingOutcome> {
        const labelled = samples.flatMap(s => (s.final_status === null ? [] : [{ input: s, label: s.final_status }]));
        const result = trainLogisticModel(labelled);

        await saveModelArtifacts(this.artifactPaths, result.artifacts);
        const loaded = await this.predictor.reload();
        log.info(`Retrained model ${result.artifacts.model.version}: accuracy ${result.accuracy} on ${result.holdout_samples} held-out samples`);

        return {
            model_version: result.artifacts.model.version,
            accuracy: result.accuracy,
            training_samples: result.training_samples,
            holdout_samples: result.holdout_samples,
            model_loaded: loaded,
        };
    }
}
