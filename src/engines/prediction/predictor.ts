import { performance } from 'perf_hooks';
import { FeatureRecord, FeatureWeights, PredictionResult } from '../../types';
import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { featureEngine, round } from '../feature_engine';
import { ArtifactPaths, ModelArtifacts, loadModelArtifacts } from './model_artifacts';
import { MlStrategy } from './ml_strategy';
import { RuleBasedStrategy, riskBreakdown } from './rule_based_strategy';
import { categorizeRisk, confidenceOf, decide, recommend, toRiskScore } from './risk';
import { ScoringStrategy, StrategyOutcome } from './scoring_strategy';

const log = createLogger('Predictor');

export interface PredictorStats {
    total_predictions: number;
    ml_predictions: number;
    fallback_predictions: number;
    ml_failures: number;
    avg_prediction_time_ms: number;
}

export interface ModelInfo {
    model_loaded: boolean;
    prediction_method: 'ml' | 'rule_based';
    model_path: string;
    preprocessor_path: string;
    model_version: string | null;
    trained_at: string | null;
    features: string[];
    feature_importance: Record<string, number>;
    stats: PredictorStats;
}

/**
 * Owns the cached model and the prediction counters for the life of the process.
 * Built once at startup and handed to whatever needs to score.
 */
export class LoanPredictor {
    private ml: MlStrategy | null = null;
    private readonly fallback = new RuleBasedStrategy();

    private total = 0;
    private mlCount = 0;
    private fallbackCount = 0;
    private mlFailures = 0;
    private totalTimeMs = 0;

    constructor(private readonly paths: ArtifactPaths) {}

    get isLoaded(): boolean {
        return this.ml !== null;
    }

    async load(): Promise<boolean> {
        const artifacts = await loadModelArtifacts(this.paths);
        this.useArtifacts(artifacts);
        if (artifacts) {
            log.info(`ML model ${artifacts.model.version} loaded (${artifacts.preprocessor.feature_names.length} features)`);
        } else {
            log.warn('No ML model available. Using rule-based scoring.');
        }
        return this.isLoaded;
    }

    /** Re-reads the artifacts, e.g. after retraining. Keeps the current model if the new one is unreadable. */
    async reload(): Promise<boolean> {
        const artifacts = await loadModelArtifacts(this.paths);
        if (artifacts) this.useArtifacts(artifacts);
        return this.isLoaded;
    }

    useArtifacts(artifacts: ModelArtifacts | null): void {
        this.ml = artifacts ? new MlStrategy(artifacts) : null;
    }

    predict(record: FeatureRecord, weights: FeatureWeights): PredictionResult {
        const started = performance.now();

        const { strategy, outcome } = this.score(record, weights);
        const riskScore = toRiskScore(outcome.approvalProbability);
        const riskCategory = categorizeRisk(riskScore);
        const decision = decide(riskScore);

        const elapsed = performance.now() - started;
        this.total += 1;
        this.totalTimeMs += elapsed;
        if (strategy.method === 'ml') this.mlCount += 1;
        else this.fallbackCount += 1;

        return {
            loan_decision: decision,
            risk_score: riskScore,
            risk_category: riskCategory,
            recommendation: recommend(riskCategory, decision),
            confidence_score: confidenceOf(outcome.approvalProbability),
            key_positive_factors: outcome.positiveFactors,
            key_risk_factors: outcome.riskFactors,
            prediction_method: strategy.method,
            processing_time_ms: round(elapsed, 3),
            risk_breakdown: riskBreakdown(record),
            debt_to_income_ratio: record.emi_income_ratio,
            suggested_loan_amount: decision === 'No'
                ? featureEngine.affordableAmount(record.total_income, record.loan_amount_term)
                : null,
        };
    }

    private score(record: FeatureRecord, weights: FeatureWeights): { strategy: ScoringStrategy; outcome: StrategyOutcome } {
        if (this.ml) {
            try {
                return { strategy: this.ml, outcome: this.ml.evaluate(record, weights) };
            } catch (error) {
                this.mlFailures += 1;
                log.error(`ML scoring failed, falling back to rules: ${errorMessage(error)}`);
            }
        }
        return { strategy: this.fallback, outcome: this.fallback.evaluate(record, weights) };
    }

    getStats(): PredictorStats {
        return {
            total_predictions: this.total,
            ml_predictions: this.mlCount,
            fallback_predictions: this.fallbackCount,
            ml_failures: this.mlFailures,
            avg_prediction_time_ms: this.total > 0 ? round(this.totalTimeMs / this.total, 3) : 0,
        };
    }

    getModelInfo(): ModelInfo {
        const artifacts = this.ml?.artifacts;
        return {
            model_loaded: this.isLoaded,
            prediction_method: this.isLoaded ? 'ml' : 'rule_based',
            model_path: this.paths.modelPath,
            preprocessor_path: this.paths.preprocessorPath,
            model_version: artifacts?.model.version ?? null,
            trained_at: artifacts?.model.trained_at ?? null,
            features: artifacts?.preprocessor.feature_names ?? [],
            feature_importance: artifacts?.preprocessor.feature_importance ?? {},
            stats: this.getStats(),
        };
    }
}
