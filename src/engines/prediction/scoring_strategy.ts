import { FeatureRecord, FeatureWeights, PredictionMethod } from '../../types';

export interface StrategyOutcome {
    approvalProbability: number;
    positiveFactors: string[];
    riskFactors: string[];
}

/**
 * A way of turning an enriched application into an approval probability.
 * The predictor picks one per call; callers never see which.
 */
export interface ScoringStrategy {
    readonly method: PredictionMethod;
    evaluate(record: FeatureRecord, weights: FeatureWeights): StrategyOutcome;
}

export const MAX_LISTED_FACTORS = 3;
