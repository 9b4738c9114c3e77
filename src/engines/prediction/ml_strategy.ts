import { FeatureRecord, FeatureWeights } from '../../types';
import { PredictionError } from '../../utils/errors';
import { ModelArtifacts } from './model_artifacts';
import { FACTOR_LABELS } from './rule_based_strategy';
import { MAX_LISTED_FACTORS, ScoringStrategy, StrategyOutcome } from './scoring_strategy';

export const sigmoid = (z: number): number => 1 / (1 + Math.exp(-z));

const humanize = (feature: string): string => feature.replace(/_/g, ' ');

/**
 * Turns an enriched application into the ordered numeric vector the model was trained on,
 * mapping categorical values through the stored ordinal tables.
 */
export function vectorize(record: FeatureRecord, artifacts: ModelArtifacts): Map<string, number> {
    const values: Record<string, unknown> = { ...record };
    const { feature_names, categorical_mappings } = artifacts.preprocessor;
    const vector = new Map<string, number>();

    for (const name of feature_names) {
        const raw = values[name];
        if (typeof raw === 'number') {
            vector.set(name, raw);
        } else if (typeof raw === 'string') {
            vector.set(name, categorical_mappings[name]?.[raw] ?? 0);
        } else {
            throw new PredictionError(`Model expects unknown feature '${name}'`);
        }
    }

    return vector;
}

export class MlStrategy implements ScoringStrategy {
    public readonly method = 'ml' as const;

    constructor(public readonly artifacts: ModelArtifacts) {}

    // Admin weights only steer the rule-based scorer; the trained model carries its own.
    evaluate(record: FeatureRecord, _weights: FeatureWeights): StrategyOutcome {
        const { model } = this.artifacts;
        const vector = vectorize(record, this.artifacts);
        const contributions: Array<{ feature: string; value: number }> = [];

        let z = model.intercept;
        for (const [feature, value] of vector) {
            const coefficient = model.coefficients[feature] ?? 0;
            const mean = model.scaler?.mean[feature] ?? 0;
            const scale = model.scaler?.scale[feature] || 1;
            const contribution = coefficient * ((value - mean) / scale);
            contributions.push({ feature, value: contribution });
            z += contribution;
        }

        if (!Number.isFinite(z)) {
            throw new PredictionError('Model produced a non-finite score');
        }

        const positiveFactors = contributions
            .filter(c => c.value > 0)
            .sort((a, b) => b.value - a.value)
            .slice(0, MAX_LISTED_FACTORS)
            .map(c => FACTOR_LABELS.get(c.feature)?.positive ?? humanize(c.feature));

        const riskFactors = contributions
            .filter(c => c.value < 0)
            .sort((a, b) => a.value - b.value)
            .slice(0, MAX_LISTED_FACTORS)
            .map(c => FACTOR_LABELS.get(c.feature)?.negative ?? humanize(c.feature));

        return { approvalProbability: sigmoid(z), positiveFactors, riskFactors };
    }
}
