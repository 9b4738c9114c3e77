import { FeatureRecord, FeatureWeights, RiskBreakdown } from '../../types';
import { DEFAULT_FEATURE_WEIGHTS } from './default_weights';
import { clamp } from './risk';
import { MAX_LISTED_FACTORS, ScoringStrategy, StrategyOutcome } from './scoring_strategy';

type FactorGroup = 'credit' | 'income' | 'employment' | 'profile';

export interface FactorDefinition {
    feature: string;
    group: FactorGroup;
    positive: string;
    negative: string;
    /** Normalised strength in [0,1]; 1 is the most favourable value. */
    strength(record: FeatureRecord): number;
}

const STRONG = 0.75;
const WEAK = 0.4;

const PROPERTY_AREA_STRENGTH = { Semiurban: 1, Urban: 0.8, Rural: 0.6 } as const;

export const FACTORS: readonly FactorDefinition[] = [
    {
        feature: 'credit_history',
        group: 'credit',
        positive: 'good credit history',
        negative: 'poor credit history',
        strength: r => (r.credit_history === 1 ? 1 : 0),
    },
    {
        feature: 'total_income',
        group: 'income',
        positive: 'adequate income level',
        negative: 'insufficient income',
        strength: r => clamp(r.total_income / 10000),
    },
    {
        feature: 'emi_income_ratio',
        group: 'income',
        positive: 'manageable EMI burden',
        negative: 'high EMI-to-income ratio',
        // <= 10% of income is ideal, >= 50% is the worst case
        strength: r => clamp(1 - (r.emi_income_ratio - 0.1) / 0.4),
    },
    {
        feature: 'loan_amount',
        group: 'income',
        positive: 'loan size proportionate to income',
        negative: 'loan amount large relative to income',
        strength: r => clamp(1 - (r.loan_income_ratio - 1) / 5),
    },
    {
        feature: 'education',
        group: 'employment',
        positive: 'graduate education',
        negative: 'non-graduate education',
        strength: r => (r.education === 'Graduate' ? 1 : 0.4),
    },
    {
        feature: 'property_area',
        group: 'profile',
        positive: 'favourable property location',
        negative: 'higher-risk property location',
        strength: r => PROPERTY_AREA_STRENGTH[r.property_area],
    },
    {
        feature: 'self_employed',
        group: 'employment',
        positive: 'salaried employment',
        negative: 'variable self-employment income',
        strength: r => (r.self_employed === 'No' ? 1 : 0.6),
    },
    {
        feature: 'married',
        group: 'profile',
        positive: 'stable household profile',
        negative: 'single-income household',
        strength: r => (r.married === 'Yes' ? 1 : 0.7),
    },
    {
        feature: 'dependents',
        group: 'profile',
        positive: 'few dependents',
        negative: 'high number of dependents',
        strength: r => {
            if (r.dependents <= 0) return 1;
            if (r.dependents === 1) return 0.85;
            if (r.dependents === 2) return 0.7;
            return 0.5;
        },
    },
];

export const FACTOR_LABELS: ReadonlyMap<string, Pick<FactorDefinition, 'positive' | 'negative'>> = new Map(
    FACTORS.map(f => [f.feature, { positive: f.positive, negative: f.negative }])
);

interface ScoredFactor {
    definition: FactorDefinition;
    weight: number;
    strength: number;
}

// Features the store does not mention keep their default weight; a zero weight drops the factor.
function effectiveWeights(weights: FeatureWeights): FeatureWeights {
    const merged = { ...DEFAULT_FEATURE_WEIGHTS, ...weights };
    const usable = FACTORS.some(f => (merged[f.feature] ?? 0) > 0);
    return usable ? merged : DEFAULT_FEATURE_WEIGHTS;
}

/**
 * Weighted-sum fallback used whenever the trained model is unavailable.
 * Pure: identical input and weights always give the identical outcome.
 */
export class RuleBasedStrategy implements ScoringStrategy {
    public readonly method = 'rule_based' as const;

    evaluate(record: FeatureRecord, weights: FeatureWeights): StrategyOutcome {
        const active = effectiveWeights(weights);

        const scored: ScoredFactor[] = FACTORS
            .map(definition => ({
                definition,
                weight: active[definition.feature] ?? 0,
                strength: definition.strength(record),
            }))
            .filter(f => f.weight > 0);

        const totalWeight = scored.reduce((sum, f) => sum + f.weight, 0);
        const weightedSum = scored.reduce((sum, f) => sum + f.weight * f.strength, 0);

        const positiveFactors = scored
            .filter(f => f.strength >= STRONG)
            .sort((a, b) => b.weight * b.strength - a.weight * a.strength)
            .slice(0, MAX_LISTED_FACTORS)
            .map(f => f.definition.positive);

        const riskFactors = scored
            .filter(f => f.strength <= WEAK)
            .sort((a, b) => b.weight * (1 - b.strength) - a.weight * (1 - a.strength))
            .slice(0, MAX_LISTED_FACTORS)
            .map(f => f.definition.negative);

        return {
            approvalProbability: totalWeight > 0 ? weightedSum / totalWeight : 0,
            positiveFactors,
            riskFactors,
        };
    }
}

/** Per-area risk (0-100) from the unweighted factor strengths. */
export function riskBreakdown(record: FeatureRecord): RiskBreakdown {
    const groupRisk = (group: FactorGroup): number => {
        const members = FACTORS.filter(f => f.group === group);
        const mean = members.reduce((sum, f) => sum + f.strength(record), 0) / members.length;
        return Math.round((1 - mean) * 100);
    };

    return {
        credit_risk_score: groupRisk('credit'),
        income_risk_score: groupRisk('income'),
        employment_risk_score: groupRisk('employment'),
    };
}
