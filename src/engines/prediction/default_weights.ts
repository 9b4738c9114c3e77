import { FeatureWeights } from '../../types';

export interface DefaultWeight {
    feature_name: string;
    weight: number;
    description: string;
}

// Gender is deliberately absent: it is never scored.
export const DEFAULT_WEIGHT_TABLE: readonly DefaultWeight[] = [
    { feature_name: 'credit_history', weight: 2.5, description: 'Credit history is the most important factor' },
    { feature_name: 'total_income', weight: 2.0, description: 'Total household income' },
    { feature_name: 'emi_income_ratio', weight: 1.8, description: 'EMI to income ratio' },
    { feature_name: 'loan_amount', weight: 1.5, description: 'Loan amount relative to annual income' },
    { feature_name: 'education', weight: 1.2, description: 'Education level' },
    { feature_name: 'property_area', weight: 1.1, description: 'Property location' },
    { feature_name: 'self_employed', weight: 1.0, description: 'Employment type' },
    { feature_name: 'married', weight: 0.9, description: 'Marital status' },
    { feature_name: 'dependents', weight: 0.8, description: 'Number of dependents' },
];

export const DEFAULT_FEATURE_WEIGHTS: FeatureWeights = Object.fromEntries(
    DEFAULT_WEIGHT_TABLE.map(w => [w.feature_name, w.weight])
);

export const MIN_WEIGHT_EXCLUSIVE = 0;
export const MAX_WEIGHT = 10;
