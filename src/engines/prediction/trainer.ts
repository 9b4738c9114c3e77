import { LoanApplicationInput, LoanDecision } from '../../types';
import { featureEngine, round } from '../feature_engine';
import { ModelArtifacts, PreprocessorInfo } from './model_artifacts';
import { sigmoid, vectorize } from './ml_strategy';

export interface LabelledApplication {
    input: LoanApplicationInput;
    label: LoanDecision;
}

export interface TrainingOptions {
    learningRate?: number;
    epochs?: number;
    l2?: number;
    version?: string;
    now?: Date;
}

export interface TrainingResult {
    artifacts: ModelArtifacts;
    accuracy: number;
    training_samples: number;
    holdout_samples: number;
}

export const MIN_TRAINING_SAMPLES = 50;

export const FEATURE_NAMES = [
    'credit_history', 'applicant_income', 'coapplicant_income', 'loan_amount', 'loan_amount_term',
    'dependents', 'gender', 'married', 'education', 'self_employed', 'property_area',
    'total_income', 'emi', 'emi_income_ratio', 'loan_income_ratio',
];

export const CATEGORICAL_MAPPINGS: PreprocessorInfo['categorical_mappings'] = {
    gender: { Male: 1, Female: 0 },
    married: { Yes: 1, No: 0 },
    education: { Graduate: 1, 'Not Graduate': 0 },
    self_employed: { Yes: 1, No: 0 },
    property_area: { Urban: 2, Semiurban: 1, Rural: 0 },
};

export const FEATURE_CATEGORIES: PreprocessorInfo['feature_categories'] = {
    credit_features: ['credit_history'],
    income_features: ['applicant_income', 'coapplicant_income', 'total_income'],
    employment_features: ['education', 'self_employed'],
    loan_features: ['loan_amount', 'loan_amount_term', 'emi', 'emi_income_ratio', 'loan_income_ratio'],
    demographic_features: ['gender', 'married', 'dependents', 'property_area'],
};

const baseArtifacts = (): ModelArtifacts => ({
    model: {
        model_type: 'logistic_regression',
        version: 'untrained',
        trained_at: new Date(0).toISOString(),
        intercept: 0,
        coefficients: {},
    },
    preprocessor: {
        feature_names: FEATURE_NAMES,
        feature_importance: {},
        categorical_mappings: CATEGORICAL_MAPPINGS,
        feature_categories: FEATURE_CATEGORIES,
    },
});

/**
 * Fits a standardised, L2-regularised logistic regression with batch gradient descent.
 * Every fifth sample is held out for the reported accuracy.
 */
export function trainLogisticModel(samples: LabelledApplication[], options: TrainingOptions = {}): TrainingResult {
    const { learningRate = 0.1, epochs = 500, l2 = 0.01, now = new Date() } = options;
    const skeleton = baseArtifacts();

    const rows = samples.map(s => {
        const vector = vectorize(featureEngine.enrich(s.input), skeleton);
        return {
            x: FEATURE_NAMES.map(name => vector.get(name) ?? 0),
            y: s.label === 'Yes' ? 1 : 0,
        };
    });

    const train = rows.filter((_, i) => i % 5 !== 4);
    const holdout = rows.filter((_, i) => i % 5 === 4);
    const fitRows = train.length > 0 ? train : rows;
    const n = fitRows.length;
    const dims = FEATURE_NAMES.length;

    const mean = new Array<number>(dims).fill(0);
    const scale = new Array<number>(dims).fill(1);
    for (let j = 0; j < dims; j++) {
        mean[j] = fitRows.reduce((sum, r) => sum + r.x[j], 0) / n;
        const variance = fitRows.reduce((sum, r) => sum + (r.x[j] - mean[j]) ** 2, 0) / n;
        scale[j] = Math.sqrt(variance) || 1;
    }

    const standardise = (x: number[]) => x.map((v, j) => (v - mean[j]) / scale[j]);
    const scaled = fitRows.map(r => ({ x: standardise(r.x), y: r.y }));

    const weights = new Array<number>(dims).fill(0);
    let bias = 0;

    for (let epoch = 0; epoch < epochs; epoch++) {
        const gradient = new Array<number>(dims).fill(0);
        let biasGradient = 0;

        for (const row of scaled) {
            const z = bias + row.x.reduce((sum, v, j) => sum + v * weights[j], 0);
            const error = sigmoid(z) - row.y;
            for (let j = 0; j < dims; j++) gradient[j] += error * row.x[j];
            biasGradient += error;
        }

        for (let j = 0; j < dims; j++) {
            weights[j] -= learningRate * (gradient[j] / n + l2 * weights[j]);
        }
        bias -= learningRate * (biasGradient / n);
    }

    const evaluationRows = holdout.length > 0 ? holdout : fitRows;
    const correct = evaluationRows.filter(r => {
        const z = bias + standardise(r.x).reduce((sum, v, j) => sum + v * weights[j], 0);
        return (sigmoid(z) >= 0.5 ? 1 : 0) === r.y;
    }).length;
    const accuracy = round(correct / evaluationRows.length, 4);

    const magnitude = weights.reduce((sum, w) => sum + Math.abs(w), 0) || 1;
    const byFeature = <T>(values: T[]) => Object.fromEntries(FEATURE_NAMES.map((name, j) => [name, values[j]]));

    return {
        artifacts: {
            model: {
                model_type: 'logistic_regression',
                version: options.version ?? `lr-${now.getTime()}`,
                trained_at: now.toISOString(),
                intercept: bias,
                coefficients: byFeature(weights),
                scaler: { mean: byFeature(mean), scale: byFeature(scale) },
                metrics: { accuracy, samples: samples.length },
            },
            preprocessor: {
                ...skeleton.preprocessor,
                feature_importance: byFeature(weights.map(w => round(Math.abs(w) / magnitude, 4))),
            },
        },
        accuracy,
        training_samples: fitRows.length,
        holdout_samples: holdout.length,
    };
}
