import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { featureEngine } from '../feature_engine';
import { DEFAULT_FEATURE_WEIGHTS } from '../prediction/default_weights';
import { loadModelArtifacts, saveModelArtifacts } from '../prediction/model_artifacts';
import { LoanPredictor } from '../prediction/predictor';
import { FEATURE_NAMES, LabelledApplication, trainLogisticModel } from '../prediction/trainer';
import { sampleApplication } from '../../test/fakes';

/** Decisions that follow credit history exactly. */
function creditLabelledSamples(count: number): LabelledApplication[] {
    return Array.from({ length: count }, (_, i): LabelledApplication => {
        const credit = i % 2 === 0 ? 1 : 0;
        return {
            input: {
                ...sampleApplication(),
                applicant_income: 3000 + ((i * 137) % 4000),
                loan_amount: 100 + ((i * 13) % 80),
                credit_history: credit,
            },
            label: credit === 1 ? 'Yes' : 'No',
        };
    });
}

describe('trainLogisticModel', () => {
    it('holds out every fifth sample', () => {
        const result = trainLogisticModel(creditLabelledSamples(60), { epochs: 50 });
        assert.equal(result.training_samples, 48);
        assert.equal(result.holdout_samples, 12);
        assert.equal(result.artifacts.model.metrics?.samples, 60);
    });

    it('learns a separable decision rule', () => {
        const result = trainLogisticModel(creditLabelledSamples(60), { version: 'lr-test' });
        assert.ok(result.accuracy >= 0.9, `accuracy ${result.accuracy}`);
        assert.ok((result.artifacts.model.coefficients.credit_history ?? 0) > 0);
        assert.equal(result.artifacts.model.version, 'lr-test');
        assert.deepEqual(result.artifacts.preprocessor.feature_names, FEATURE_NAMES);
    });

    it('produces artifacts the predictor can load and score with', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trainer-'));
        const paths = { modelPath: path.join(dir, 'model.json'), preprocessorPath: path.join(dir, 'preprocessor.json') };
        try {
            const { artifacts } = trainLogisticModel(creditLabelledSamples(60));
            await saveModelArtifacts(paths, artifacts);
            assert.notEqual(await loadModelArtifacts(paths), null);

            const predictor = new LoanPredictor(paths);
            assert.equal(await predictor.load(), true);

            const good = predictor.predict(featureEngine.enrich(sampleApplication()), DEFAULT_FEATURE_WEIGHTS);
            const bad = predictor.predict(featureEngine.enrich({ ...sampleApplication(), credit_history: 0 }), DEFAULT_FEATURE_WEIGHTS);
            assert.equal(good.prediction_method, 'ml');
            assert.equal(good.loan_decision, 'Yes');
            assert.equal(bad.loan_decision, 'No');
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it('rejects a malformed artifact on load', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trainer-'));
        const paths = { modelPath: path.join(dir, 'model.json'), preprocessorPath: path.join(dir, 'preprocessor.json') };
        try {
            await fs.writeFile(paths.modelPath, JSON.stringify({ model_type: 'random_forest' }));
            await fs.writeFile(paths.preprocessorPath, JSON.stringify({ feature_names: [] }));
            assert.equal(await loadModelArtifacts(paths), null);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
