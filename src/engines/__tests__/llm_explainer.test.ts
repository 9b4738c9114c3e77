import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { featureEngine } from '../feature_engine';
import { CompletionRequest, LlmExplainer, buildExplanationPrompt, templateExplanation } from '../llm_explainer';
import { DEFAULT_FEATURE_WEIGHTS } from '../prediction/default_weights';
import { LoanPredictor } from '../prediction/predictor';
import { sampleApplication, weakApplication } from '../../test/fakes';

const predictor = new LoanPredictor({ modelPath: 'missing/model.json', preprocessorPath: 'missing/preprocessor.json' });
const approved = predictor.predict(featureEngine.enrich(sampleApplication()), DEFAULT_FEATURE_WEIGHTS);
const rejected = predictor.predict(featureEngine.enrich(weakApplication()), DEFAULT_FEATURE_WEIGHTS);

describe('templateExplanation', () => {
    it('names the strengths of an approval', () => {
        assert.equal(
            templateExplanation(approved),
            'Loan approved with risk score 11/100. Key strengths: good credit history, manageable EMI burden, loan size proportionate to income.',
        );
    });

    it('names the concerns of a rejection', () => {
        assert.equal(
            templateExplanation(rejected),
            'Loan rejected with risk score 76/100. Primary concerns: poor credit history, high EMI-to-income ratio, insufficient income. '
                + 'Consider improving financial profile before reapplying.',
        );
    });
});

describe('buildExplanationPrompt', () => {
    it('includes the financial figures and the decision', () => {
        const prompt = buildExplanationPrompt(sampleApplication(), approved);
        assert.ok(prompt.includes('- Total Income: $5,849.00'));
        assert.ok(prompt.includes('- Loan Amount: $128,000.00'));
        assert.ok(prompt.includes('- EMI to Income Ratio: 6.1%'));
        assert.ok(prompt.includes('- Risk Score: 11/100'));
    });
});

describe('LlmExplainer', () => {
    it('uses the template when no key is configured', async () => {
        const explainer = new LlmExplainer({});
        assert.equal(explainer.usesLanguageModel, false);
        assert.equal(await explainer.explain(sampleApplication(), approved), templateExplanation(approved));
    });

    it('returns the language model answer', async () => {
        const requests: CompletionRequest[] = [];
        const explainer = new LlmExplainer({
            model: 'test-model',
            complete: async request => {
                requests.push(request);
                return 'Strong credit and low EMI burden.';
            },
        });

        assert.equal(await explainer.explain(sampleApplication(), approved), 'Strong credit and low EMI burden.');
        assert.equal(requests.length, 1);
        assert.equal(requests[0]?.model, 'test-model');
    });

    it('falls back to the template without retrying when the call fails', async () => {
        let calls = 0;
        const explainer = new LlmExplainer({
            complete: async () => {
                calls += 1;
                throw new Error('timeout');
            },
        });

        assert.equal(await explainer.explain(weakApplication(), rejected), templateExplanation(rejected));
        assert.equal(calls, 1);
    });

    it('falls back to the template on an empty answer', async () => {
        const explainer = new LlmExplainer({ complete: async () => null });
        assert.equal(await explainer.explain(sampleApplication(), approved), templateExplanation(approved));
    });
});
