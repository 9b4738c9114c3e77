import OpenAI from 'openai';
import { env } from '../config/env';
import { LoanApplicationInput, PredictionResult } from '../types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { featureEngine } from './feature_engine';

const log = createLogger('LLMExplainer');

export interface CompletionRequest {
    model: string;
    system: string;
    user: string;
}

/** Resolves to the generated text, or null when the service returned nothing usable. */
export type CompletionFn = (request: CompletionRequest) => Promise<string | null>;

export interface ExplainerOptions {
    apiKey?: string;
    model?: string;
    complete?: CompletionFn;
}

const SYSTEM_PROMPT = 'You are a financial analyst expert at explaining loan approval decisions. '
    + 'Provide clear, concise explanations that are easy to understand.';

function openAiCompletion(apiKey: string): CompletionFn {
    const openai = new OpenAI({ apiKey });
    return async ({ model, system, user }) => {
        const completion = await openai.chat.completions.create({
            model,
            messages: [
                { role: 'system', content: system },
                { role: 'user', content: user },
            ],
            max_tokens: 200,
            temperature: 0.3,
        });
        return completion.choices[0]?.message.content?.trim() || null;
    };
}

const money = (value: number) => `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

export function buildExplanationPrompt(input: LoanApplicationInput, result: PredictionResult): string {
    const { total_income, emi_income_ratio } = featureEngine.derive(input);

    return `Loan Application Analysis:

Applicant Details:
- Gender: ${input.gender}
- Marital Status: ${input.married}
- Education: ${input.education}
- Self Employed: ${input.self_employed}
- Dependents: ${input.dependents}
- Property Area: ${input.property_area}

Financial Information:
- Applicant Income: ${money(input.applicant_income)}
- Co-applicant Income: ${money(input.coapplicant_income)}
- Total Income: ${money(total_income)}
- Loan Amount: ${money(input.loan_amount * 1000)}
- Loan Term: ${input.loan_amount_term} months
- EMI to Income Ratio: ${(emi_income_ratio * 100).toFixed(1)}%
- Credit History: ${input.credit_history === 1 ? 'Good' : 'Poor'}

AI Decision:
- Loan Decision: ${result.loan_decision}
- Risk Score: ${result.risk_score}/100
- Risk Category: ${result.risk_category}
- Recommendation: ${result.recommendation}
- Confidence: ${(result.confidence_score * 100).toFixed(0)}%
- Strengths: ${result.key_positive_factors.join(', ') || 'none'}
- Concerns: ${result.key_risk_factors.join(', ') || 'none'}

Please provide a clear, professional explanation (2-3 sentences) for this loan decision that focuses on the key factors that influenced the outcome.`;
}

/** Deterministic justification naming the dominant factors. */
export function templateExplanation(result: PredictionResult): string {
    const parts: string[] = [];

    if (result.loan_decision === 'Yes') {
        parts.push(`Loan approved with risk score ${result.risk_score}/100.`);
        if (result.key_positive_factors.length > 0) {
            parts.push(`Key strengths: ${result.key_positive_factors.slice(0, 3).join(', ')}.`);
        }
        if (result.key_risk_factors.length > 0) {
            parts.push(`Areas to monitor: ${result.key_risk_factors.slice(0, 2).join(', ')}.`);
        }
    } else {
        parts.push(`Loan rejected with risk score ${result.risk_score}/100.`);
        if (result.key_risk_factors.length > 0) {
            parts.push(`Primary concerns: ${result.key_risk_factors.slice(0, 3).join(', ')}.`);
        }
        parts.push('Consider improving financial profile before reapplying.');
    }

    return parts.join(' ');
}

export class LlmExplainer {
    private readonly complete: CompletionFn | null;
    private readonly model: string;

    constructor(options: ExplainerOptions = {}) {
        this.model = options.model ?? env.LLM_MODEL_NAME;
        if (options.complete) {
            this.complete = options.complete;
        } else if (options.apiKey) {
            this.complete = openAiCompletion(options.apiKey);
        } else {
            this.complete = null;
        }
    }

    get usesLanguageModel(): boolean {
        return this.complete !== null;
    }

    /** Never rejects: any failure of the language model degrades to the template, without retrying. */
    async explain(input: LoanApplicationInput, result: PredictionResult): Promise<string> {
        if (!this.complete) {
            return templateExplanation(result);
        }

        try {
            const text = await this.complete({
                model: this.model,
                system: SYSTEM_PROMPT,
                user: buildExplanationPrompt(input, result),
            });
            if (text) return text;
            log.warn('Empty completion, using template explanation');
        } catch (error) {
            log.error(`OpenAI explanation failed: ${errorMessage(error)}`);
        }

        return templateExplanation(result);
    }
}
