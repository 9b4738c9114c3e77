import { LoanDecision, RiskCategory } from '../../types';

export const LOW_RISK_THRESHOLD = 30;
export const HIGH_RISK_THRESHOLD = 70;
export const APPROVAL_THRESHOLD = 50;

export function clamp(value: number, min = 0, max = 1): number {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
}

/** Maps an approval probability onto the 0-100 risk scale. */
export function toRiskScore(approvalProbability: number): number {
    return Math.round(clamp(1 - approvalProbability) * 100);
}

export function categorizeRisk(riskScore: number): RiskCategory {
    if (riskScore < LOW_RISK_THRESHOLD) return 'Low';
    if (riskScore > HIGH_RISK_THRESHOLD) return 'High';
    return 'Medium';
}

export function decide(riskScore: number): LoanDecision {
    return riskScore < APPROVAL_THRESHOLD ? 'Yes' : 'No';
}

export function recommend(category: RiskCategory, decision: LoanDecision): string {
    switch (category) {
        case 'Low':
            return 'Approve';
        case 'Medium':
            return decision === 'Yes' ? 'Approve with conditions' : 'Manual review';
        case 'High':
            return 'Reject';
    }
}

export function confidenceOf(approvalProbability: number): number {
    const p = clamp(approvalProbability);
    return Math.round(Math.max(p, 1 - p) * 100) / 100;
}
