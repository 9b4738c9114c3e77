import { DerivedFeatures, FeatureRecord, LoanApplicationInput } from '../types';

// loan_amount is captured in thousands; incomes are monthly.
export const LOAN_AMOUNT_UNIT = 1000;

type AffordabilityInput = Pick<
    LoanApplicationInput,
    'applicant_income' | 'coapplicant_income' | 'loan_amount' | 'loan_amount_term'
>;

/** Unrounded monthly installment; zero for a non-positive term. */
export function monthlyInstallment(loanAmount: number, term: number): number {
    return term > 0 ? (loanAmount * LOAN_AMOUNT_UNIT) / term : 0;
}

export const featureEngine = {
    derive(input: AffordabilityInput): DerivedFeatures {
        const totalIncome = input.applicant_income + input.coapplicant_income;
        const principal = input.loan_amount * LOAN_AMOUNT_UNIT;

        const emi = monthlyInstallment(input.loan_amount, input.loan_amount_term);
        const emiIncomeRatio = totalIncome > 0 ? emi / totalIncome : 0;
        const loanIncomeRatio = totalIncome > 0 ? principal / (totalIncome * 12) : 0;

        return {
            total_income: totalIncome,
            emi: round(emi, 2),
            emi_income_ratio: round(Math.max(0, emiIncomeRatio), 4),
            loan_income_ratio: round(Math.max(0, loanIncomeRatio), 4),
        };
    },

    enrich(input: LoanApplicationInput): FeatureRecord {
        return { ...input, ...this.derive(input) };
    },

    /** Largest loan (in thousands) whose EMI stays within `maxEmiRatio` of income. */
    affordableAmount(totalIncome: number, term: number, maxEmiRatio = 0.3): number {
        if (totalIncome <= 0 || term <= 0) return 0;
        return Math.floor((totalIncome * maxEmiRatio * term) / LOAN_AMOUNT_UNIT);
    },
};

export function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}
