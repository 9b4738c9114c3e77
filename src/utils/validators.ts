import { z } from 'zod';
import { LoanApplicationInput } from '../types';
import { monthlyInstallment } from '../engines/feature_engine';
import { ValidationError } from './errors';

export const MIN_HOUSEHOLD_INCOME = 1000;
export const MAX_EMI_INCOME_RATIO = 0.8;

export const REQUIRED_FIELDS = [
    'gender', 'married', 'dependents', 'education', 'self_employed',
    'applicant_income', 'coapplicant_income', 'loan_amount',
    'loan_amount_term', 'credit_history', 'property_area',
] as const;

export const VALID_VALUES = {
    gender: ['Male', 'Female'],
    married: ['Yes', 'No'],
    education: ['Graduate', 'Not Graduate'],
    self_employed: ['Yes', 'No'],
    property_area: ['Urban', 'Semiurban', 'Rural'],
} as const;

/** Accepts `2` as well as the "3+" style used by application forms. */
export function normalizeDependents(value: unknown): unknown {
    if (typeof value === 'string' && /^\d+\+?$/.test(value.trim())) {
        return parseInt(value, 10);
    }
    return value;
}

const oneOf = <T extends readonly [string, ...string[]]>(field: string, values: T) =>
    z.enum(values, {
        errorMap: () => ({ message: `Field '${field}' must be one of ${values.join(', ')}` }),
    });

const numeric = (field: string) =>
    z.number({ invalid_type_error: `Field '${field}' must be a number` })
        .finite({ message: `Field '${field}' must be a finite number` });

export const loanApplicationSchema = z.object({
    gender: oneOf('gender', VALID_VALUES.gender),
    married: oneOf('married', VALID_VALUES.married),
    dependents: z.preprocess(
        normalizeDependents,
        numeric('dependents').int({ message: "Field 'dependents' must be a whole number" })
    ),
    education: oneOf('education', VALID_VALUES.education),
    self_employed: oneOf('self_employed', VALID_VALUES.self_employed),
    applicant_income: numeric('applicant_income'),
    coapplicant_income: numeric('coapplicant_income'),
    loan_amount: numeric('loan_amount'),
    loan_amount_term: numeric('loan_amount_term').int({ message: "Field 'loan_amount_term' must be a whole number of months" }),
    credit_history: z.union([z.literal(0), z.literal(1)], {
        errorMap: () => ({ message: "Field 'credit_history' must be one of 0, 1" }),
    }),
    property_area: oneOf('property_area', VALID_VALUES.property_area),
});

const numberOrUndefined = (value: unknown): number | undefined =>
    typeof value === 'number' && Number.isFinite(value) ? value : undefined;

/**
 * Collects every violated rule before failing so the caller can fix all of them at once.
 */
export function collectValidationIssues(raw: Record<string, unknown>): string[] {
    const issues: string[] = [];
    const missing = new Set<string>();

    for (const field of REQUIRED_FIELDS) {
        if (raw[field] === undefined || raw[field] === null) {
            missing.add(field);
            issues.push(`Field '${field}' is required`);
        }
    }

    const parsed = loanApplicationSchema.safeParse(raw);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            const field = String(issue.path[0] ?? '');
            if (!missing.has(field)) issues.push(issue.message);
        }
    }

    const applicantIncome = numberOrUndefined(raw.applicant_income);
    const coapplicantIncome = numberOrUndefined(raw.coapplicant_income);
    const loanAmount = numberOrUndefined(raw.loan_amount);
    const term = numberOrUndefined(raw.loan_amount_term);
    const dependents = numberOrUndefined(normalizeDependents(raw.dependents));

    if (applicantIncome !== undefined && applicantIncome <= 0) {
        issues.push('Applicant income must be positive');
    }
    if (coapplicantIncome !== undefined && coapplicantIncome < 0) {
        issues.push('Co-applicant income cannot be negative');
    }
    if (loanAmount !== undefined && loanAmount <= 0) {
        issues.push('Loan amount must be positive');
    }
    if (term !== undefined && term <= 0) {
        issues.push('Loan amount term must be positive');
    }
    if (dependents !== undefined && dependents < 0) {
        issues.push('Number of dependents cannot be negative');
    }

    if (applicantIncome !== undefined && coapplicantIncome !== undefined) {
        const totalIncome = applicantIncome + coapplicantIncome;
        if (totalIncome < MIN_HOUSEHOLD_INCOME) {
            issues.push(`Total household income is too low (minimum ${MIN_HOUSEHOLD_INCOME})`);
        }

        if (loanAmount !== undefined && loanAmount > 0 && term !== undefined && term > 0) {
            const emi = monthlyInstallment(loanAmount, term);
            const ratio = totalIncome > 0 ? emi / totalIncome : Number.POSITIVE_INFINITY;
            if (ratio > MAX_EMI_INCOME_RATIO) {
                issues.push(`EMI to income ratio is too high (>${MAX_EMI_INCOME_RATIO * 100}%)`);
            }
        }
    }

    return issues;
}

export function validateLoanApplication(raw: unknown): LoanApplicationInput {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ValidationError('Application payload must be a JSON object');
    }

    const record: Record<string, unknown> = { ...raw };
    const issues = collectValidationIssues(record);
    if (issues.length > 0) {
        throw new ValidationError(issues);
    }

    const parsed: LoanApplicationInput = loanApplicationSchema.parse(record);
    return parsed;
}
