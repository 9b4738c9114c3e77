export type Gender = 'Male' | 'Female';
export type YesNo = 'Yes' | 'No';
export type Education = 'Graduate' | 'Not Graduate';
export type PropertyArea = 'Urban' | 'Semiurban' | 'Rural';
export type CreditHistory = 0 | 1;

export type LoanDecision = YesNo;
export type RiskCategory = 'Low' | 'Medium' | 'High';
export type PredictionMethod = 'ml' | 'rule_based';
export type LoanStatus = 'pending' | 'approved' | 'rejected';

export interface LoanApplicationInput {
    gender: Gender;
    married: YesNo;
    dependents: number;
    education: Education;
    self_employed: YesNo;
    /** Monthly income. */
    applicant_income: number;
    coapplicant_income: number;
    /** Requested amount, in thousands. */
    loan_amount: number;
    /** Term in months. */
    loan_amount_term: number;
    credit_history: CreditHistory;
    property_area: PropertyArea;
}

export interface DerivedFeatures {
    total_income: number;
    emi: number;
    emi_income_ratio: number;
    loan_income_ratio: number;
}

export type FeatureRecord = LoanApplicationInput & DerivedFeatures;

export type FeatureWeights = Record<string, number>;

export interface RiskBreakdown {
    credit_risk_score: number;
    income_risk_score: number;
    employment_risk_score: number;
}

export interface PredictionResult {
    loan_decision: LoanDecision;
    risk_score: number;
    risk_category: RiskCategory;
    recommendation: string;
    confidence_score: number;
    key_positive_factors: string[];
    key_risk_factors: string[];
    prediction_method: PredictionMethod;
    processing_time_ms: number;
    risk_breakdown: RiskBreakdown;
    debt_to_income_ratio: number;
    suggested_loan_amount: number | null;
}

export interface LoanPredictionResponse extends RiskBreakdown {
    application_id: string;
    loan_decision: LoanDecision;
    risk_score: number;
    risk_category: RiskCategory;
    justification: string;
    recommendation: string;
    confidence_score: number;
    key_risk_factors: string[];
    key_positive_factors: string[];
    suggested_loan_amount: number | null;
    debt_to_income_ratio: number;
    prediction_method: PredictionMethod;
}

export interface LoanApplicationRecord extends LoanApplicationInput {
    application_id: string;
    total_income: number;
    emi: number;
    emi_income_ratio: number;
    predicted_approval: LoanDecision;
    risk_score: number;
    risk_category: RiskCategory;
    recommendation: string;
    confidence_score: number | null;
    ml_justification: string;
    prediction_method: PredictionMethod;
    final_status: LoanDecision | null;
    admin_notes: string | null;
    reviewed_by_id: number | null;
    admin_decision_date: string | null;
    created_at: string;
    updated_at: string;
}

export interface FeatureWeightRow {
    feature_name: string;
    weight: number;
    description: string | null;
    is_active: boolean;
    created_at: string;
    updated_at: string;
}

export type UserRole = 'superadmin' | 'bank_manager' | 'loan_officer';

export interface User {
    id: number;
    username: string;
    email: string;
    full_name: string;
    hashed_password: string;
    role: UserRole;
    is_active: boolean;
    is_disabled: boolean;
    created_by_id: number | null;
    last_login: string | null;
    created_at: string;
    updated_at: string;
}

export type PublicUser = Omit<User, 'hashed_password'>;

export interface AuditLogEntry {
    id: number;
    user_id: number | null;
    username?: string | null;
    action: string;
    resource_type: string | null;
    resource_id: string | null;
    details: string | null;
    ip_address: string | null;
    user_agent: string | null;
    created_at: string;
}

export type NewAuditLogEntry = Omit<AuditLogEntry, 'id' | 'created_at' | 'username'>;

export interface Page<T> {
    items: T[];
    total_count: number;
    page: number;
    page_size: number;
    has_more: boolean;
}

export interface OffsetPage<T> {
    items: T[];
    total_count: number;
    limit: number;
    offset: number;
    has_more: boolean;
}
