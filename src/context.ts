import { LlmExplainer } from './engines/llm_explainer';
import { ArtifactPaths } from './engines/prediction/model_artifacts';
import { LoanPredictor } from './engines/prediction/predictor';
import { AuditRepository } from './repositories/audit_repository';
import { LoanRepository } from './repositories/loan_repository';
import { UserRepository } from './repositories/user_repository';
import { WeightRepository } from './repositories/weight_repository';
import { AdminService } from './services/admin_service';
import { AuditService } from './services/audit_service';
import { AuthConfig, AuthService } from './services/auth_service';
import { DashboardService } from './services/dashboard_service';
import { JobService } from './services/job_service';
import { LoanService } from './services/loan_service';
import { WeightStore } from './services/weight_store';

export interface Repositories {
    loans: LoanRepository;
    weights: WeightRepository;
    users: UserRepository;
    audit: AuditRepository;
}

export interface HttpConfig {
    nodeEnv: string;
    corsOrigin: string;
    rateLimitMax: number;
}

export interface ContextOptions {
    repositories: Repositories;
    predictor: LoanPredictor;
    explainer: LlmExplainer;
    artifactPaths: ArtifactPaths;
    auth: AuthConfig;
    http: HttpConfig;
    pingDatabase?: () => Promise<boolean>;
}

/**
 * Everything that lives for the whole process: the loaded model, its counters and the job table
 * included. Built once at startup and handed to the route factories.
 */
export interface AppContext {
    http: HttpConfig;
    predictor: LoanPredictor;
    explainer: LlmExplainer;
    jobs: JobService;
    weights: WeightStore;
    loans: LoanService;
    admin: AdminService;
    auth: AuthService;
    audit: AuditService;
    dashboard: DashboardService;
    pingDatabase: () => Promise<boolean>;
}

export function createContext(options: ContextOptions): AppContext {
    const { repositories, predictor, explainer } = options;
    const jobs = new JobService();
    const weights = new WeightStore(repositories.weights);

    return {
        http: options.http,
        predictor,
        explainer,
        jobs,
        weights,
        loans: new LoanService(predictor, weights, explainer, repositories.loans),
        admin: new AdminService(predictor, weights, repositories.loans, jobs, options.artifactPaths),
        auth: new AuthService(repositories.users, options.auth),
        audit: new AuditService(repositories.audit),
        dashboard: new DashboardService(repositories.loans),
        pingDatabase: options.pingDatabase ?? (async () => true),
    };
}
