import { createApp } from './app';
import { env } from './config/env';
import { createContext } from './context';
import { LlmExplainer } from './engines/llm_explainer';
import { LoanPredictor } from './engines/prediction/predictor';
import { PgAuditRepository } from './repositories/audit_repository';
import { PgLoanRepository } from './repositories/loan_repository';
import { PgUserRepository } from './repositories/user_repository';
import { PgWeightRepository } from './repositories/weight_repository';
import { createPool, pingDatabase } from './services/database';
import { createLogger } from './utils/logger';

const log = createLogger('Server');

async function main(): Promise<void> {
    const pool = createPool(env.DATABASE_URL);
    const artifactPaths = { modelPath: env.MODEL_PATH, preprocessorPath: env.PREPROCESSOR_PATH };

    const predictor = new LoanPredictor(artifactPaths);
    await predictor.load();

    const explainer = new LlmExplainer({ apiKey: env.OPENAI_API_KEY, model: env.LLM_MODEL_NAME });
    if (!explainer.usesLanguageModel) {
        log.warn('OPENAI_API_KEY not set. Explanations will use templates.');
    }

    const ctx = createContext({
        repositories: {
            loans: new PgLoanRepository(pool),
            weights: new PgWeightRepository(pool),
            users: new PgUserRepository(pool),
            audit: new PgAuditRepository(pool),
        },
        predictor,
        explainer,
        artifactPaths,
        auth: { jwtSecret: env.JWT_SECRET, tokenTtlMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES },
        http: { nodeEnv: env.NODE_ENV, corsOrigin: env.CORS_ORIGIN, rateLimitMax: env.RATE_LIMIT_MAX },
        pingDatabase: () => pingDatabase(pool),
    });

    if (!(await ctx.pingDatabase())) {
        log.warn('Database unreachable at startup; predictions will still be served.');
    }

    const server = createApp(ctx).listen(Number(env.PORT), () => {
        log.info(`Loan underwriting API listening on port ${env.PORT} (${env.NODE_ENV})`);
    });

    const shutdown = (signal: string) => {
        log.info(`${signal} received, shutting down`);
        server.close(() => {
            pool.end().then(
                () => process.exit(0),
                error => {
                    log.error('Error closing database pool:', error);
                    process.exit(1);
                }
            );
        });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
    log.error('Fatal startup error:', error);
    process.exit(1);
});
