import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { AppContext } from './context';
import { errorHandler, notFoundHandler } from './middleware/error_handler';
import { adminRoutes } from './routes/admin';
import { authRoutes } from './routes/auth';
import { jobRoutes } from './routes/jobs';
import { loanRoutes } from './routes/loans';
import { userRoutes } from './routes/users';

export const API_PREFIX = '/api/v1';

function corsOptions(origin: string): cors.CorsOptions {
    if (origin.trim() === '*') return { origin: true };
    const allowedOrigins = origin.split(',').map(o => o.trim()).filter(Boolean);
    return { origin: allowedOrigins, credentials: true };
}

export function createApp(ctx: AppContext): express.Express {
    const app = express();

    app.set('trust proxy', 1);

    const limiter = rateLimit({
        windowMs: 15 * 60 * 1000,
        limit: ctx.http.rateLimitMax,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
    });

    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    if (ctx.http.nodeEnv !== 'test') {
        app.use(morgan(ctx.http.nodeEnv === 'production' ? 'combined' : 'dev'));
    }
    app.use(cors(corsOptions(ctx.http.corsOrigin)));
    app.use(API_PREFIX, limiter);

    app.get('/health', async (_req, res, next) => {
        try {
            const database = await ctx.pingDatabase();
            const featureWeights = await ctx.weights.health();
            const info = ctx.predictor.getModelInfo();
            res.json({
                status: database && featureWeights.available ? 'ok' : 'degraded',
                env: ctx.http.nodeEnv,
                database,
                feature_weights: featureWeights,
                model_loaded: info.model_loaded,
                prediction_method: info.prediction_method,
                llm_enabled: ctx.explainer.usesLanguageModel,
                timestamp: new Date().toISOString(),
            });
        } catch (error) {
            next(error);
        }
    });

    app.use(`${API_PREFIX}/auth`, authRoutes(ctx));
    app.use(`${API_PREFIX}/users`, userRoutes(ctx));
    app.use(`${API_PREFIX}/loans`, loanRoutes(ctx));
    app.use(`${API_PREFIX}/admin`, adminRoutes(ctx));
    app.use(`${API_PREFIX}/jobs`, jobRoutes(ctx));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
