import { Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler } from '../middleware/async_handler';
import { AuthenticatedRequest, currentUser, requireAuth, requireCapability } from '../middleware/auth_middleware';
import { paginationSchema, parseRequest, requestMeta } from '../middleware/validate';

const loanListQuerySchema = paginationSchema.extend({
    status: z.enum(['pending', 'approved', 'rejected']).optional(),
    risk_category: z.enum(['Low', 'Medium', 'High']).optional(),
    date_from: z.coerce.date().optional(),
    date_to: z.coerce.date().optional(),
    min_loan_amount: z.coerce.number().min(0).optional(),
    max_loan_amount: z.coerce.number().min(0).optional(),
    property_area: z.enum(['Urban', 'Semiurban', 'Rural']).optional(),
    search: z.string().trim().max(100).optional(),
});

const auditQuerySchema = paginationSchema.extend({
    page_size: z.coerce.number().int().min(1).max(100).default(50),
    user_id: z.coerce.number().int().positive().optional(),
    action: z.string().trim().optional(),
    resource_type: z.string().trim().optional(),
    date_from: z.coerce.date().optional(),
    date_to: z.coerce.date().optional(),
});

const weightUpdateSchema = z.object({
    feature_name: z.string().min(1),
    weight: z.number(),
    description: z.string().nullish(),
});

export function adminRoutes(ctx: AppContext): Router {
    const router = Router();
    router.use(requireAuth(ctx.auth));

    router.get('/dashboard', requireCapability('applications:review'), asyncHandler(async (_req, res) => {
        res.json(await ctx.dashboard.getDashboard());
    }));

    router.get('/loans', requireCapability('applications:review'), asyncHandler(async (req, res) => {
        const { page, page_size, ...filters } = parseRequest(loanListQuerySchema, req.query);
        res.json(await ctx.dashboard.listLoans(filters, page, page_size));
    }));

    router.get('/audit-logs', requireCapability('audit:read'), asyncHandler(async (req, res) => {
        const { page, page_size, ...filters } = parseRequest(auditQuerySchema, req.query);
        res.json(await ctx.audit.list(filters, page, page_size));
    }));

    router.get('/feature-weights', requireCapability('weights:manage'), asyncHandler(async (_req, res) => {
        res.json(await ctx.admin.getAllFeatureWeights());
    }));

    router.put('/feature-weights', requireCapability('weights:manage'), asyncHandler(async (req: AuthenticatedRequest, res) => {
        const user = currentUser(req);
        const body = parseRequest(weightUpdateSchema, req.body);
        const row = await ctx.admin.updateFeatureWeight(body.feature_name, body.weight, body.description);
        await ctx.audit.log({
            user_id: user.id,
            action: 'feature_weight_updated',
            resource_type: 'feature_weight',
            resource_id: row.feature_name,
            details: `weight=${row.weight}`,
            ...requestMeta(req),
        });
        res.json(row);
    }));

    router.get('/model/info', requireCapability('model:manage'), (_req, res) => {
        res.json(ctx.admin.getModelInfo());
    });

    router.get('/model/performance', requireCapability('model:manage'), asyncHandler(async (_req, res) => {
        res.json(await ctx.admin.getModelPerformanceReport());
    }));

    router.post('/model/retrain', requireCapability('model:manage'), asyncHandler(async (req: AuthenticatedRequest, res) => {
        const user = currentUser(req);
        const result = await ctx.admin.triggerRetraining();
        await ctx.audit.log({
            user_id: user.id,
            action: 'model_retrain_requested',
            resource_type: 'model',
            resource_id: result.success ? result.job.id : null,
            details: `samples=${result.sample_count} started=${result.success}`,
            ...requestMeta(req),
        });
        res.status(result.success ? 202 : 200).json(result);
    }));

    return router;
}
