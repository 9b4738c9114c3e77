import { Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { asyncHandler } from '../middleware/async_handler';
import { AuthenticatedRequest, currentUser, requireAuth, requireCapability } from '../middleware/auth_middleware';
import { parseRequest, requestMeta } from '../middleware/validate';

const adminDecisionSchema = z.object({
    final_status: z.enum(['Yes', 'No']),
    admin_notes: z.string().max(2000).nullish(),
});

const reviewQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(50),
    offset: z.coerce.number().int().min(0).default(0),
});

export function loanRoutes(ctx: AppContext): Router {
    const router = Router();
    router.use(requireAuth(ctx.auth));

    router.post('/predict', requireCapability('applications:submit'), asyncHandler(async (req: AuthenticatedRequest, res) => {
        const user = currentUser(req);
        const result = await ctx.loans.processApplication(req.body);
        await ctx.audit.log({
            user_id: user.id,
            action: 'loan_prediction',
            resource_type: 'loan_application',
            resource_id: result.application_id,
            details: `${result.loan_decision} risk=${result.risk_score} method=${result.prediction_method}`,
            ...requestMeta(req),
        });
        res.json(result);
    }));

    router.get('/applications/review/pending', requireCapability('applications:review'), asyncHandler(async (req, res) => {
        const { limit, offset } = parseRequest(reviewQuerySchema, req.query);
        res.json(await ctx.loans.getApplicationsForReview(limit, offset));
    }));

    router.get('/applications/:id', requireCapability('applications:read'), asyncHandler(async (req, res) => {
        res.json(await ctx.loans.getApplication(req.params.id));
    }));

    router.put('/applications/:id/admin-decision', requireCapability('applications:review'), asyncHandler(async (req: AuthenticatedRequest, res) => {
        const user = currentUser(req);
        const body = parseRequest(adminDecisionSchema, req.body);
        const updated = await ctx.loans.updateAdminDecision(req.params.id, body.final_status, body.admin_notes ?? null, user.id);
        await ctx.audit.log({
            user_id: user.id,
            action: 'admin_decision',
            resource_type: 'loan_application',
            resource_id: updated.application_id,
            details: `final_status=${body.final_status}`,
            ...requestMeta(req),
        });
        res.json({ message: 'Admin decision updated successfully', application: updated });
    }));

    router.get('/metrics/model-performance', requireCapability('model:manage'), asyncHandler(async (_req, res) => {
        res.json(await ctx.loans.getPerformanceMetrics());
    }));

    return router;
}
