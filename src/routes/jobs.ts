import express from 'express';
import { AppContext } from '../context';
import { requireAuth, requireCapability } from '../middleware/auth_middleware';
import { NotFoundError } from '../utils/errors';

export function jobRoutes(ctx: AppContext): express.Router {
    const router = express.Router();
    router.use(requireAuth(ctx.auth), requireCapability('model:manage'));

    router.get('/:id', (req, res) => {
        const job = ctx.jobs.getJob(req.params.id);
        if (!job) throw new NotFoundError(`Job ${req.params.id} not found`);
        res.json(job);
    });

    router.get('/', (_req, res) => {
        res.json(ctx.jobs.listJobs());
    });

    return router;
}
