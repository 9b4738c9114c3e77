import { NextFunction, Request, Response } from 'express';
import { AppError, ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('ErrorHandler');

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: 'NOT_FOUND' });
}

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof ValidationError) {
        res.status(err.statusCode).json({ error: err.message, code: err.code, details: err.details });
        return;
    }
    if (err instanceof AppError) {
        if (err.statusCode >= 500) log.error(`${req.method} ${req.originalUrl}: ${err.message}`);
        res.status(err.statusCode).json({ error: err.message, code: err.code });
        return;
    }
    if (err instanceof SyntaxError && 'body' in err) {
        res.status(400).json({ error: 'Malformed JSON body', code: 'BAD_REQUEST' });
        return;
    }

    log.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
    res.status(500).json({ error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
}
