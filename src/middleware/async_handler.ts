import { NextFunction, Request, Response } from 'express';

/** Express 4 does not forward rejected promises; route them to the error middleware. */
export function asyncHandler<R extends Request>(fn: (req: R, res: Response, next: NextFunction) => Promise<unknown>) {
    return (req: R, res: Response, next: NextFunction): void => {
        fn(req, res, next).catch(next);
    };
}
