// src/routes/asyncRoute.ts

import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Adapt an async handler so rejections reach the error middleware
 */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
