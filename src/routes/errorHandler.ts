// src/routes/errorHandler.ts

import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { logError, logWarning } from '../logger';
import { AppError } from '../models/errors';

/**
 * Map errors to JSON responses
 *
 * Domain errors carry their own status and context. Request validation
 * failures answer 400 with zod's field breakdown. Anything else is a 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof AppError) {
        logWarning(`${req.method} ${req.path} → ${err.status} ${err.code}: ${err.message}`);
        res.status(err.status).json({
            error: err.message,
            code: err.code,
            context: err.context
        });
        return;
    }

    if (err instanceof ZodError) {
        res.status(400).json({
            error: 'Invalid input',
            code: 'VALIDATION_ERROR',
            details: err.flatten()
        });
        return;
    }

    logError(`${req.method} ${req.path} failed`, err);
    res.status(500).json({
        error: err instanceof Error ? err.message : 'Internal server error',
        code: 'INTERNAL_ERROR'
    });
}
