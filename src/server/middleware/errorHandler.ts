import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { transformErrorToResponse } from '../utils/errorTransformation.js';

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const includeStack = process.env.NODE_ENV === 'development';
    const errorResponse = transformErrorToResponse(err, req, includeStack);

    // Client mistakes and missing documents are expected; log them quietly
    if (errorResponse.statusCode < 500) {
        logger.info({
            code: errorResponse.code,
            message: errorResponse.message,
            path: req.path,
            method: req.method,
        }, 'Request rejected');
    } else {
        logger.error({
            error: err,
            code: errorResponse.code,
            path: req.path,
            method: req.method,
        }, 'Request failed');
    }

    if (res.headersSent) {
        return;
    }
    res.status(errorResponse.statusCode).json(errorResponse);
}
