import { Request, Response, NextFunction } from 'express';
import { CacheMiss, ExtractionError } from '../../domain/errors/PipelineErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Upstream dependency failed and no result could be built (502).
 */
export class UpstreamError extends AppError {
    constructor(message: string = 'Upstream service failed') {
        super(502, message);
        this.name = 'UpstreamError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * Pipeline errors that reach the boundary become their HTTP equivalents.
 */
function toAppError(err: Error): Error {
    if (err instanceof ExtractionError) {
        return new UpstreamError(err.message);
    }
    if (err instanceof CacheMiss) {
        return new NotFoundError(err.message);
    }
    // Raised by express.json() on unparseable bodies
    if ('type' in err && err.type === 'entity.parse.failed') {
        return new BadRequestError('Malformed JSON body');
    }
    return err;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    error: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its four parameters
    _next: NextFunction
): void {
    const err = toAppError(error);

    if (err instanceof NotFoundError || err instanceof BadRequestError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
