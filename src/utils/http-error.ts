import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { ILogger } from "../config/logger";

/**
 * Error carrying the HTTP status and the detail string returned to the client.
 */
export class HttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly detail: string
    ) {
        super(detail);
        this.name = 'HttpError';
    }

    static badRequest(detail: string): HttpError {
        return new HttpError(400, detail);
    }

    static notFound(detail: string): HttpError {
        return new HttpError(404, detail);
    }

    static unprocessable(detail: string): HttpError {
        return new HttpError(422, detail);
    }

    static payloadTooLarge(detail: string): HttpError {
        return new HttpError(413, detail);
    }

    static badGateway(detail: string): HttpError {
        return new HttpError(502, detail);
    }

    static internal(detail: string): HttpError {
        return new HttpError(500, detail);
    }
}

interface BodyParserError {
    type: string;
    status: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return typeof error === 'object' && error !== null
        && 'type' in error && typeof error.type === 'string'
        && 'status' in error && typeof error.status === 'number';
}

/**
 * Sends the response for an error thrown inside a route handler.
 *
 * Client errors carry their detail; anything unexpected is logged and
 * answered with a generic 500.
 */
export function handleRouteError(error: unknown, res: Response, logger: ILogger, context: string): void {
    if (error instanceof ZodError) {
        res.status(400).json({
            detail: 'Validation failed',
            errors: error.errors
        });
        return;
    }

    if (error instanceof HttpError) {
        if (error.status >= 500) {
            logger.error({ status: error.status, detail: error.detail }, context);
            res.status(error.status).json({
                detail: error.status === 500 ? 'Internal server error' : error.detail
            });
            return;
        }
        res.status(error.status).json({ detail: error.detail });
        return;
    }

    if (isBodyParserError(error)) {
        if (error.type === 'entity.parse.failed') {
            res.status(422).json({ detail: 'Invalid JSON in request body' });
            return;
        }
        if (error.type === 'entity.too.large') {
            res.status(413).json({ detail: 'Request body too large' });
            return;
        }
    }

    logger.error({
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined
    }, context);

    res.status(500).json({ detail: 'Internal server error' });
}

/**
 * Final express error middleware, for failures raised before a route runs
 * (body parsing).
 */
export function errorMiddleware(logger: ILogger) {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(error);
            return;
        }
        handleRouteError(error, res, logger, `Request failed: ${req.method} ${req.path}`);
    };
}
