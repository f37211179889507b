import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { FeedSyncError } from './errors';
import { mapErrorToHttpStatus } from './mapErrorToHttpStatus';
import logger from './pinoLogger';

/**
 * Wraps an async route so that anything it throws reaches {@link httpErrorMiddleware}.
 */
export const withHttpErrorHandler = (
    handler : (req : Request, res : Response) => Promise<void> | void
) : RequestHandler => {
    return async (req : Request, res : Response, next : NextFunction) => {
        try {
            await handler(req, res);
        } catch (error) {
            next(error);
        }
    }
}

export const httpErrorMiddleware : ErrorRequestHandler = (error : unknown, req, res, next) => {
    const status = mapErrorToHttpStatus(error);

    if (status >= 500) {
        logger.error(`[HTTP] ${req.method} ${req.originalUrl} failed`, { status, error });
    } else {
        logger.warn(`[HTTP] ${req.method} ${req.originalUrl} rejected`, { status, error: error instanceof Error ? error.message : error });
    }

    if (res.headersSent) {
        next(error);
        return;
    }
    if (status === 401) res.setHeader('WWW-Authenticate', 'Basic realm="event-feed"');

    res.status(status).json({
        code : status,
        message : error instanceof FeedSyncError ? error.message : 'Internal server error',
    });
}
