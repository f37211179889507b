import http from 'node:http';
import express, { Express } from 'express';
import { BasicAuthCredentials } from '@/types/settings.types';
import { httpErrorMiddleware } from '@/utils/errorHandler';
import logger from '@/utils/pinoLogger';
import { basicAuth } from './basicAuth.middleware';
import { ContestHandler } from './contest.handler';

/**
 * Builds the express app. Basic auth is left off when no username is configured.
 */
export const createApp = (handler : ContestHandler, credentials : BasicAuthCredentials) : Express => {
    const app = express();
    app.disable('x-powered-by');

    if (credentials.username) {
        app.use(basicAuth(credentials));
    } else {
        logger.warn('[HTTP] No feed credentials configured, endpoints are unauthenticated');
    }

    app.use(handler.getRouter());
    app.use(httpErrorMiddleware);
    return app;
}

export const startHttpServer = (app : Express, host : string, port : number) : Promise<http.Server> => {
    return new Promise((resolve, reject) => {
        const server = http.createServer(app);
        server.once('error', reject);
        server.listen(port, host, () => {
            logger.info(`[HTTP] Feed server listening on ${host}:${port}`);
            resolve(server);
        });
    });
}

export const stopHttpServer = (server : http.Server) : Promise<void> => {
    return new Promise((resolve, reject) => {
        // open event-feed responses never end on their own
        server.closeAllConnections();
        server.close((error) => error ? reject(error) : resolve());
    });
}
