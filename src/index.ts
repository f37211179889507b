import 'reflect-metadata'
import path from 'node:path';
import { Server } from 'node:http';
import { parseArgs } from 'node:util';
import { createContainer } from "./config/inversify/container";
import TYPES from "./config/inversify/types";
import logger from "./utils/pinoLogger";
import { connectDB, disconnectDB } from "./config/db";
import { config } from "./config";
import { loadContestPackage } from './providers/contestPackageProvider';
import { loadIdentityTables } from './providers/mappingProvider';
import { StateStore } from './services/stateStore.service';
import { SyncEngine } from './services/sync.service';
import { ScoreboardPoller } from './services/poller.service';
import { ContestHandler } from './http/contest.handler';
import { createApp, startHttpServer, stopHttpServer } from './http/server';
import { StoreCorruptError } from './utils/errors';

const { values : flags } = parseArgs({
    options : {
        'clear-data' : { type : 'boolean', default : false },
    },
});

const startServer = async () => {
    let server : Server | null = null;
    let poller : ScoreboardPoller | null = null;

    const shutdown = async (signal : string) => {
        logger.info(`${signal} received, shutting down`);
        try {
            await poller?.stop();
            if (server) await stopHttpServer(server);
            await disconnectDB();
            process.exit(0);
        } catch (error) {
            logger.error('Shutdown failed', { error });
            process.exit(1);
        }
    }

    try {
        await connectDB();

        const contestPackage = loadContestPackage(path.resolve(config.CONTEST_PACKAGE_PATH));
        const identityTables = loadIdentityTables(
            path.resolve(config.TEAM_MAPPING_FILE),
            path.resolve(config.PROBLEM_MAPPING_FILE),
        );
        logger.info(`Loaded contest ${contestPackage.contest.id}`, {
            problems : contestPackage.problems.length,
            teams : contestPackage.teams.length,
            teamMappings : identityTables.teams.size,
            problemMappings : identityTables.problems.size,
        });

        const container = createContainer({ contestPackage, identityTables });
        const store = container.get<StateStore>(TYPES.StateStore);

        if (flags['clear-data']) {
            logger.warn('--clear-data given, wiping persisted state');
            await store.clear();
        }
        await store.init();

        await container.get<SyncEngine>(TYPES.SyncEngine).seedStaticEvents();

        poller = container.get<ScoreboardPoller>(TYPES.ScoreboardPoller);
        poller.start();

        const app = createApp(container.get<ContestHandler>(TYPES.ContestHandler), {
            username : config.FEED_AUTH_USERNAME,
            password : config.FEED_AUTH_PASSWORD,
        });
        server = await startHttpServer(app, config.HTTP_HOST, config.HTTP_PORT);

        process.once('SIGINT', () => void shutdown('SIGINT'));
        process.once('SIGTERM', () => void shutdown('SIGTERM'));
    } catch (error) {
        if (error instanceof StoreCorruptError) {
            logger.error('Event store is corrupt, refusing to start', { error: error.message, cause: error.cause });
        } else {
            logger.error('Failed to start server : ', { error });
        }
        process.exit(1);
    }
};

void startServer();
