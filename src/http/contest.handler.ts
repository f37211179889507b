import { once } from 'node:events';
import { Request, Router } from 'express';
import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { FEED_ERROR_MESSAGES } from '@/const/errorType.const';
import { isEntityCollection } from '@/const/eventType.const';
import { FeedService, serializeFeedItem } from '@/services/feed.service';
import { StateStore } from '@/services/stateStore.service';
import { ContestPackage } from '@/types/contest.types';
import { contestStateAt } from '@/utils/contestTime';
import { withHttpErrorHandler } from '@/utils/errorHandler';
import { InvalidTokenError, NotFoundError, isAbortError } from '@/utils/errors';
import logger from '@/utils/pinoLogger';

const API_INFO = {
    version : '2023-06',
    version_url : 'https://ccs-specs.icpc.io/2023-06/contest_api',
    name : 'scoreboard-feed-sync',
} as const

const queryValue = (value : unknown) : string | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    throw new InvalidTokenError(String(value));
}

/**
 * Class responsible for the Contest API read endpoints and the event feed.
 *
 * @class
 */
@injectable()
export class ContestHandler {

    #_store : StateStore
    #_feedService : FeedService
    #_contestPackage : ContestPackage

    constructor(
        @inject(TYPES.StateStore) store : StateStore,
        @inject(TYPES.FeedService) feedService : FeedService,
        @inject(TYPES.ContestPackage) contestPackage : ContestPackage,
    ){
        this.#_store = store;
        this.#_feedService = feedService;
        this.#_contestPackage = contestPackage;
    }

    apiInfo = withHttpErrorHandler((req, res) => {
        res.json(API_INFO);
    })

    listContests = withHttpErrorHandler((req, res) => {
        res.json([this.#_contestPackage.contest]);
    })

    getContest = withHttpErrorHandler((req, res) => {
        res.json(this.#contest(req));
    })

    getState = withHttpErrorHandler((req, res) => {
        this.#contest(req);
        res.json(this.#_store.lastKnownContestState() ?? contestStateAt(this.#_contestPackage.timeline, Date.now()));
    })

    listCollection = withHttpErrorHandler((req, res) => {
        this.#contest(req);
        const collection = this.#collection(req);
        res.json(this.#_store.listLatest(collection).map((event) => event.data));
    })

    getEntity = withHttpErrorHandler((req, res) => {
        this.#contest(req);
        const collection = this.#collection(req);
        const event = this.#_store.lastKnownState(collection, req.params.id);
        if (!event) throw new NotFoundError(`No ${collection} with id ${req.params.id}`);
        res.json(event.data);
    })

    /**
     * NDJSON event feed. The response stays open until the client goes away.
     */
    eventFeed = withHttpErrorHandler(async (req, res) => {
        this.#contest(req);
        const sinceToken = this.#_feedService.parseSinceToken(queryValue(req.query.since_token));

        const controller = new AbortController();
        res.on('close', () => controller.abort());

        res.status(200);
        res.setHeader('Content-Type', 'application/x-ndjson');
        res.setHeader('Cache-Control', 'no-cache');
        res.flushHeaders();

        logger.info('[FEED] Client connected', { sinceToken, head: this.#_store.head(), ip: req.ip });
        let sent = 0;
        try {
            for await (const item of this.#_feedService.stream(sinceToken, controller.signal)) {
                if (item) sent++;
                if (!res.write(serializeFeedItem(item))) {
                    await once(res, 'drain', { signal: controller.signal });
                }
            }
        } catch (error) {
            if (!isAbortError(error)) throw error;
        } finally {
            logger.info('[FEED] Client disconnected', { sinceToken, sent });
        }
    })

    getRouter() : Router {
        const router = Router();
        router.get('/', this.apiInfo);
        router.get('/contests', this.listContests);
        router.get('/contests/:cid', this.getContest);
        router.get('/contests/:cid/state', this.getState);
        router.get('/contests/:cid/event-feed', this.eventFeed);
        router.get('/contests/:cid/:collection', this.listCollection);
        router.get('/contests/:cid/:collection/:id', this.getEntity);
        return router;
    }

    #contest(req : Request) {
        const { contest } = this.#_contestPackage;
        if (req.params.cid !== contest.id) throw new NotFoundError(FEED_ERROR_MESSAGES.CONTEST_NOT_FOUND);
        return contest;
    }

    #collection(req : Request) {
        const { collection } = req.params;
        if (!isEntityCollection(collection)) throw new NotFoundError(`Unknown collection: ${collection}`);
        return collection;
    }
}
