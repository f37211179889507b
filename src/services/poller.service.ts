import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { IScoreboardProvider } from '@/providers/interfaces/IScoreboardProvider.interface';
import { ScoreboardSnapshot } from '@/types/scoreboard.types';
import { PollerSettings } from '@/types/settings.types';
import { StoreUnavailableError, UpstreamFetchFailedError } from '@/utils/errors';
import logger from '@/utils/pinoLogger';
import { SyncEngine, TickResult } from './sync.service';

/**
 * Drives the sync engine on a fixed interval. A tick that is still running
 * when the next one is due makes that one skip.
 *
 * @class
 */
@injectable()
export class ScoreboardPoller {
    #_provider : IScoreboardProvider
    #_syncEngine : SyncEngine
    #_settings : PollerSettings
    #_interval : NodeJS.Timeout | null = null
    #_current : Promise<void> | null = null

    constructor(
        @inject(TYPES.IScoreboardProvider) provider : IScoreboardProvider,
        @inject(TYPES.SyncEngine) syncEngine : SyncEngine,
        @inject(TYPES.PollerSettings) settings : PollerSettings,
    ){
        this.#_provider = provider;
        this.#_syncEngine = syncEngine;
        this.#_settings = settings;
    }

    get running() : boolean {
        return this.#_interval !== null;
    }

    start() : void {
        if (this.#_interval) return;
        logger.info(`[POLLER] Polling scoreboard every ${this.#_settings.intervalMs}ms`);
        this.#_interval = setInterval(() => void this.#tick(), this.#_settings.intervalMs);
        void this.#tick();
    }

    /**
     * Stops scheduling ticks. Resolves once a tick that is still running has settled.
     */
    async stop() : Promise<void> {
        if (this.#_interval) {
            clearInterval(this.#_interval);
            this.#_interval = null;
            logger.info('[POLLER] Stopped');
        }
        await this.#_current;
    }

    /**
     * One fetch and one sync tick. Upstream failures skip the tick and resolve
     * to null; store failures propagate.
     */
    async pollOnce(nowMs? : number) : Promise<TickResult | null> {
        let snapshot : ScoreboardSnapshot;
        try {
            snapshot = await this.#_provider.fetchSnapshot();
        } catch (error) {
            if (!(error instanceof UpstreamFetchFailedError)) throw error;
            logger.warn(`[POLLER] ${error.message}, tick skipped`, { cause: error.cause });
            return null;
        }
        return this.#_syncEngine.runTick(snapshot, nowMs);
    }

    #tick() : Promise<void> {
        if (this.#_current) {
            logger.debug('[POLLER] Tick skipped (previous tick still processing).');
            return this.#_current;
        }
        this.#_current = this.#run().finally(() => {
            this.#_current = null;
        });
        return this.#_current;
    }

    async #run() : Promise<void> {
        try {
            await this.pollOnce();
        } catch (error) {
            if (error instanceof StoreUnavailableError) {
                logger.error('[POLLER] Event store unavailable, retrying next interval', { error: error.message, cause: error.cause });
            } else {
                logger.error('[POLLER] Tick failed', { error });
            }
        }
    }
}
