import { EventEmitter, once } from 'node:events';
import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { FEED_ERROR_MESSAGES } from '@/const/errorType.const';
import { EVENT_TYPE, EventType } from '@/const/eventType.const';
import { IEventLogRepo, PersistedLog } from '@/db/repos/interfaces/eventLog.repo.interface';
import { ContestState, EventDraft, FeedEvent, Judgement, Submission } from '@/types/ccs.types';
import { StoreCorruptError, StoreUnavailableError } from '@/utils/errors';
import logger from '@/utils/pinoLogger';

const APPENDED = 'appended';

const entityKey = (type : EventType, id : string | null) : string => `${type}/${id ?? ''}`;

/**
 * In-memory view of the event log plus the last-known state of every entity,
 * backed by {@link IEventLogRepo}.
 *
 * Single writer: only the transition emitter appends, and ticks never overlap.
 * Any number of readers may call {@link readFrom} or wait on {@link waitForAppend}
 * while an append is in flight; they only ever see fully committed events.
 *
 * @class
 */
@injectable()
export class StateStore {
    #_repo : IEventLogRepo
    #_events : FeedEvent[] = [];
    #_latest : Map<string, FeedEvent> = new Map();
    #_submissions : Map<string, Submission> = new Map();
    #_judgements : Map<string, Judgement> = new Map();
    #_notifier = new EventEmitter();
    #_appending = false;
    #_initialized = false;

    constructor(
        @inject(TYPES.IEventLogRepo) repo : IEventLogRepo
    ){
        this.#_repo = repo;
        // one listener per open feed session
        this.#_notifier.setMaxListeners(0);
    }

    /**
     * Loads the durable log and rebuilds every cache by replaying it.
     *
     * @throws {StoreCorruptError} when the counter and the log disagree, or the log has a gap.
     */
    async init() : Promise<void> {
        const startTime = Date.now();
        const { counter, events } = await this.#load();

        if (counter !== events.length) {
            throw new StoreCorruptError(`Token counter is ${counter} but the log holds ${events.length} events`);
        }
        events.forEach((event, index) => {
            if (event.token !== index + 1) {
                throw new StoreCorruptError(`Expected token ${index + 1} at log position ${index + 1}, found ${event.token}`);
            }
        });

        this.#reset();
        for (const event of events) this.#apply(event);
        this.#_initialized = true;

        logger.info('[STORE] Replayed event log', {
            head : this.head(),
            submissions : this.#_submissions.size,
            judgements : this.#_judgements.size,
            duration : Date.now() - startTime,
        });
    }

    /**
     * Persists the event under the next token, then publishes it to readers.
     *
     * @returns the token assigned to the event
     * @throws {StoreUnavailableError} when the write is not durable; nothing in memory changes.
     */
    async append(draft : EventDraft) : Promise<number> {
        if (!this.#_initialized) {
            throw new StoreUnavailableError(FEED_ERROR_MESSAGES.STORE_NOT_INITIALIZED);
        }
        if (this.#_appending) {
            throw new StoreUnavailableError('Concurrent append rejected, the store has a single writer');
        }

        const token = this.head() + 1;
        const event : FeedEvent = { ...draft, token };

        this.#_appending = true;
        try {
            await this.#_repo.commit(event);
        } catch (error) {
            throw new StoreUnavailableError(`Failed to persist event ${token}`, error);
        } finally {
            this.#_appending = false;
        }

        this.#apply(event);
        this.#_notifier.emit(APPENDED, token);
        return token;
    }

    /**
     * Last token issued, 0 for an empty log.
     */
    head() : number {
        return this.#_events.length;
    }

    /**
     * Events from `token` (inclusive) up to the current head.
     */
    readFrom(token : number) : FeedEvent[] {
        return this.#_events.slice(Math.max(token, 1) - 1);
    }

    /**
     * Resolves once the head is past `afterToken`. Rejects with an `AbortError`
     * when `signal` aborts first.
     */
    async waitForAppend(afterToken : number, signal? : AbortSignal) : Promise<void> {
        while (this.head() <= afterToken) {
            await once(this.#_notifier, APPENDED, { signal });
        }
    }

    lastKnownState(type : EventType, id : string | null) : FeedEvent | undefined {
        return this.#_latest.get(entityKey(type, id));
    }

    lastKnownSubmission(id : string) : Submission | undefined {
        return this.#_submissions.get(id);
    }

    lastKnownJudgement(id : string) : Judgement | undefined {
        return this.#_judgements.get(id);
    }

    lastKnownContestState() : ContestState | undefined {
        const event = this.#_latest.get(entityKey(EVENT_TYPE.STATE, null));
        return event?.type === EVENT_TYPE.STATE ? event.data : undefined;
    }

    listSubmissions() : Submission[] {
        return [...this.#_submissions.values()];
    }

    listJudgements() : Judgement[] {
        return [...this.#_judgements.values()];
    }

    /**
     * Latest event of every entity of `type`, in first-seen order.
     */
    listLatest(type : EventType) : FeedEvent[] {
        return [...this.#_latest.values()].filter((event) => event.type === type);
    }

    async clear() : Promise<void> {
        await this.#_repo.clear();
        this.#reset();
        logger.warn('[STORE] Cleared persisted state');
    }

    async #load() : Promise<PersistedLog> {
        try {
            return await this.#_repo.loadLog();
        } catch (error) {
            if (error instanceof StoreCorruptError) throw error;
            throw new StoreUnavailableError('Failed to load the event log', error);
        }
    }

    #reset() : void {
        this.#_events = [];
        this.#_latest = new Map();
        this.#_submissions = new Map();
        this.#_judgements = new Map();
    }

    // synchronous, so no reader can observe half of it
    #apply(event : FeedEvent) : void {
        this.#_events.push(event);
        this.#_latest.set(entityKey(event.type, event.id), event);
        if (event.type === EVENT_TYPE.SUBMISSIONS) {
            this.#_submissions.set(event.data.id, event.data);
        } else if (event.type === EVENT_TYPE.JUDGEMENTS) {
            this.#_judgements.set(event.data.id, event.data);
        }
    }
}
