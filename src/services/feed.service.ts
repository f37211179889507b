import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { FeedEvent } from '@/types/ccs.types';
import { FeedSettings } from '@/types/settings.types';
import { InvalidTokenError, UnknownTokenError, isAbortError } from '@/utils/errors';
import { StateStore } from './stateStore.service';

/**
 * `null` stands for a keepalive: nothing new for a whole keepalive period.
 */
export type FeedItem = FeedEvent | null;

/**
 * One NDJSON line. Tokens are strings on the wire; a keepalive is an empty line.
 */
export const serializeFeedItem = (item : FeedItem) : string => {
    if (item === null) return '\n';
    const { token, id, type, op, data } = item;
    return `${JSON.stringify({ token: String(token), id, type, op, data })}\n`;
}

/**
 * Serves the event log as an unbounded, resumable sequence.
 *
 * @class
 */
@injectable()
export class FeedService {
    #_store : StateStore
    #_settings : FeedSettings

    constructor(
        @inject(TYPES.StateStore) store : StateStore,
        @inject(TYPES.FeedSettings) settings : FeedSettings,
    ){
        this.#_store = store;
        this.#_settings = settings;
    }

    /**
     * Validates a `since_token` query value. Absent means the whole history.
     *
     * @throws {InvalidTokenError} for anything but a non-negative integer
     * @throws {UnknownTokenError} for a token past the head of the log
     */
    parseSinceToken(raw : string | undefined) : number {
        if (raw === undefined) return 0;
        if (!/^\d+$/.test(raw.trim())) throw new InvalidTokenError(raw);

        const token = Number(raw.trim());
        if (!Number.isSafeInteger(token)) throw new InvalidTokenError(raw);
        if (token > this.#_store.head()) throw new UnknownTokenError(raw);
        return token;
    }

    /**
     * Events with a token greater than `sinceToken`, already committed ones first,
     * then each new one as it is appended. Ends only when `signal` aborts.
     */
    async *stream(sinceToken : number, signal : AbortSignal) : AsyncGenerator<FeedItem> {
        let cursor = sinceToken;
        let lastSentAt = Date.now();

        while (!signal.aborted) {
            const batch = this.#_store.readFrom(cursor + 1);
            if (batch.length > 0) {
                for (const event of batch) {
                    yield event;
                    cursor = event.token;
                    if (signal.aborted) return;
                }
                lastSentAt = Date.now();
                continue;
            }

            const idleFor = Date.now() - lastSentAt;
            const appended = await this.#waitForAppend(cursor, signal, this.#_settings.keepaliveMs - idleFor);
            if (signal.aborted) return;

            if (!appended && Date.now() - lastSentAt >= this.#_settings.keepaliveMs) {
                yield null;
                lastSentAt = Date.now();
            }
        }
    }

    /**
     * @returns false when `timeoutMs` ran out or `signal` aborted first
     */
    async #waitForAppend(cursor : number, signal : AbortSignal, timeoutMs : number) : Promise<boolean> {
        const waiter = new AbortController();
        const onAbort = () => waiter.abort();
        const timer = setTimeout(onAbort, Math.max(0, timeoutMs));
        signal.addEventListener('abort', onAbort, { once: true });

        try {
            await this.#_store.waitForAppend(cursor, waiter.signal);
            return true;
        } catch (error) {
            if (isAbortError(error)) return false;
            throw error;
        } finally {
            clearTimeout(timer);
            signal.removeEventListener('abort', onAbort);
        }
    }
}
