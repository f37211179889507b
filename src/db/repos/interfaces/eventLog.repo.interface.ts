import { FeedEvent } from "@/types/ccs.types";

export interface PersistedLog {
    counter : number;
    events : FeedEvent[];
}

/**
 * Durable side of the state store: the event log, the submission and judgement
 * projections and the token counter.
 *
 * @interface IEventLogRepo
 */
export interface IEventLogRepo {

    /**
     * Reads the token counter and every event in token order.
     */
    loadLog() : Promise<PersistedLog>

    /**
     * Writes the event, its entity projection and the counter (set to `event.token`)
     * as one unit. Either all of it is durable or none of it is.
     */
    commit(event : FeedEvent) : Promise<void>

    clear() : Promise<void>
}
