import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { EVENT_OP, EVENT_TYPE } from '@/const/eventType.const';
import { EventDraft, FeedEvent } from '@/types/ccs.types';
import { TRANSITION_KIND, Transition } from '@/types/transition.types';
import logger from '@/utils/pinoLogger';
import { StateStore } from './stateStore.service';

export const toEventDraft = (transition : Transition) : EventDraft => {
    switch (transition.kind) {
        case TRANSITION_KIND.NEW_SUBMISSION:
            return {
                type : EVENT_TYPE.SUBMISSIONS,
                op : EVENT_OP.CREATE,
                id : transition.submission.id,
                data : transition.submission,
            };
        case TRANSITION_KIND.NEW_JUDGEMENT:
            return {
                type : EVENT_TYPE.JUDGEMENTS,
                op : EVENT_OP.CREATE,
                id : transition.judgement.id,
                data : transition.judgement,
            };
        case TRANSITION_KIND.JUDGEMENT_VERDICT_CHANGED:
            return {
                type : EVENT_TYPE.JUDGEMENTS,
                op : EVENT_OP.UPDATE,
                id : transition.judgement.id,
                data : transition.judgement,
            };
        case TRANSITION_KIND.CONTEST_STATE_CHANGED:
            return {
                type : EVENT_TYPE.STATE,
                op : transition.isFirst ? EVENT_OP.CREATE : EVENT_OP.UPDATE,
                id : null,
                data : transition.state,
            };
        case TRANSITION_KIND.STATIC_ENTITY:
            return transition.draft;
    }
}

/**
 * Turns transitions into events, one at a time and in order. Each append is
 * durable before the next transition is looked at; the first failure stops the
 * rest of the batch.
 *
 * @class
 */
@injectable()
export class TransitionEmitter {
    #_store : StateStore

    constructor(
        @inject(TYPES.StateStore) store : StateStore
    ){
        this.#_store = store;
    }

    /**
     * @throws {StoreUnavailableError} from the first append that fails; earlier
     * events of the batch stay committed.
     */
    async emit(transitions : Transition[]) : Promise<FeedEvent[]> {
        const emitted : FeedEvent[] = [];
        for (const transition of transitions) {
            const draft = toEventDraft(transition);
            const token = await this.#_store.append(draft);
            const event : FeedEvent = { ...draft, token };
            emitted.push(event);
            this.#log(event);
        }
        return emitted;
    }

    #log(event : FeedEvent) : void {
        if (event.type === EVENT_TYPE.SUBMISSIONS) {
            logger.info(`[EMIT] New submission: ${event.id}`, { token: event.token, team: event.data.team_id, problem: event.data.problem_id });
        } else if (event.type === EVENT_TYPE.JUDGEMENTS) {
            logger.info(`[EMIT] ${event.op === EVENT_OP.CREATE ? 'New' : 'Updated'} judgement: ${event.id}`, {
                token : event.token,
                submission : event.data.submission_id,
                result : event.data.judgement_type_id,
            });
        } else {
            logger.debug(`[EMIT] ${event.type} ${event.op}`, { token: event.token, id: event.id });
        }
    }
}
