import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { EVENT_OP, EVENT_TYPE } from '@/const/eventType.const';
import { JUDGEMENT_TYPES, LANGUAGES } from '@/const/verdict.const';
import { FeedEvent } from '@/types/ccs.types';
import { ContestPackage } from '@/types/contest.types';
import { ScoreboardSnapshot } from '@/types/scoreboard.types';
import { StaticEntityTransition, TRANSITION_KIND } from '@/types/transition.types';
import { contestStateAt } from '@/utils/contestTime';
import logger from '@/utils/pinoLogger';
import { DiffEngine } from './diffEngine.service';
import { SnapshotNormalizer } from './snapshotNormalizer.service';
import { StateStore } from './stateStore.service';
import { TransitionEmitter } from './transitionEmitter.service';

export interface TickResult {
    events : FeedEvent[];
    dropped : number;
    rejected : number;
}

/**
 * The poll-diff-emit cycle. Callers must not start a tick before the previous
 * one has settled.
 *
 * @class
 */
@injectable()
export class SyncEngine {
    #_store : StateStore
    #_normalizer : SnapshotNormalizer
    #_diffEngine : DiffEngine
    #_emitter : TransitionEmitter
    #_contestPackage : ContestPackage

    constructor(
        @inject(TYPES.StateStore) store : StateStore,
        @inject(TYPES.SnapshotNormalizer) normalizer : SnapshotNormalizer,
        @inject(TYPES.DiffEngine) diffEngine : DiffEngine,
        @inject(TYPES.TransitionEmitter) emitter : TransitionEmitter,
        @inject(TYPES.ContestPackage) contestPackage : ContestPackage,
    ){
        this.#_store = store;
        this.#_normalizer = normalizer;
        this.#_diffEngine = diffEngine;
        this.#_emitter = emitter;
        this.#_contestPackage = contestPackage;
    }

    /**
     * Publishes the contest package (contest, judgement types, languages,
     * problems, teams). Entities already in the log are left out, so a seed cut
     * short by a store failure is finished by the next call.
     */
    async seedStaticEvents() : Promise<FeedEvent[]> {
        const { contest, problems, teams } = this.#_contestPackage;
        const staticEntity = (draft : StaticEntityTransition['draft']) : StaticEntityTransition =>
            ({ kind: TRANSITION_KIND.STATIC_ENTITY, draft });

        const transitions : StaticEntityTransition[] = [
            staticEntity({ type: EVENT_TYPE.CONTESTS, op: EVENT_OP.CREATE, id: contest.id, data: contest }),
            ...JUDGEMENT_TYPES.map((judgementType) =>
                staticEntity({ type: EVENT_TYPE.JUDGEMENT_TYPES, op: EVENT_OP.CREATE, id: judgementType.id, data: judgementType })),
            ...LANGUAGES.map((language) =>
                staticEntity({ type: EVENT_TYPE.LANGUAGES, op: EVENT_OP.CREATE, id: language.id, data: language })),
            ...problems.map((problem) =>
                staticEntity({ type: EVENT_TYPE.PROBLEMS, op: EVENT_OP.CREATE, id: problem.id, data: problem })),
            ...teams.map((team) =>
                staticEntity({ type: EVENT_TYPE.TEAMS, op: EVENT_OP.CREATE, id: team.id, data: team })),
        ].filter((transition) => !this.#_store.lastKnownState(transition.draft.type, transition.draft.id));

        if (transitions.length === 0) {
            logger.debug('[SYNC] Static events already published', { head: this.#_store.head() });
            return [];
        }

        const events = await this.#_emitter.emit(transitions);
        logger.info(`[SYNC] Published ${events.length} static events`);
        return events;
    }

    /**
     * Runs one tick against `snapshot`. Unmapped records and inconsistent
     * verdicts are skipped; a store failure aborts the tick and propagates.
     */
    async runTick(snapshot : ScoreboardSnapshot, nowMs : number = Date.now()) : Promise<TickResult> {
        const startTime = Date.now();
        const normalized = this.#_normalizer.normalize(snapshot);
        const contestState = contestStateAt(this.#_contestPackage.timeline, nowMs);
        const { transitions, rejected } = this.#_diffEngine.diff(normalized, this.#_store, contestState);

        for (const error of rejected) {
            logger.warn(`[SYNC] ${error.message}; upstream data needs attention`, {
                judgementId : error.judgementId,
                stored : error.storedVerdict,
                received : error.receivedVerdict,
            });
        }

        const events = await this.#_emitter.emit(transitions);

        const result = { events, dropped: normalized.dropped.length, rejected: rejected.length };
        if (events.length > 0) {
            logger.info(`[SYNC] Tick emitted ${events.length} events`, {
                head : this.#_store.head(),
                dropped : result.dropped,
                rejected : result.rejected,
                duration : Date.now() - startTime,
            });
        } else {
            logger.debug('[SYNC] Tick produced no events', { head: this.#_store.head(), duration: Date.now() - startTime });
        }
        return result;
    }
}
