import { DiffEngine, LastKnownState } from '@/services/diffEngine.service';
import { IdentityMapper } from '@/services/identityMapper.service';
import { SnapshotNormalizer } from '@/services/snapshotNormalizer.service';
import { ContestState, Judgement, Submission } from '@/types/ccs.types';
import { ScoreboardSnapshot } from '@/types/scoreboard.types';
import { TRANSITION_KIND, Transition } from '@/types/transition.types';
import { InconsistentVerdictError } from '@/utils/errors';
import { MINUTE, cell, contestPackage, identityTables, row, snapshotOf } from '../fakes/contestFixture';

const settings = { defaultLanguageId : 'cpp', emitPendingJudgements : false };
const normalizer = new SnapshotNormalizer(new IdentityMapper(identityTables), contestPackage, settings);

class KnownState implements LastKnownState {
    submissions = new Map<string, Submission>();
    judgements = new Map<string, Judgement>();
    state : ContestState | undefined;

    lastKnownSubmission(id : string) { return this.submissions.get(id); }
    lastKnownJudgement(id : string) { return this.judgements.get(id); }
    lastKnownContestState() { return this.state; }

    // what the store would hold after emitting these transitions
    absorb(transitions : Transition[]) : void {
        for (const transition of transitions) {
            if (transition.kind === TRANSITION_KIND.NEW_SUBMISSION) {
                this.submissions.set(transition.submission.id, transition.submission);
            } else if (transition.kind === TRANSITION_KIND.NEW_JUDGEMENT || transition.kind === TRANSITION_KIND.JUDGEMENT_VERDICT_CHANGED) {
                this.judgements.set(transition.judgement.id, transition.judgement);
            } else if (transition.kind === TRANSITION_KIND.CONTEST_STATE_CHANGED) {
                this.state = transition.state;
            }
        }
    }
}

const describeTransition = (transition : Transition) : string => {
    switch (transition.kind) {
        case TRANSITION_KIND.NEW_SUBMISSION: return `submission ${transition.submission.id}`;
        case TRANSITION_KIND.NEW_JUDGEMENT: return `judgement ${transition.judgement.id} ${transition.judgement.judgement_type_id ?? 'pending'}`;
        case TRANSITION_KIND.JUDGEMENT_VERDICT_CHANGED: return `verdict ${transition.judgement.id} ${transition.judgement.judgement_type_id ?? 'pending'}`;
        case TRANSITION_KIND.CONTEST_STATE_CHANGED: return `state ${transition.isFirst ? 'create' : 'update'}`;
        case TRANSITION_KIND.STATIC_ENTITY: return `static ${transition.draft.type}`;
    }
}

const diff = (engine : DiffEngine, snapshot : ScoreboardSnapshot, known : KnownState, contestState? : ContestState) =>
    engine.diff(normalizer.normalize(snapshot), known, contestState);

describe('DiffEngine', () => {
    let engine : DiffEngine;
    let known : KnownState;

    beforeEach(() => {
        engine = new DiffEngine(settings);
        known = new KnownState();
    });

    it('emits each submission before its judgement', () => {
        const { transitions, rejected } = diff(engine, snapshotOf(
            row('101', { p1 : cell({ isAccepted : true, attempts : 1, timeMs : 20 * MINUTE }) }),
        ), known);

        expect(transitions.map(describeTransition)).toEqual([
            'submission t1-A-1',
            'judgement t1-A-1 WA',
            'submission t1-A-2',
            'judgement t1-A-2 AC',
        ]);
        expect(rejected).toEqual([]);
    });

    it('emits nothing for an unchanged snapshot', () => {
        const snapshot = snapshotOf(row('101', { p1 : cell({ isAccepted : true, timeMs : 20 * MINUTE }) }));
        known.absorb(diff(engine, snapshot, known).transitions);

        expect(diff(engine, snapshot, known).transitions).toEqual([]);
    });

    it('holds back pending judgements and creates them once judged', () => {
        known.absorb(diff(engine, snapshotOf(row('101', { p1 : cell({ pendingAttempts : 1, timeMs : 5 * MINUTE }) })), known).transitions);
        expect([...known.submissions.keys()]).toEqual(['t1-A-1']);
        expect(known.judgements.size).toBe(0);

        const { transitions } = diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, timeMs : 5 * MINUTE }) })), known);
        expect(transitions.map(describeTransition)).toEqual(['judgement t1-A-1 AC']);
    });

    it('updates a pending judgement when pending judgements are emitted', () => {
        engine = new DiffEngine({ ...settings, emitPendingJudgements : true });
        const first = diff(engine, snapshotOf(row('101', { p1 : cell({ pendingAttempts : 1, timeMs : 5 * MINUTE }) })), known);
        expect(first.transitions.map(describeTransition)).toEqual(['submission t1-A-1', 'judgement t1-A-1 pending']);
        known.absorb(first.transitions);

        const second = diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, timeMs : 5 * MINUTE }) })), known);
        expect(second.transitions.map(describeTransition)).toEqual(['verdict t1-A-1 AC']);
        expect(second.transitions[0]).toMatchObject({ previous : null });
    });

    it('rejects a verdict change on a judged submission and keeps the rest', () => {
        known.absorb(diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, timeMs : 5 * MINUTE }) })), known).transitions);

        // upstream now claims the attempt failed, and another team solved B
        const { transitions, rejected } = diff(engine, snapshotOf(
            row('101', { p1 : cell({ attempts : 1, timeMs : 5 * MINUTE }) }),
            row('102', { p2 : cell({ isAccepted : true, timeMs : 7 * MINUTE }) }),
        ), known);

        expect(rejected).toHaveLength(1);
        expect(rejected[0]).toBeInstanceOf(InconsistentVerdictError);
        expect(rejected[0]).toMatchObject({ judgementId : 't1-A-1', storedVerdict : 'AC', receivedVerdict : 'WA' });
        expect(transitions.map(describeTransition)).toEqual(['submission t2-B-1', 'judgement t2-B-1 AC']);
    });

    it('rejects a judged submission going back to pending', () => {
        known.absorb(diff(engine, snapshotOf(row('101', { p1 : cell({ attempts : 1, timeMs : 5 * MINUTE }) })), known).transitions);

        const { transitions, rejected } = diff(engine, snapshotOf(row('101', { p1 : cell({ pendingAttempts : 1, timeMs : 5 * MINUTE }) })), known);

        expect(transitions).toEqual([]);
        expect(rejected[0]?.message).toBe('Judgement t1-A-1 already judged WA, upstream now reports pending');
    });

    it('puts a new attempt after the stored ones', () => {
        known.absorb(diff(engine, snapshotOf(row('101', { p1 : cell({ attempts : 1, timeMs : 10 * MINUTE }) })), known).transitions);

        const { transitions } = diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, attempts : 1, timeMs : 30 * MINUTE }) })), known);

        expect(transitions.map(describeTransition)).toEqual(['submission t1-A-2', 'judgement t1-A-2 AC']);
    });

    it('judges an attempt made after the accepted one as rejected', () => {
        known.absorb(diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, timeMs : 5 * MINUTE }) })), known).transitions);

        const pending = diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, pendingAttempts : 1, timeMs : 5 * MINUTE }) })), known);
        expect(pending.transitions.map(describeTransition)).toEqual(['submission t1-A-2']);
        known.absorb(pending.transitions);

        const judged = diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, attempts : 1, timeMs : 5 * MINUTE }) })), known);

        expect(judged.rejected).toEqual([]);
        expect(judged.transitions.map(describeTransition)).toEqual(['judgement t1-A-2 WA']);
        expect(judged.transitions[0]).toMatchObject({ judgement : { end_time : '2024-03-10T09:05:00.000Z' } });
    });

    it('appends the contest state after the other transitions', () => {
        const started : ContestState = {
            started : '2024-03-10T09:00:00.000Z', frozen : null, ended : null, thawed : null, finalized : null, end_of_updates : null,
        };
        const first = diff(engine, snapshotOf(row('101', { p1 : cell({ isAccepted : true, timeMs : MINUTE }) })), known, started);
        expect(first.transitions.map(describeTransition)).toEqual(['submission t1-A-1', 'judgement t1-A-1 AC', 'state create']);
        known.absorb(first.transitions);

        expect(diff(engine, snapshotOf(), known, { ...started }).transitions).toEqual([]);

        const frozen = { ...started, frozen : '2024-03-10T13:00:00.000Z' };
        expect(diff(engine, snapshotOf(), known, frozen).transitions.map(describeTransition)).toEqual(['state update']);
    });
});
