import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { VERDICT } from '@/const/verdict.const';
import { ContestState, Judgement } from '@/types/ccs.types';
import { NormalizedSnapshot, SubmissionCandidate } from '@/types/normalized.types';
import { EngineSettings } from '@/types/settings.types';
import { TRANSITION_KIND, Transition } from '@/types/transition.types';
import { parseReltime } from '@/utils/contestTime';
import { InconsistentVerdictError } from '@/utils/errors';
import logger from '@/utils/pinoLogger';
import { compareSubmissionIds } from './snapshotNormalizer.service';
import { StateStore } from './stateStore.service';

/**
 * Read side of the store the diff needs.
 */
export type LastKnownState = Pick<StateStore, 'lastKnownSubmission' | 'lastKnownJudgement' | 'lastKnownContestState'>;

export interface DiffResult {
    transitions : Transition[];
    rejected : InconsistentVerdictError[];
}

interface Ordered {
    transition : Transition;
    contestTimeMs : number;
    submissionId : string;
    rank : number; // submission before its judgement
}

interface ResolvedGroup {
    judgements : Judgement[];
    rejected : InconsistentVerdictError[];
}

const withVerdict = (judgement : Judgement, verdict : Judgement['judgement_type_id']) : Judgement => ({
    ...judgement,
    judgement_type_id : verdict,
    end_time : verdict === null ? null : judgement.start_time,
    end_contest_time : verdict === null ? null : judgement.start_contest_time,
});

const sameState = (a : ContestState, b : ContestState) : boolean =>
    a.started === b.started
    && a.frozen === b.frozen
    && a.ended === b.ended
    && a.thawed === b.thawed
    && a.finalized === b.finalized
    && a.end_of_updates === b.end_of_updates;

/**
 * Compares one normalized snapshot with the last-known state and lists the
 * transitions that have to become events, in emission order.
 *
 * @class
 */
@injectable()
export class DiffEngine {
    #_settings : EngineSettings

    constructor(
        @inject(TYPES.EngineSettings) settings : EngineSettings
    ){
        this.#_settings = settings;
    }

    diff(
        snapshot : NormalizedSnapshot,
        state : LastKnownState,
        contestState? : ContestState
    ) : DiffResult {
        const ordered : Ordered[] = [];
        const rejected : InconsistentVerdictError[] = [];
        const candidates = new Map<string, SubmissionCandidate>();
        const created = new Set<string>();

        for (const candidate of snapshot.submissions) {
            const { submission } = candidate;
            candidates.set(submission.id, candidate);
            if (state.lastKnownSubmission(submission.id)) continue;

            created.add(submission.id);
            ordered.push({
                transition : { kind: TRANSITION_KIND.NEW_SUBMISSION, submission },
                contestTimeMs : candidate.contestTimeMs,
                submissionId : submission.id,
                rank : 0,
            });
        }

        for (const group of this.#groupByTeamProblem(snapshot.judgements, candidates)) {
            const resolved = this.#resolveVerdicts(group, state);
            rejected.push(...resolved.rejected);

            for (const judgement of resolved.judgements) {
                const stored = state.lastKnownSubmission(judgement.submission_id);
                if (!stored && !created.has(judgement.submission_id)) {
                    logger.debug('[DIFF] Judgement for an unknown submission skipped', { judgementId: judgement.id });
                    continue;
                }

                const transition = this.#judgementTransition(judgement, state.lastKnownJudgement(judgement.id));
                if (!transition) continue;

                ordered.push({
                    transition,
                    contestTimeMs : stored
                        ? parseReltime(stored.contest_time)
                        : candidates.get(judgement.submission_id)?.contestTimeMs ?? 0,
                    submissionId : judgement.submission_id,
                    rank : 1,
                });
            }
        }

        ordered.sort((a, b) =>
            a.contestTimeMs - b.contestTimeMs
            || compareSubmissionIds(a.submissionId, b.submissionId)
            || a.rank - b.rank
        );

        const transitions = ordered.map((entry) => entry.transition);

        if (contestState) {
            const previous = state.lastKnownContestState();
            if (!previous || !sameState(previous, contestState)) {
                transitions.push({ kind: TRANSITION_KIND.CONTEST_STATE_CHANGED, state: contestState, isFirst: !previous });
            }
        }

        return { transitions, rejected };
    }

    #groupByTeamProblem(judgements : Judgement[], candidates : Map<string, SubmissionCandidate>) : Judgement[][] {
        const groups = new Map<string, Judgement[]>();
        for (const judgement of judgements) {
            const submission = candidates.get(judgement.submission_id)?.submission;
            const key = submission ? `${submission.team_id}/${submission.problem_id}` : judgement.submission_id;
            const group = groups.get(key) ?? [];
            group.push(judgement);
            groups.set(key, group);
        }
        return [...groups.values()].map((group) =>
            group.sort((a, b) => compareSubmissionIds(a.submission_id, b.submission_id)));
    }

    /**
     * Hands out the verdicts the scoreboard counts for one team/problem. Stored
     * verdicts never move; the verdicts they do not account for go to the
     * attempts still unjudged, rejected ones before the accepted one. A cell that
     * counts fewer verdicts than are stored rejects the mismatching judgements
     * and changes nothing.
     */
    #resolveVerdicts(group : Judgement[], state : LastKnownState) : ResolvedGroup {
        const count = (verdicts : Array<Judgement['judgement_type_id'] | undefined>, verdict : string) =>
            verdicts.filter((value) => value === verdict).length;

        const storedVerdicts = group.map((judgement) => state.lastKnownJudgement(judgement.id)?.judgement_type_id);
        const receivedVerdicts = group.map((judgement) => judgement.judgement_type_id);
        const storedRejected = count(storedVerdicts, VERDICT.WRONG_ANSWER);
        const storedAccepted = count(storedVerdicts, VERDICT.ACCEPTED);
        const receivedRejected = count(receivedVerdicts, VERDICT.WRONG_ANSWER);
        const receivedAccepted = count(receivedVerdicts, VERDICT.ACCEPTED);

        if (storedRejected > receivedRejected || storedAccepted > receivedAccepted) {
            const rejected : InconsistentVerdictError[] = [];
            group.forEach((judgement, index) => {
                const stored = storedVerdicts[index];
                const received = receivedVerdicts[index] ?? null;
                if (stored && stored !== received) rejected.push(new InconsistentVerdictError(judgement.id, stored, received));
            });
            return { judgements: [], rejected };
        }

        const unassigned : Judgement['judgement_type_id'][] = [
            ...Array<Judgement['judgement_type_id']>(receivedRejected - storedRejected).fill(VERDICT.WRONG_ANSWER),
            ...Array<Judgement['judgement_type_id']>(receivedAccepted - storedAccepted).fill(VERDICT.ACCEPTED),
        ];

        const judgements : Judgement[] = [];
        group.forEach((judgement, index) => {
            // judged already, nothing to do
            if (storedVerdicts[index]) return;
            judgements.push(withVerdict(judgement, unassigned.shift() ?? null));
        });
        return { judgements, rejected: [] };
    }

    #judgementTransition(candidate : Judgement, stored : Judgement | undefined) : Transition | null {
        const verdict = candidate.judgement_type_id;

        if (!stored) {
            if (verdict === null && !this.#_settings.emitPendingJudgements) return null;
            return { kind: TRANSITION_KIND.NEW_JUDGEMENT, judgement: candidate };
        }

        if (stored.judgement_type_id !== null || verdict === null) return null;
        return { kind: TRANSITION_KIND.JUDGEMENT_VERDICT_CHANGED, judgement: candidate, previous: null };
    }
}
