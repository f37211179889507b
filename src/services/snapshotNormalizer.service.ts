import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { VERDICT } from '@/const/verdict.const';
import { Judgement } from '@/types/ccs.types';
import { ContestPackage, ContestTimeline } from '@/types/contest.types';
import { NormalizedSnapshot, SubmissionCandidate } from '@/types/normalized.types';
import { ScoreboardCell, ScoreboardSnapshot } from '@/types/scoreboard.types';
import { EngineSettings } from '@/types/settings.types';
import { contestTimeToAbsolute, formatReltime } from '@/utils/contestTime';
import { UnmappedIdentifierError } from '@/utils/errors';
import logger from '@/utils/pinoLogger';
import { IdentityMapper } from './identityMapper.service';

/**
 * Orders submission ids the way a person would read them: `t1-A-2` before `t1-A-10`.
 */
export const compareSubmissionIds = (a : string, b : string) : number =>
    a.localeCompare(b, 'en', { numeric: true });

export const compareCandidates = (a : SubmissionCandidate, b : SubmissionCandidate) : number =>
    a.contestTimeMs - b.contestTimeMs || compareSubmissionIds(a.submission.id, b.submission.id);

/**
 * Turns one scoreboard snapshot into submission and judgement candidates keyed by
 * contest-package identifiers.
 *
 * The scoreboard only carries counters per team/problem, so every counted attempt
 * is expanded into a submission with a stable id `<team>-<problem>-<seq>`:
 * rejected attempts first, then the accepted one, then the pending ones.
 *
 * @class
 */
@injectable()
export class SnapshotNormalizer {
    #_mapper : IdentityMapper
    #_timeline : ContestTimeline
    #_settings : EngineSettings
    #_reported : Set<string> = new Set();

    constructor(
        @inject(TYPES.IdentityMapper) mapper : IdentityMapper,
        @inject(TYPES.ContestPackage) contestPackage : ContestPackage,
        @inject(TYPES.EngineSettings) settings : EngineSettings,
    ){
        this.#_mapper = mapper;
        this.#_timeline = contestPackage.timeline;
        this.#_settings = settings;
    }

    normalize(snapshot : ScoreboardSnapshot) : NormalizedSnapshot {
        const candidates : Array<{ candidate : SubmissionCandidate; judgement : Judgement }> = [];
        const dropped : UnmappedIdentifierError[] = [];

        for (const row of snapshot.rows) {
            const teamId = this.#tryMap(() => this.#_mapper.mapTeam(row.teamId), dropped);
            if (teamId === null) continue;

            for (const [externalProblemId, cell] of Object.entries(row.results)) {
                const problemId = this.#tryMap(() => this.#_mapper.mapProblem(externalProblemId), dropped);
                if (problemId === null) continue;

                candidates.push(...this.#expandCell(teamId, problemId, cell));
            }
        }

        candidates.sort((a, b) => compareCandidates(a.candidate, b.candidate));

        return {
            submissions : candidates.map((entry) => entry.candidate),
            judgements : candidates.map((entry) => entry.judgement),
            dropped,
        };
    }

    #tryMap(map : () => string, dropped : UnmappedIdentifierError[]) : string | null {
        try {
            return map();
        } catch (error) {
            if (!(error instanceof UnmappedIdentifierError)) throw error;
            dropped.push(error);
            this.#report(error);
            return null;
        }
    }

    // warn once per unmapped id, the same rows come back every tick
    #report(error : UnmappedIdentifierError) : void {
        const key = `${error.kind}:${error.externalId}`;
        if (this.#_reported.has(key)) {
            logger.debug(`[NORMALIZER] Skipping unmapped ${error.kind}`, { externalId: error.externalId });
            return;
        }
        this.#_reported.add(key);
        logger.warn(`[NORMALIZER] ${error.message}; its records are skipped`, { kind: error.kind, externalId: error.externalId });
    }

    #expandCell(
        teamId : string,
        problemId : string,
        cell : ScoreboardCell
    ) : Array<{ candidate : SubmissionCandidate; judgement : Judgement }> {
        const judged = cell.attempts + (cell.isAccepted ? 1 : 0);
        const total = judged + cell.pendingAttempts;
        if (total === 0) return [];

        const step = judged > 0 ? cell.timeMs / (judged + 1) : cell.timeMs;
        const expanded : Array<{ candidate : SubmissionCandidate; judgement : Judgement }> = [];

        for (let seq = 1; seq <= total; seq++) {
            const isRejected = seq <= cell.attempts;
            const isAccepted = !isRejected && seq <= judged;
            const contestTimeMs = isRejected ? Math.floor(step * seq) : Math.floor(cell.timeMs);
            const verdict = isRejected ? VERDICT.WRONG_ANSWER : isAccepted ? VERDICT.ACCEPTED : null;
            const id = `${teamId}-${problemId}-${seq}`;

            expanded.push({
                candidate : {
                    contestTimeMs,
                    submission : {
                        id,
                        team_id : teamId,
                        problem_id : problemId,
                        language_id : this.#_settings.defaultLanguageId,
                        time : contestTimeToAbsolute(this.#_timeline, contestTimeMs),
                        contest_time : formatReltime(contestTimeMs),
                        files : [],
                    },
                },
                judgement : this.#judgement(id, verdict, Math.floor(cell.timeMs)),
            });
        }
        return expanded;
    }

    #judgement(submissionId : string, verdict : Judgement['judgement_type_id'], judgedAtMs : number) : Judgement {
        const time = contestTimeToAbsolute(this.#_timeline, judgedAtMs);
        const contestTime = formatReltime(judgedAtMs);
        return {
            id : submissionId,
            submission_id : submissionId,
            judgement_type_id : verdict,
            start_time : time,
            start_contest_time : contestTime,
            end_time : verdict === null ? null : time,
            end_contest_time : verdict === null ? null : contestTime,
        };
    }
}
