import { inject, injectable } from 'inversify';
import { z } from 'zod';
import TYPES from '@/config/inversify/types';
import { ScoreboardRow, ScoreboardSnapshot } from '@/types/scoreboard.types';
import { ScoreboardClientSettings } from '@/types/settings.types';
import { UpstreamFetchFailedError, isAbortError } from '@/utils/errors';
import logger from '@/utils/pinoLogger';
import { IScoreboardProvider } from './interfaces/IScoreboardProvider.interface';

const RawCellSchema = z.object({
    IsAccepted : z.boolean().default(false),
    Attempts : z.number().int().nonnegative().default(0),
    PendingAttempts : z.number().int().nonnegative().default(0),
    LastImprovementMs : z.number().default(0),
    PenaltyMs : z.number().default(0),
    IsFirstAccepted : z.boolean().default(false),
});

const RawRowSchema = z.object({
    Id : z.union([z.string(), z.number()]),
    Contestant : z.object({ Text : z.string().default('') }).default({}),
    Rank : z.number().nullable().default(null),
    Score : z.number().default(0),
    PenaltyMs : z.number().default(0),
    IsUnofficial : z.boolean().default(false),
    Group : z.object({ Text : z.string().default('') }).nullable().default(null),
    Results : z.record(RawCellSchema).default({}),
});

const RawPageSchema = z.object({
    rows : z.array(RawRowSchema).default([]),
});

export type RawScoreboardRow = z.input<typeof RawRowSchema>;

/**
 * Validates one page of the scoreboard API and converts its rows.
 */
export const parseScoreboardPage = (body : unknown) : ScoreboardRow[] => {
    const page = RawPageSchema.parse(body);
    return page.rows.map((row) => ({
        teamId : String(row.Id),
        teamName : row.Contestant.Text.trim(),
        rank : row.Rank,
        score : row.Score,
        penaltyMs : row.PenaltyMs,
        isUnofficial : row.IsUnofficial,
        group : row.Group?.Text ?? '',
        results : Object.fromEntries(Object.entries(row.Results).map(([problemId, cell]) => [problemId, {
            isAccepted : cell.IsAccepted,
            attempts : cell.Attempts,
            pendingAttempts : cell.PendingAttempts,
            timeMs : cell.LastImprovementMs,
            penaltyMs : cell.PenaltyMs,
            isFirstAccepted : cell.IsFirstAccepted,
        }])),
    }));
}

/**
 * Scoreboard client for the Algotester `ListScoreboardWithAPI` endpoint.
 * Pages through the scoreboard until a short page comes back.
 *
 * @class
 */
@injectable()
export class ScoreboardProvider implements IScoreboardProvider {
    #_settings : ScoreboardClientSettings

    constructor(
        @inject(TYPES.ScoreboardClientSettings) settings : ScoreboardClientSettings
    ){
        this.#_settings = settings;
    }

    async fetchSnapshot(): Promise<ScoreboardSnapshot> {
        const startTime = Date.now();
        const rows : ScoreboardRow[] = [];
        const limit = this.#_settings.pageSize;

        for (let offset = 0; ; offset += limit) {
            const page = await this.#fetchPage(offset, limit);
            rows.push(...page);
            if (page.length < limit) break;
        }

        logger.debug('[SCOREBOARD] Snapshot fetched', { rows: rows.length, duration: Date.now() - startTime });
        return { rows };
    }

    async #fetchPage(offset : number, limit : number): Promise<ScoreboardRow[]> {
        const { subdomain, contestId, showUnofficial, apiKey, timeoutMs } = this.#_settings;
        const url = new URL(`https://${subdomain}.algotester.com/en/Contest/ListScoreboardWithAPI/${contestId}`);
        url.searchParams.set('showUnofficial', showUnofficial ? 'True' : 'False');
        url.searchParams.set('offset', String(offset));
        url.searchParams.set('limit', String(limit));

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const response = await fetch(url.toString(), {
                method : 'GET',
                headers : {
                    'X-Requested-With' : 'XMLHttpRequest',
                    'X-API-Key' : apiKey,
                    Accept : 'application/json',
                },
                signal : controller.signal,
            });

            if (!response.ok) {
                throw new UpstreamFetchFailedError(`Scoreboard request failed: ${response.status} ${response.statusText}`);
            }

            return parseScoreboardPage(await response.json());
        } catch (error) {
            if (error instanceof UpstreamFetchFailedError) throw error;
            if (isAbortError(error)) {
                throw new UpstreamFetchFailedError(`Scoreboard request timed out after ${timeoutMs}ms`, error);
            }
            throw new UpstreamFetchFailedError('Scoreboard request failed', error);
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
