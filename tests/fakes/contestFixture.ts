import { Container } from 'inversify';
import { createContainer } from '@/config/inversify/container';
import TYPES from '@/config/inversify/types';
import { IEventLogRepo } from '@/db/repos/interfaces/eventLog.repo.interface';
import { StateStore } from '@/services/stateStore.service';
import { SyncEngine } from '@/services/sync.service';
import { ContestPackage, IdentityTables } from '@/types/contest.types';
import { ScoreboardCell, ScoreboardRow, ScoreboardSnapshot } from '@/types/scoreboard.types';
import { EngineSettings, FeedSettings } from '@/types/settings.types';
import { InMemoryEventLogRepo } from './inMemoryEventLogRepo';

// 2024-03-10T09:00:00.000Z
export const CONTEST_START_MS = Date.UTC(2024, 2, 10, 9, 0, 0);
export const MINUTE = 60_000;

export const contestPackage : ContestPackage = {
    contest : {
        id : 'spring-open',
        name : 'Spring Open',
        formal_name : 'Spring Open 2024',
        start_time : '2024-03-10T09:00:00.000Z',
        duration : '5:00:00.000',
        scoreboard_freeze_duration : '1:00:00.000',
        penalty_time : 20,
    },
    problems : [
        { id: 'A', label: 'A', name: 'Arrays', ordinal: 0, rgb: '#ff0000', color: 'red', time_limit: 1, test_data_count: 10 },
        { id: 'B', label: 'B', name: 'Bridges', ordinal: 1, rgb: '#0000ff', color: 'blue', time_limit: 2, test_data_count: 12 },
    ],
    teams : [
        { id: 't1', name: 'Team One', display_name: 'Team One', group_ids: [], organization_id: null, icpc_id: null },
        { id: 't2', name: 'Team Two', display_name: 'Team Two', group_ids: [], organization_id: null, icpc_id: null },
    ],
    timeline : {
        startEpochMs : CONTEST_START_MS,
        utcOffsetMinutes : 0,
        durationMs : 300 * MINUTE,
        freezeDurationMs : 60 * MINUTE,
    },
};

export const identityTables : IdentityTables = {
    teams : new Map([['101', 't1'], ['102', 't2']]),
    problems : new Map([['p1', 'A'], ['p2', 'B']]),
};

export const cell = (overrides : Partial<ScoreboardCell> = {}) : ScoreboardCell => ({
    isAccepted : false,
    attempts : 0,
    pendingAttempts : 0,
    timeMs : 0,
    penaltyMs : 0,
    isFirstAccepted : false,
    ...overrides,
});

export const row = (teamId : string, results : Record<string, ScoreboardCell>) : ScoreboardRow => ({
    teamId,
    teamName : `Contestant ${teamId}`,
    rank : null,
    score : 0,
    penaltyMs : 0,
    isUnofficial : false,
    group : '',
    results,
});

export const snapshotOf = (...rows : ScoreboardRow[]) : ScoreboardSnapshot => ({ rows });

export interface TestEngine {
    container : Container;
    repo : InMemoryEventLogRepo;
    store : StateStore;
    sync : SyncEngine;
}

/**
 * Wires the real container with the in-memory repo in place of Mongo.
 */
export const createTestEngine = async (options : {
    repo? : InMemoryEventLogRepo;
    engine? : Partial<EngineSettings>;
    feed? : Partial<FeedSettings>;
} = {}) : Promise<TestEngine> => {
    const repo = options.repo ?? new InMemoryEventLogRepo();
    const container = createContainer({ contestPackage, identityTables });

    container.rebind<IEventLogRepo>(TYPES.IEventLogRepo).toConstantValue(repo);
    container.rebind<EngineSettings>(TYPES.EngineSettings).toConstantValue({
        defaultLanguageId : 'cpp',
        emitPendingJudgements : false,
        ...options.engine,
    });
    container.rebind<FeedSettings>(TYPES.FeedSettings).toConstantValue({
        keepaliveMs : 120_000,
        ...options.feed,
    });

    const store = container.get<StateStore>(TYPES.StateStore);
    await store.init();

    return { container, repo, store, sync: container.get<SyncEngine>(TYPES.SyncEngine) };
}
