import 'reflect-metadata'
import { Container } from "inversify";
import TYPES from './types'
import { config } from '@/config';
import { IEventLogRepo } from '@/db/repos/interfaces/eventLog.repo.interface';
import { EventLogRepo } from '@/db/repos/eventLog.repo';
import { IScoreboardProvider } from '@/providers/interfaces/IScoreboardProvider.interface';
import { ScoreboardProvider } from '@/providers/scoreboardProvider';
import { StateStore } from '@/services/stateStore.service';
import { IdentityMapper } from '@/services/identityMapper.service';
import { SnapshotNormalizer } from '@/services/snapshotNormalizer.service';
import { DiffEngine } from '@/services/diffEngine.service';
import { TransitionEmitter } from '@/services/transitionEmitter.service';
import { SyncEngine } from '@/services/sync.service';
import { FeedService } from '@/services/feed.service';
import { ScoreboardPoller } from '@/services/poller.service';
import { ContestHandler } from '@/http/contest.handler';
import { ContestPackage, IdentityTables } from '@/types/contest.types';
import { EngineSettings, FeedSettings, PollerSettings, ScoreboardClientSettings } from '@/types/settings.types';

/**
 * Values only known once the contest package and mapping files are read.
 */
export interface ContainerRuntime {
    contestPackage : ContestPackage;
    identityTables : IdentityTables;
}

const SCOREBOARD_PAGE_SIZE = 100;

export const createContainer = ({ contestPackage, identityTables } : ContainerRuntime) : Container => {
    const container = new Container();

    // Runtime values
    container
        .bind<ContestPackage>(TYPES.ContestPackage)
        .toConstantValue(contestPackage);

    container
        .bind<IdentityTables>(TYPES.IdentityTables)
        .toConstantValue(identityTables);

    // Settings
    container
        .bind<EngineSettings>(TYPES.EngineSettings)
        .toConstantValue({
            defaultLanguageId : config.DEFAULT_LANGUAGE_ID,
            emitPendingJudgements : config.EMIT_PENDING_JUDGEMENTS,
        });

    container
        .bind<FeedSettings>(TYPES.FeedSettings)
        .toConstantValue({ keepaliveMs : config.FEED_KEEPALIVE_SECONDS * 1000 });

    container
        .bind<PollerSettings>(TYPES.PollerSettings)
        .toConstantValue({ intervalMs : config.POLLING_INTERVAL_SECONDS * 1000 });

    container
        .bind<ScoreboardClientSettings>(TYPES.ScoreboardClientSettings)
        .toConstantValue({
            apiKey : config.SCOREBOARD_API_KEY,
            subdomain : config.SCOREBOARD_SUBDOMAIN,
            contestId : config.SCOREBOARD_CONTEST_ID,
            showUnofficial : config.SCOREBOARD_SHOW_UNOFFICIAL,
            timeoutMs : config.SCOREBOARD_TIMEOUT_MS,
            pageSize : SCOREBOARD_PAGE_SIZE,
        });

    // Repos & providers
    container
        .bind<IEventLogRepo>(TYPES.IEventLogRepo)
        .to(EventLogRepo).inSingletonScope();

    container
        .bind<IScoreboardProvider>(TYPES.IScoreboardProvider)
        .to(ScoreboardProvider).inSingletonScope();

    // Services
    container
        .bind<StateStore>(TYPES.StateStore)
        .to(StateStore).inSingletonScope();

    container
        .bind<IdentityMapper>(TYPES.IdentityMapper)
        .to(IdentityMapper).inSingletonScope();

    container
        .bind<SnapshotNormalizer>(TYPES.SnapshotNormalizer)
        .to(SnapshotNormalizer).inSingletonScope();

    container
        .bind<DiffEngine>(TYPES.DiffEngine)
        .to(DiffEngine).inSingletonScope();

    container
        .bind<TransitionEmitter>(TYPES.TransitionEmitter)
        .to(TransitionEmitter).inSingletonScope();

    container
        .bind<SyncEngine>(TYPES.SyncEngine)
        .to(SyncEngine).inSingletonScope();

    container
        .bind<FeedService>(TYPES.FeedService)
        .to(FeedService).inSingletonScope();

    container
        .bind<ScoreboardPoller>(TYPES.ScoreboardPoller)
        .to(ScoreboardPoller).inSingletonScope();

    container
        .bind<ContestHandler>(TYPES.ContestHandler)
        .to(ContestHandler).inSingletonScope();

    return container;
}
