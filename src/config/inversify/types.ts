
const TYPES = {
    IEventLogRepo : Symbol.for("IEventLogRepo"),
    IScoreboardProvider : Symbol.for("IScoreboardProvider"),
    StateStore : Symbol.for("StateStore"),
    IdentityMapper : Symbol.for("IdentityMapper"),
    SnapshotNormalizer : Symbol.for("SnapshotNormalizer"),
    DiffEngine : Symbol.for("DiffEngine"),
    TransitionEmitter : Symbol.for("TransitionEmitter"),
    SyncEngine : Symbol.for("SyncEngine"),
    FeedService : Symbol.for("FeedService"),
    ScoreboardPoller : Symbol.for("ScoreboardPoller"),
    ContestHandler : Symbol.for("ContestHandler"),
    IdentityTables : Symbol.for("IdentityTables"),
    ContestPackage : Symbol.for("ContestPackage"),
    EngineSettings : Symbol.for("EngineSettings"),
    FeedSettings : Symbol.for("FeedSettings"),
    PollerSettings : Symbol.for("PollerSettings"),
    ScoreboardClientSettings : Symbol.for("ScoreboardClientSettings"),
}

export default TYPES
