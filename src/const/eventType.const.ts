export const EVENT_TYPE = {
    CONTESTS : 'contests',
    JUDGEMENT_TYPES : 'judgement-types',
    LANGUAGES : 'languages',
    PROBLEMS : 'problems',
    TEAMS : 'teams',
    STATE : 'state',
    SUBMISSIONS : 'submissions',
    JUDGEMENTS : 'judgements',
} as const

export type EventType = typeof EVENT_TYPE[keyof typeof EVENT_TYPE];

export const EVENT_OP = {
    CREATE : 'create',
    UPDATE : 'update',
} as const

export type EventOp = typeof EVENT_OP[keyof typeof EVENT_OP];

/**
 * Collections served under `/contests/:contestId/:collection`.
 * `contests` and `state` have their own routes.
 */
export const ENTITY_COLLECTIONS = [
    EVENT_TYPE.JUDGEMENT_TYPES,
    EVENT_TYPE.LANGUAGES,
    EVENT_TYPE.PROBLEMS,
    EVENT_TYPE.TEAMS,
    EVENT_TYPE.SUBMISSIONS,
    EVENT_TYPE.JUDGEMENTS,
] as const

export type EntityCollection = typeof ENTITY_COLLECTIONS[number];

export const isEntityCollection = (value : string) : value is EntityCollection =>
    ENTITY_COLLECTIONS.some((collection) => collection === value);
