export const FEED_ERROR_CODES = {
    UNMAPPED_IDENTIFIER : 'UNMAPPED_IDENTIFIER',
    INCONSISTENT_VERDICT : 'INCONSISTENT_VERDICT',
    STORE_UNAVAILABLE : 'STORE_UNAVAILABLE',
    STORE_CORRUPT : 'STORE_CORRUPT',
    UPSTREAM_FETCH_FAILED : 'UPSTREAM_FETCH_FAILED',
    INVALID_TOKEN : 'INVALID_TOKEN',
    UNKNOWN_TOKEN : 'UNKNOWN_TOKEN',
    NOT_FOUND : 'NOT_FOUND',
    UNAUTHORIZED : 'UNAUTHORIZED',
} as const

export type FeedErrorCode = typeof FEED_ERROR_CODES[keyof typeof FEED_ERROR_CODES];

export const FEED_ERROR_MESSAGES = {
    CONTEST_NOT_FOUND : 'Contest not found',
    INVALID_CREDENTIALS : 'Invalid credentials',
    STORE_NOT_INITIALIZED : 'State store has not been initialized',
} as const
