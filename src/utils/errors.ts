import { FEED_ERROR_CODES, FeedErrorCode } from '@/const/errorType.const';

/**
 * Base class for every error the sync engine and feed server raise on purpose.
 * `code` is stable and is what callers branch on.
 */
export class FeedSyncError extends Error {
    readonly code : FeedErrorCode;

    constructor(code : FeedErrorCode, message : string, options? : { cause? : unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export type IdentifierKind = 'team' | 'problem';

export class UnmappedIdentifierError extends FeedSyncError {
    readonly kind : IdentifierKind;
    readonly externalId : string;

    constructor(kind : IdentifierKind, externalId : string) {
        super(FEED_ERROR_CODES.UNMAPPED_IDENTIFIER, `No ${kind} mapping for external id "${externalId}"`);
        this.kind = kind;
        this.externalId = externalId;
    }
}

export class InconsistentVerdictError extends FeedSyncError {
    readonly judgementId : string;
    readonly storedVerdict : string;
    readonly receivedVerdict : string | null;

    constructor(judgementId : string, storedVerdict : string, receivedVerdict : string | null) {
        super(
            FEED_ERROR_CODES.INCONSISTENT_VERDICT,
            `Judgement ${judgementId} already judged ${storedVerdict}, upstream now reports ${receivedVerdict ?? 'pending'}`
        );
        this.judgementId = judgementId;
        this.storedVerdict = storedVerdict;
        this.receivedVerdict = receivedVerdict;
    }
}

export class StoreUnavailableError extends FeedSyncError {
    constructor(message : string, cause? : unknown) {
        super(FEED_ERROR_CODES.STORE_UNAVAILABLE, message, { cause });
    }
}

export class StoreCorruptError extends FeedSyncError {
    constructor(message : string, cause? : unknown) {
        super(FEED_ERROR_CODES.STORE_CORRUPT, message, { cause });
    }
}

export class UpstreamFetchFailedError extends FeedSyncError {
    constructor(message : string, cause? : unknown) {
        super(FEED_ERROR_CODES.UPSTREAM_FETCH_FAILED, message, { cause });
    }
}

export class InvalidTokenError extends FeedSyncError {
    constructor(token : string) {
        super(FEED_ERROR_CODES.INVALID_TOKEN, `Invalid token: ${token}`);
    }
}

export class UnknownTokenError extends FeedSyncError {
    constructor(token : string) {
        super(FEED_ERROR_CODES.UNKNOWN_TOKEN, `Unknown token: ${token}`);
    }
}

export class NotFoundError extends FeedSyncError {
    constructor(message : string) {
        super(FEED_ERROR_CODES.NOT_FOUND, message);
    }
}

export class UnauthorizedError extends FeedSyncError {
    constructor(message : string) {
        super(FEED_ERROR_CODES.UNAUTHORIZED, message);
    }
}

// checked by name: the AbortError from node:events may come from another realm
export const isAbortError = (error : unknown) : boolean =>
    typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
