import { FEED_ERROR_CODES } from '@/const/errorType.const';
import { FeedSyncError } from './errors';

/**
 * Maps a known domain error to an HTTP status code.
 *
 * @param {unknown} error - Anything thrown by a handler.
 * @returns {number} HTTP status code
 */
export const mapErrorToHttpStatus = (error : unknown) : number => {
    if (!(error instanceof FeedSyncError)) return 500;

    switch (error.code) {

        case FEED_ERROR_CODES.INVALID_TOKEN:
        case FEED_ERROR_CODES.UNKNOWN_TOKEN:
            return 400

        case FEED_ERROR_CODES.UNAUTHORIZED:
            return 401

        case FEED_ERROR_CODES.NOT_FOUND:
            return 404

        case FEED_ERROR_CODES.STORE_UNAVAILABLE:
        case FEED_ERROR_CODES.STORE_CORRUPT:
            return 503

        default:
            return 500
    }
}
