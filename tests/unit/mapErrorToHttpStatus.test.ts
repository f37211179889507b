import { mapErrorToHttpStatus } from '@/utils/mapErrorToHttpStatus';
import {
    InvalidTokenError,
    NotFoundError,
    StoreCorruptError,
    StoreUnavailableError,
    UnauthorizedError,
    UnknownTokenError,
    UpstreamFetchFailedError,
} from '@/utils/errors';

describe('mapErrorToHttpStatus', () => {
    it.each([
        [new InvalidTokenError('x'), 400],
        [new UnknownTokenError('9'), 400],
        [new UnauthorizedError('Invalid credentials'), 401],
        [new NotFoundError('Contest not found'), 404],
        [new StoreUnavailableError('down'), 503],
        [new StoreCorruptError('gap'), 503],
        [new UpstreamFetchFailedError('timeout'), 500],
        [new Error('boom'), 500],
        ['not even an error', 500],
    ])('maps %p to %i', (error, status) => {
        expect(mapErrorToHttpStatus(error)).toBe(status);
    });

    it('names errors after their class', () => {
        expect(new StoreCorruptError('gap').name).toBe('StoreCorruptError');
        expect(new InvalidTokenError('x').message).toBe('Invalid token: x');
    });
});
