import { createHash, timingSafeEqual } from 'node:crypto';
import { RequestHandler } from 'express';
import { FEED_ERROR_MESSAGES } from '@/const/errorType.const';
import { BasicAuthCredentials } from '@/types/settings.types';
import { UnauthorizedError } from '@/utils/errors';

const digest = (value : string) : Buffer => createHash('sha256').update(value).digest();

const safeEqual = (a : string, b : string) : boolean => timingSafeEqual(digest(a), digest(b));

/**
 * Checks an `Authorization` header value against the configured credentials.
 */
export const checkBasicAuth = (header : string | undefined, credentials : BasicAuthCredentials) : boolean => {
    if (!header) return false;

    const [scheme, encoded] = header.split(' ');
    if (scheme?.toLowerCase() !== 'basic' || !encoded) return false;

    const decoded = Buffer.from(encoded, 'base64').toString('utf8');
    const separator = decoded.indexOf(':');
    if (separator === -1) return false;

    const usernameOk = safeEqual(decoded.slice(0, separator), credentials.username);
    const passwordOk = safeEqual(decoded.slice(separator + 1), credentials.password);
    return usernameOk && passwordOk;
}

export const basicAuth = (credentials : BasicAuthCredentials) : RequestHandler => (req, res, next) => {
    if (checkBasicAuth(req.headers.authorization, credentials)) {
        next();
        return;
    }
    next(new UnauthorizedError(FEED_ERROR_MESSAGES.INVALID_CREDENTIALS));
}
