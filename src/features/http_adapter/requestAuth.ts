import { parseBearerToken, type SessionToken } from '../auth/domain/sessionToken.js';

/** Query parameters carrying the token in a reloadable page URL */
export const SESSION_ID_PARAM = 'sid';
export const SIGNATURE_PARAM = 'sig';

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Token from `Authorization: Bearer <id>.<sig>`, falling back to `?sid=&sig=`.
 */
export function extractToken(authorization: string | undefined, query: URLSearchParams): SessionToken | null {
    if (authorization && BEARER_PREFIX.test(authorization)) {
        const parsed = parseBearerToken(authorization.replace(BEARER_PREFIX, ''));
        if (parsed) return parsed;
    }

    const sessionId = query.get(SESSION_ID_PARAM);
    const signature = query.get(SIGNATURE_PARAM);
    if (sessionId && signature) {
        return { sessionId, signature };
    }
    return null;
}

/**
 * Query string that re-establishes the session on page reload.
 */
export function tokenQueryString(token: SessionToken): string {
    const params = new URLSearchParams({
        [SESSION_ID_PARAM]: token.sessionId,
        [SIGNATURE_PARAM]: token.signature,
    });
    return params.toString();
}
