import { createHmac, timingSafeEqual } from 'node:crypto';

export interface SessionToken {
    sessionId: string;
    signature: string;
}

/** Separator of the bearer form `<sessionId>.<signature>`; never produced by nanoid */
const BEARER_SEPARATOR = '.';

export function signSessionId(secret: string, sessionId: string): string {
    return createHmac('sha256', secret).update(sessionId).digest('hex');
}

/**
 * Constant-time comparison. Unequal lengths still run a comparison so the
 * time taken does not depend on where the inputs differ.
 */
export function constantTimeEquals(provided: string, expected: string): boolean {
    const providedBuffer = Buffer.from(provided);
    const expectedBuffer = Buffer.from(expected);
    if (providedBuffer.length !== expectedBuffer.length) {
        timingSafeEqual(expectedBuffer, expectedBuffer);
        return false;
    }
    return timingSafeEqual(providedBuffer, expectedBuffer);
}

export function hasValidSignature(secret: string, token: SessionToken): boolean {
    return constantTimeEquals(token.signature, signSessionId(secret, token.sessionId));
}

export function issueToken(secret: string, sessionId: string): SessionToken {
    return { sessionId, signature: signSessionId(secret, sessionId) };
}

export function formatBearerToken(token: SessionToken): string {
    return `${token.sessionId}${BEARER_SEPARATOR}${token.signature}`;
}

export function parseBearerToken(raw: string): SessionToken | null {
    const value = raw.trim();
    const index = value.lastIndexOf(BEARER_SEPARATOR);
    if (index <= 0 || index === value.length - 1) return null;
    return {
        sessionId: value.slice(0, index),
        signature: value.slice(index + 1),
    };
}
