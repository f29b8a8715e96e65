import { createHmac } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import {
    constantTimeEquals,
    formatBearerToken,
    hasValidSignature,
    issueToken,
    parseBearerToken,
    signSessionId,
} from '../sessionToken.js';

describe('sessionToken', () => {
    it('signs the id with HMAC-SHA256 of the shared secret', () => {
        const expected = createHmac('sha256', 'test-secret').update('abc123').digest('hex');
        expect(signSessionId('test-secret', 'abc123')).toBe(expected);
        expect(issueToken('test-secret', 'abc123')).toEqual({ sessionId: 'abc123', signature: expected });
    });

    it('validates only signatures made with the same secret', () => {
        const token = issueToken('test-secret', 'abc123');
        expect(hasValidSignature('test-secret', token)).toBe(true);
        expect(hasValidSignature('other-secret', token)).toBe(false);
        expect(hasValidSignature('test-secret', { ...token, sessionId: 'abc124' })).toBe(false);
    });

    it('compares strings of different lengths as unequal', () => {
        expect(constantTimeEquals('abc', 'abc')).toBe(true);
        expect(constantTimeEquals('abc', 'abd')).toBe(false);
        expect(constantTimeEquals('abc', 'abcd')).toBe(false);
        expect(constantTimeEquals('', 'abc')).toBe(false);
    });

    it('formats and parses the bearer form', () => {
        const token = { sessionId: 'V1StGXR8_Z5jdHi6B-myT', signature: 'deadbeef' };
        const bearer = formatBearerToken(token);

        expect(bearer).toBe('V1StGXR8_Z5jdHi6B-myT.deadbeef');
        expect(parseBearerToken(bearer)).toEqual(token);
        expect(parseBearerToken(`  ${bearer}  `)).toEqual(token);
    });

    it('rejects malformed bearer values', () => {
        expect(parseBearerToken('no-separator')).toBeNull();
        expect(parseBearerToken('.signature-only')).toBeNull();
        expect(parseBearerToken('id-only.')).toBeNull();
        expect(parseBearerToken('')).toBeNull();
    });
});
