import { nanoid } from 'nanoid';
import { logger } from '../../../platform/logger.js';
import type { AuthResult } from '../domain/AuthError.js';
import { constantTimeEquals, hasValidSignature, issueToken, type SessionToken } from '../domain/sessionToken.js';
import type { Session, SessionRegistry } from './SessionRegistry.js';

const COMPONENT = 'AuthGate';

/** 32 nanoid characters ≈ 192 random bits */
const SESSION_ID_LENGTH = 32;

export interface IssuedSession {
    token: SessionToken;
    /** Epoch ms after which the session lapses unless it is used again */
    expiresAt: number;
}

export interface AuthGateOptions {
    /** Shared password; also the HMAC key for session tokens */
    sharedSecret: string;
    registry: SessionRegistry;
    generateId?: () => string;
}

/**
 * Auth Gate (Layer 2 Usecase)
 * 1. 校验共享密码，签发 session token
 * 2. 校验 token 签名与注册表状态
 * 3. 登出 / 管理员重置
 */
export class AuthGate {
    private readonly sharedSecret: string;
    private readonly registry: SessionRegistry;
    private readonly generateId: () => string;

    constructor(options: AuthGateOptions) {
        if (!options.sharedSecret) {
            throw new Error('AuthGate requires a non-empty shared secret');
        }
        this.sharedSecret = options.sharedSecret;
        this.registry = options.registry;
        this.generateId = options.generateId ?? (() => nanoid(SESSION_ID_LENGTH));
    }

    private checkPassword(password: string): boolean {
        return constantTimeEquals(password, this.sharedSecret);
    }

    login(password: string): AuthResult<IssuedSession> {
        if (!this.checkPassword(password)) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Login rejected: invalid credential' });
            return { ok: false, reason: 'InvalidCredential' };
        }

        const sessionId = this.generateId();
        if (!this.registry.admit(sessionId)) {
            return { ok: false, reason: 'CapacityExceeded' };
        }

        const session = this.registry.get(sessionId);
        const lastActiveAt = session?.lastActiveAt ?? Date.now();
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Session admitted',
            meta: { session: sessionId.slice(0, 8), active: this.registry.size() },
        });

        return {
            ok: true,
            value: {
                token: issueToken(this.sharedSecret, sessionId),
                expiresAt: lastActiveAt + this.registry.ttlMilliseconds,
            },
        };
    }

    /**
     * Checks the signature first so a forged id never reaches the registry.
     * A valid session is touched.
     */
    verify(token: SessionToken): AuthResult<Session> {
        if (!hasValidSignature(this.sharedSecret, token)) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Token signature mismatch' });
            return { ok: false, reason: 'Unknown' };
        }

        const status = this.registry.lookup(token.sessionId);
        if (status === 'expired') {
            return { ok: false, reason: 'Expired' };
        }
        if (status === 'absent') {
            return { ok: false, reason: 'NotRegistered' };
        }

        this.registry.touch(token.sessionId);
        const session = this.registry.get(token.sessionId);
        if (!session) {
            return { ok: false, reason: 'NotRegistered' };
        }
        return { ok: true, value: session };
    }

    /** Always succeeds; removing an unknown session is a no-op */
    logout(sessionId: string): void {
        this.registry.remove(sessionId);
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Session logged out', meta: { session: sessionId.slice(0, 8) } });
    }

    /**
     * Administrative escape hatch for lockouts: drops every session.
     */
    resetSessions(password: string): AuthResult<number> {
        if (!this.checkPassword(password)) {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Session reset rejected: invalid credential' });
            return { ok: false, reason: 'InvalidCredential' };
        }
        const removed = this.registry.resetAll();
        logger.warn({ kind: 'biz', component: COMPONENT, message: 'All sessions reset', meta: { removed } });
        return { ok: true, value: removed };
    }
}
