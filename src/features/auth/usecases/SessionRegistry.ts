import { logger } from '../../../platform/logger.js';

const COMPONENT = 'SessionRegistry';

export interface SessionEntry {
    createdAt: number;
    lastActiveAt: number;
}

export interface Session extends SessionEntry {
    id: string;
}

export type SessionLookup = 'active' | 'expired' | 'absent';

export interface SessionRegistryOptions {
    ttlMinutes: number;
    maxConcurrentSessions: number;
    /** Current time in ms (default: Date.now; inject for tests) */
    now?: () => number;
}

/**
 * Session Registry (Layer 2 Service)
 *
 * Process-wide table of active sessions with a concurrency cap that is
 * enforced at admission only.
 *
 * Every method is synchronous: a prune plus the read or write that follows it
 * runs to completion on the event loop before any other request is handled,
 * so each call is its own critical section.
 */
export class SessionRegistry {
    private readonly sessions = new Map<string, SessionEntry>();
    private readonly ttlMs: number;
    private readonly now: () => number;

    readonly maxConcurrentSessions: number;

    constructor(options: SessionRegistryOptions) {
        this.ttlMs = options.ttlMinutes * 60 * 1000;
        this.maxConcurrentSessions = options.maxConcurrentSessions;
        this.now = options.now ?? Date.now;
    }

    get ttlMilliseconds(): number {
        return this.ttlMs;
    }

    private isStale(entry: SessionEntry, now: number): boolean {
        return now - entry.lastActiveAt > this.ttlMs;
    }

    private prune(now: number): void {
        for (const [id, entry] of this.sessions) {
            if (this.isStale(entry, now)) {
                this.sessions.delete(id);
                logger.info({
                    kind: 'biz',
                    component: COMPONENT,
                    message: 'Session expired',
                    meta: { session: id.slice(0, 8), idleMs: now - entry.lastActiveAt },
                });
            }
        }
    }

    /**
     * Registers `candidateId` if there is room, or refreshes it if it is
     * already registered (same tab logging in again).
     */
    admit(candidateId: string): boolean {
        const now = this.now();
        this.prune(now);

        const existing = this.sessions.get(candidateId);
        if (existing) {
            existing.lastActiveAt = now;
            return true;
        }

        if (this.sessions.size >= this.maxConcurrentSessions) {
            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Admission refused: session cap reached',
                meta: { active: this.sessions.size, max: this.maxConcurrentSessions },
            });
            return false;
        }

        this.sessions.set(candidateId, { createdAt: now, lastActiveAt: now });
        return true;
    }

    touch(id: string): void {
        const entry = this.sessions.get(id);
        if (entry) {
            entry.lastActiveAt = this.now();
        }
    }

    isActive(id: string): boolean {
        this.prune(this.now());
        return this.sessions.has(id);
    }

    /**
     * Like isActive, but tells an expired session apart from one that was
     * never registered (or was removed). Expired entries are dropped.
     */
    lookup(id: string): SessionLookup {
        const now = this.now();
        const entry = this.sessions.get(id);
        const result: SessionLookup = !entry ? 'absent' : this.isStale(entry, now) ? 'expired' : 'active';
        this.prune(now);
        return result;
    }

    get(id: string): Session | undefined {
        const entry = this.sessions.get(id);
        return entry ? { id, ...entry } : undefined;
    }

    remove(id: string): void {
        this.sessions.delete(id);
    }

    /** Drops every session. Returns how many were removed. */
    resetAll(): number {
        const removed = this.sessions.size;
        this.sessions.clear();
        return removed;
    }

    /** Registered entries, including ones not yet pruned */
    size(): number {
        return this.sessions.size;
    }
}
