/**
 * Tracing Module - AsyncLocalStorage 封装
 *
 * 职责：
 * 1. 管理请求级别的上下文 (Trace ID, Session ID)
 * 2. 让并发请求的日志可以按 traceId 串联
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

export interface TraceContext {
    /** 唯一追踪 ID，用于串联一次请求的所有日志 */
    traceId: string;
    /** 已认证请求的 session id */
    sessionId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * 12 位短 ID，足够区分并发请求
 */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * 在追踪上下文中运行异步函数
 *
 * @example
 * await runWithTraceId(generateTraceId(), async () => {
 *     logger.info({ kind: 'sys', component: 'Http', message: 'Hello' }); // 自动带上 traceId
 * });
 */
export async function runWithTraceId<T>(traceId: string, fn: () => Promise<T>): Promise<T> {
    const context: TraceContext = { traceId };
    return asyncLocalStorage.run(context, fn);
}

export function getTraceId(): string | undefined {
    return asyncLocalStorage.getStore()?.traceId;
}

export function getSessionId(): string | undefined {
    return asyncLocalStorage.getStore()?.sessionId;
}

/**
 * 设置当前上下文的 Session ID
 * 必须在 runWithTraceId 内部调用
 */
export function setSessionId(sessionId: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
        store.sessionId = sessionId;
    }
}
