import { AbortError, FetchError } from 'node-fetch';
import type { CompletionErrorKind } from '../../features/chat/domain/CompletionError.js';

/**
 * Maps upstream failures onto the completion error taxonomy.
 * Classification uses HTTP status, the upstream error code and error types;
 * human-readable messages are never inspected.
 */

const MODEL_UNAVAILABLE_CODES = new Set([
    'DeploymentNotFound',
    'model_not_found',
    'ModelNotFound',
    'OperationNotSupported',
]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/**
 * Reads `error.code` / `error.message` from an OpenAI-style error body.
 */
export function readUpstreamError(body: unknown): { code?: string; message?: string } {
    if (!isRecord(body) || !isRecord(body.error)) return {};
    const { code, message } = body.error;
    return {
        code: typeof code === 'string' ? code : undefined,
        message: typeof message === 'string' ? message : undefined,
    };
}

export function classifyHttpFailure(status: number, body: unknown): CompletionErrorKind {
    const { code } = readUpstreamError(body);

    if (code && MODEL_UNAVAILABLE_CODES.has(code)) return 'ModelUnavailable';
    if (status === 401 || status === 403) return 'AuthenticationError';
    if (status === 404) return 'ConfigurationError';
    if (status === 429) return 'RateLimited';
    if (status === 408 || status === 502 || status === 503 || status === 504) return 'ConnectionError';
    return 'UnknownCompletionError';
}

/**
 * Errors thrown by the HTTP client itself (timeouts, DNS, refused sockets).
 */
export function classifyThrown(error: unknown): CompletionErrorKind {
    if (error instanceof AbortError) return 'ConnectionError';
    // 'system' covers DNS failures, refused and reset sockets
    if (error instanceof FetchError && (error.type === 'system' || error.type === 'body-timeout')) {
        return 'ConnectionError';
    }
    return 'UnknownCompletionError';
}
