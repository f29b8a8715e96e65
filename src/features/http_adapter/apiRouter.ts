import type { AppContext, AppServices } from '../../bootstrap.js';
import { logger, sysLog } from '../../platform/logger.js';
import { setSessionId } from '../../platform/tracing.js';
import { type AuthErrorKind, authErrorMessage, requiresRelogin } from '../auth/domain/AuthError.js';
import { formatBearerToken } from '../auth/domain/sessionToken.js';
import type { Session } from '../auth/usecases/SessionRegistry.js';
import { type ChatMode, parseChatMode } from '../chat/domain/ChatMode.js';
import { completionErrorMessage, isRetryable } from '../chat/domain/CompletionError.js';
import { extractToken, tokenQueryString } from './requestAuth.js';

const COMPONENT = 'ApiRouter';

/** Largest accepted chat message, in characters */
export const MAX_MESSAGE_LENGTH = 20_000;

export interface ApiRequest {
    method: string;
    path: string;
    query: URLSearchParams;
    authorization?: string;
    body: unknown;
}

export interface ApiResponse {
    status: number;
    body: Record<string, unknown>;
}

type ErrorKind = AuthErrorKind | 'BadRequest' | 'NotFound' | 'ConfigurationError';

const AUTH_STATUS: Record<AuthErrorKind, number> = {
    InvalidCredential: 401,
    CapacityExceeded: 403,
    Expired: 401,
    NotRegistered: 401,
    Unknown: 401,
};

const errorResponse = (status: number, kind: ErrorKind, message: string): ApiResponse => ({
    status,
    body: { error: { kind, message } },
});

const authError = (kind: AuthErrorKind): ApiResponse =>
    errorResponse(AUTH_STATUS[kind], kind, authErrorMessage(kind));

const badRequest = (message: string): ApiResponse => errorResponse(400, 'BadRequest', message);

const ok = (body: Record<string, unknown>): ApiResponse => ({ status: 200, body });

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const readString = (body: unknown, field: string): string | undefined => {
    if (!isRecord(body)) return undefined;
    const value = body[field];
    return typeof value === 'string' ? value : undefined;
};

const readMode = (raw: unknown): ChatMode | ApiResponse => {
    const mode = parseChatMode(raw);
    return mode ?? badRequest("mode must be 'qa' or 'normal'");
};

function authenticate(services: AppServices, request: ApiRequest): Session | ApiResponse {
    const token = extractToken(request.authorization, request.query);
    if (!token) {
        return authError('NotRegistered');
    }
    const result = services.authGate.verify(token);
    if (!result.ok) {
        if (requiresRelogin(result.reason)) {
            logger.info({
                kind: 'sys',
                component: COMPONENT,
                message: 'Session rejected; client must log in again',
                meta: { reason: result.reason, session: token.sessionId.slice(0, 8) },
            });
        }
        return authError(result.reason);
    }
    setSessionId(result.value.id);
    return result.value;
}

const isResponse = (value: unknown): value is ApiResponse =>
    isRecord(value) && typeof value.status === 'number' && isRecord(value.body);

// ============ Handlers ============

function handleLogin(services: AppServices, request: ApiRequest): ApiResponse {
    const password = readString(request.body, 'password');
    if (password === undefined) {
        return badRequest('password is required');
    }
    const result = services.authGate.login(password);
    if (!result.ok) {
        return authError(result.reason);
    }
    const { token, expiresAt } = result.value;
    return ok({
        token: formatBearerToken(token),
        sessionId: token.sessionId,
        signature: token.signature,
        query: tokenQueryString(token),
        expiresAt: new Date(expiresAt).toISOString(),
    });
}

function handleLogout(services: AppServices, request: ApiRequest): ApiResponse {
    const token = extractToken(request.authorization, request.query);
    if (token) {
        services.authGate.logout(token.sessionId);
    }
    return ok({ ok: true });
}

function handleHistory(services: AppServices, request: ApiRequest): ApiResponse {
    const session = authenticate(services, request);
    if (isResponse(session)) return session;

    const mode = readMode(request.query.get('mode'));
    if (isResponse(mode)) return mode;

    const messages = services.chatService.history(mode);
    return ok({ mode, count: messages.length, messages });
}

async function handleChat(services: AppServices, request: ApiRequest): Promise<ApiResponse> {
    const session = authenticate(services, request);
    if (isResponse(session)) return session;

    const mode = readMode(readString(request.body, 'mode'));
    if (isResponse(mode)) return mode;

    const content = readString(request.body, 'content');
    if (content === undefined || content.trim().length === 0) {
        return badRequest('content must be a non-empty string');
    }
    if (content.length > MAX_MESSAGE_LENGTH) {
        return badRequest(`content must be at most ${MAX_MESSAGE_LENGTH} characters`);
    }

    const result = await services.chatService.sendMessage(mode, content);
    if (result.ok) {
        return ok({ role: 'assistant', content: result.reply });
    }
    // Shown inline in place of the assistant reply
    return ok({
        role: 'assistant',
        content: result.error.message,
        error: { kind: result.error.kind, retryable: isRetryable(result.error.kind) },
    });
}

function handleClear(services: AppServices, request: ApiRequest): ApiResponse {
    const session = authenticate(services, request);
    if (isResponse(session)) return session;

    const mode = readMode(readString(request.body, 'mode'));
    if (isResponse(mode)) return mode;

    services.chatService.clear(mode);
    return ok({ ok: true });
}

function handleSessionReset(services: AppServices, request: ApiRequest): ApiResponse {
    const password = readString(request.body, 'password');
    if (password === undefined) {
        return badRequest('password is required');
    }
    const result = services.authGate.resetSessions(password);
    if (!result.ok) {
        return authError(result.reason);
    }
    return ok({ removed: result.value });
}

type Handler = (services: AppServices, request: ApiRequest) => ApiResponse | Promise<ApiResponse>;

const ROUTES: Record<string, Handler> = {
    'POST /api/login': handleLogin,
    'POST /api/logout': handleLogout,
    'GET /api/history': handleHistory,
    'POST /api/chat': handleChat,
    'POST /api/history/clear': handleClear,
    'POST /api/admin/sessions/reset': handleSessionReset,
};

/**
 * Transport-independent API entry point.
 */
export async function handleApiRequest(app: AppContext, request: ApiRequest): Promise<ApiResponse> {
    const routeKey = `${request.method.toUpperCase()} ${request.path}`;

    if (routeKey === 'GET /api/health') {
        return app.status === 'ready'
            ? ok({ status: 'ready' })
            : { status: 503, body: { status: 'not_ready', missing: app.missing } };
    }

    const handler = ROUTES[routeKey];
    if (!handler) {
        return errorResponse(404, 'NotFound', 'Route not found');
    }

    if (app.status !== 'ready') {
        return errorResponse(503, 'ConfigurationError', completionErrorMessage('ConfigurationError'));
    }

    const response = await handler(app.services, request);
    sysLog(COMPONENT, `${routeKey} -> ${response.status}`);
    return response;
}
