import fetch from 'node-fetch';
import type {
    CompletionFailure,
    CompletionRequest,
    CompletionResult,
    ICompletionService,
} from '../../core/ports/CompletionService.js';
import type { ChatMode } from '../../features/chat/domain/ChatMode.js';
import { logger } from '../../platform/logger.js';
import type { AzureOpenAIConfig } from '../../types/config.js';
import { classifyHttpFailure, classifyThrown, readUpstreamError } from './completionErrorClassifier.js';

const COMPONENT = 'AzureOpenAICompletionService';

type ChatCompletionMessage = {
    role: 'system' | 'user' | 'assistant';
    content: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/**
 * Pulls `choices[0].message.content` out of a chat-completions payload.
 */
export function extractReplyText(payload: unknown): string | null {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) return null;
    const first: unknown = payload.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) return null;
    const content = first.message.content;
    return typeof content === 'string' && content.length > 0 ? content : null;
}

export function buildMessages(request: CompletionRequest): ChatCompletionMessage[] {
    return [
        { role: 'system', content: request.systemPrompt },
        ...request.history.map((turn) => ({ role: turn.role, content: turn.content })),
        { role: 'user', content: request.input },
    ];
}

async function readBody(response: { text(): Promise<string> }): Promise<unknown> {
    const text = await response.text();
    try {
        return JSON.parse(text);
    } catch {
        return { raw: text.slice(0, 500) };
    }
}

/**
 * Completion Service adapter for Azure OpenAI chat deployments.
 *
 * One deployment per mode. Every call is bounded by `timeoutMs`; a timeout
 * comes back as a ConnectionError failure, never as a thrown error.
 */
export class AzureOpenAICompletionService implements ICompletionService {
    constructor(private readonly azure: AzureOpenAIConfig) {}

    buildUrl(mode: ChatMode): URL | null {
        const deployment = encodeURIComponent(this.azure.deployments[mode]);
        try {
            const url = new URL(`${this.azure.endpoint}/openai/deployments/${deployment}/chat/completions`);
            url.searchParams.set('api-version', this.azure.apiVersion);
            return url;
        } catch {
            return null;
        }
    }

    async complete(request: CompletionRequest): Promise<CompletionResult> {
        const url = this.buildUrl(request.mode);
        if (!url) {
            return this.fail({ kind: 'ConfigurationError', detail: 'Endpoint is not a valid URL' }, request.mode);
        }

        const body = {
            messages: buildMessages(request),
            temperature: this.azure.temperature,
        };

        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: 'Sending completion request',
            meta: { mode: request.mode, deployment: this.azure.deployments[request.mode], messages: body.messages.length },
        });

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.azure.timeoutMs);
        const startedAt = Date.now();

        try {
            const response = await fetch(url.toString(), {
                method: 'POST',
                headers: {
                    'api-key': this.azure.apiKey,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(body),
                signal: controller.signal,
            });

            if (!response.ok) {
                const errorBody = await readBody(response);
                const upstream = readUpstreamError(errorBody);
                return this.fail(
                    {
                        kind: classifyHttpFailure(response.status, errorBody),
                        status: response.status,
                        detail: `HTTP ${response.status}${upstream.code ? ` ${upstream.code}` : ''}: ${upstream.message ?? 'no message'}`,
                    },
                    request.mode
                );
            }

            const text = extractReplyText(await readBody(response));
            if (text === null) {
                return this.fail(
                    { kind: 'UnknownCompletionError', status: response.status, detail: 'Completion payload has no message content' },
                    request.mode
                );
            }

            logger.debug({
                kind: 'sys',
                component: COMPONENT,
                message: 'Completion received',
                meta: { mode: request.mode, durationMs: Date.now() - startedAt, length: text.length },
            });
            return { ok: true, text };
        } catch (error) {
            const timedOut = controller.signal.aborted;
            return this.fail(
                {
                    kind: classifyThrown(error),
                    detail: timedOut ? `Timed out after ${this.azure.timeoutMs}ms` : 'Request to completion endpoint failed',
                    cause: error,
                },
                request.mode
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private fail(failure: CompletionFailure, mode: ChatMode): CompletionResult {
        logger.warn({
            kind: 'sys',
            component: COMPONENT,
            message: 'Completion request failed',
            error: failure.cause,
            meta: { mode, kind: failure.kind, status: failure.status, detail: failure.detail },
        });
        return { ok: false, failure };
    }
}
