import type { ConversationTurn } from './ConversationMemory.js';
import type { ChatMode } from '../../features/chat/domain/ChatMode.js';
import type { CompletionErrorKind } from '../../features/chat/domain/CompletionError.js';

export interface CompletionRequest {
    mode: ChatMode;
    /** Role instructions for the mode */
    systemPrompt: string;
    /** Prior turns, without the new input */
    history: ConversationTurn[];
    input: string;
}

/**
 * Operator-facing detail of a failed call. Never shown to end users.
 */
export interface CompletionFailure {
    kind: CompletionErrorKind;
    detail: string;
    status?: number;
    cause?: unknown;
}

export type CompletionResult =
    | { ok: true; text: string }
    | { ok: false; failure: CompletionFailure };

/**
 * Port: 外部补全服务
 * Implementations classify their own failures; they never throw for an upstream error.
 */
export interface ICompletionService {
    complete(request: CompletionRequest): Promise<CompletionResult>;
}
