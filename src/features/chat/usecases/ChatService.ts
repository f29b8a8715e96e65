import type { ConversationTurn } from '../../../core/ports/ConversationMemory.js';
import type { ICompletionService } from '../../../core/ports/CompletionService.js';
import { bizLog, logger } from '../../../platform/logger.js';
import { type CompletionErrorKind, completionErrorMessage } from '../domain/CompletionError.js';
import type { ChatMode } from '../domain/ChatMode.js';
import { ModeLock } from '../rules/ModeLock.js';
import type { ModeRouter } from './ModeRouter.js';

const COMPONENT = 'ChatService';

export type SendMessageResult =
    | { ok: true; reply: string }
    | { ok: false; error: { kind: CompletionErrorKind; message: string } };

/**
 * Layer 2 Usecase: 处理用户消息
 * 职责：
 * 1. 通过 ModeRouter 选择模式的记忆与角色指令
 * 2. 调用补全服务
 * 3. 更新历史记录 (user + assistant)
 *
 * Calls for the same mode are queued so at most one completion is in flight
 * per mode; different modes run independently.
 */
export class ChatService {
    private readonly modeLock = new ModeLock<ChatMode>();

    constructor(
        private readonly router: ModeRouter,
        private readonly completionService: ICompletionService
    ) {}

    async sendMessage(mode: ChatMode, userText: string): Promise<SendMessageResult> {
        const release = await this.modeLock.acquire(mode);
        try {
            return await this._sendLocked(mode, userText);
        } finally {
            release();
        }
    }

    private async _sendLocked(mode: ChatMode, userText: string): Promise<SendMessageResult> {
        const context = this.router.route(mode);
        const prior = context.memory.history();

        context.memory.append({ role: 'user', content: userText });

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Processing chat request',
            meta: { mode, historyLength: prior.length, inputLength: userText.length },
        });

        const result = await this.completionService.complete({
            mode,
            systemPrompt: context.instructions,
            history: prior,
            input: userText,
        });

        if (result.ok) {
            context.memory.append({ role: 'assistant', content: result.text });
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Chat reply stored',
                meta: { mode, replyLength: result.text.length, historyLength: context.memory.size },
            });
            return { ok: true, reply: result.text };
        }

        const { failure } = result;
        // Cause and detail are already in the adapter's sys log
        logger.warn({
            kind: 'biz',
            component: COMPONENT,
            message: 'Completion failed; fallback reply stored',
            meta: { mode, kind: failure.kind },
        });

        // The user-safe message is remembered as the assistant's turn, so it is
        // replayed to the model until the mode is cleared.
        const message = completionErrorMessage(failure.kind);
        context.memory.append({ role: 'assistant', content: message });
        return { ok: false, error: { kind: failure.kind, message } };
    }

    history(mode: ChatMode): ConversationTurn[] {
        return this.router.route(mode).memory.history();
    }

    historySize(mode: ChatMode): number {
        return this.router.route(mode).memory.size;
    }

    clear(mode: ChatMode): void {
        const previous = this.router.state(mode);
        this.router.reset(mode);
        bizLog(COMPONENT, 'Chat history cleared', { mode, previous });
    }

    /** True while a completion for the mode is running or queued */
    isBusy(mode: ChatMode): boolean {
        return this.modeLock.isLocked(mode);
    }
}
