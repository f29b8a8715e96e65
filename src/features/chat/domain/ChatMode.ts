/**
 * Layer A: Domain Rules - 对话模式
 * 纯业务规则，不涉及 IO
 */

export enum ChatMode {
    QA = 'qa',         // 缺陷报告助手
    NORMAL = 'normal', // 通用聊天
}

export const CHAT_MODES: readonly ChatMode[] = [ChatMode.QA, ChatMode.NORMAL];

/**
 * 规则：解析外部传入的模式字符串
 * Unknown values are rejected (null) rather than defaulted, so a typo never
 * writes into the wrong mode's history.
 */
export function parseChatMode(raw: unknown): ChatMode | null {
    if (typeof raw !== 'string') return null;
    const normalized = raw.toLowerCase().trim();
    return CHAT_MODES.find((mode) => mode === normalized) ?? null;
}

/** Display label of the assistant speaking in each mode */
export const ASSISTANT_LABEL: Record<ChatMode, string> = {
    [ChatMode.QA]: 'QA Assistant',
    [ChatMode.NORMAL]: 'AI Assistant',
};
