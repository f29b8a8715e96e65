import type { ConversationMemory } from '../../../core/ports/ConversationMemory.js';
import { InMemoryConversationMemory } from '../../../infrastructure/memory/InMemoryConversationMemory.js';
import type { RoleInstructions } from '../../../infrastructure/prompts/PromptTemplateLoader.js';
import type { ChatMode } from '../domain/ChatMode.js';

/**
 * Everything a mode owns: its role instructions and its memory.
 */
export interface ModeContext {
    readonly mode: ChatMode;
    readonly instructions: string;
    readonly memory: ConversationMemory;
}

/**
 * Mode Router (Layer 2 Service)
 * Responsibilities:
 * 1. Select the memory and role instructions for a mode
 * 2. Create a mode's context on first use
 * 3. Replace a mode's context with a fresh one on reset
 */
export class ModeRouter {
    private readonly contexts = new Map<ChatMode, ModeContext>();

    constructor(
        private readonly instructions: RoleInstructions,
        private readonly createMemory: () => ConversationMemory = () => new InMemoryConversationMemory()
    ) {}

    route(mode: ChatMode): ModeContext {
        const existing = this.contexts.get(mode);
        if (existing) return existing;

        const context: ModeContext = {
            mode,
            instructions: this.instructions[mode],
            memory: this.createMemory(),
        };
        this.contexts.set(mode, context);
        return context;
    }

    /**
     * Drops the mode's context. A call still holding the old context writes
     * into a memory nobody reads any more.
     */
    reset(mode: ChatMode): void {
        const existing = this.contexts.get(mode);
        if (!existing) return;
        existing.memory.reset();
        this.contexts.delete(mode);
    }

    /** 'empty' until the first append, and again after reset */
    state(mode: ChatMode): 'empty' | 'active' {
        const size = this.contexts.get(mode)?.memory.size ?? 0;
        return size > 0 ? 'active' : 'empty';
    }
}
