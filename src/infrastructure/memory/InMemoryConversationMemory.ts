import type { ConversationMemory, ConversationTurn } from '../../core/ports/ConversationMemory.js';

/**
 * Process-local conversation log. Not persisted; dropped with the process.
 */
export class InMemoryConversationMemory implements ConversationMemory {
    private turns: ConversationTurn[] = [];

    append(turn: ConversationTurn): void {
        this.turns.push({ role: turn.role, content: turn.content });
    }

    history(): ConversationTurn[] {
        return this.turns.map((turn) => ({ ...turn }));
    }

    reset(): void {
        this.turns = [];
    }

    get size(): number {
        return this.turns.length;
    }
}
