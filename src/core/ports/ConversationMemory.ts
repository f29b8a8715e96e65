export type TurnRole = 'user' | 'assistant';

export type ConversationTurn = {
    role: TurnRole;
    content: string;
};

/**
 * Ordered, append-only log of turns for one mode.
 * Insertion order is the chronological order replayed to the model.
 */
export interface ConversationMemory {
    append(turn: ConversationTurn): void;
    /** Snapshot copy; callers may not mutate the stored log through it */
    history(): ConversationTurn[];
    /** Truncates to empty */
    reset(): void;
    readonly size: number;
}
