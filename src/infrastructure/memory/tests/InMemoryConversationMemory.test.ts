import { describe, it, expect } from 'vitest';
import { InMemoryConversationMemory } from '../InMemoryConversationMemory.js';

describe('InMemoryConversationMemory', () => {
    it('keeps turns in append order', () => {
        const memory = new InMemoryConversationMemory();
        memory.append({ role: 'user', content: 'a' });
        memory.append({ role: 'assistant', content: 'b' });

        expect(memory.history()).toEqual([
            { role: 'user', content: 'a' },
            { role: 'assistant', content: 'b' },
        ]);
        expect(memory.size).toBe(2);
    });

    it('stores a copy of the appended turn', () => {
        const memory = new InMemoryConversationMemory();
        const turn = { role: 'user' as const, content: 'original' };
        memory.append(turn);
        turn.content = 'changed';

        expect(memory.history()).toEqual([{ role: 'user', content: 'original' }]);
    });

    it('hands out snapshots', () => {
        const memory = new InMemoryConversationMemory();
        memory.append({ role: 'user', content: 'a' });

        const snapshot = memory.history();
        snapshot.push({ role: 'assistant', content: 'injected' });

        expect(memory.size).toBe(1);
    });

    it('reset empties the log', () => {
        const memory = new InMemoryConversationMemory();
        memory.append({ role: 'user', content: 'a' });
        memory.reset();

        expect(memory.history()).toEqual([]);
        expect(memory.size).toBe(0);
    });
});
