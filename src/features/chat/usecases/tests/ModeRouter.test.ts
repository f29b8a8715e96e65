import { describe, it, expect } from 'vitest';
import { ChatMode } from '../../domain/ChatMode.js';
import { ModeRouter } from '../ModeRouter.js';

const instructions = {
    [ChatMode.QA]: 'write defect reports',
    [ChatMode.NORMAL]: 'be helpful',
};

describe('ModeRouter', () => {
    it('pairs each mode with its own instructions', () => {
        const router = new ModeRouter(instructions);

        expect(router.route(ChatMode.QA).instructions).toBe('write defect reports');
        expect(router.route(ChatMode.NORMAL).instructions).toBe('be helpful');
    });

    it('returns the same context until reset', () => {
        const router = new ModeRouter(instructions);
        const first = router.route(ChatMode.QA);

        expect(router.route(ChatMode.QA)).toBe(first);
        expect(router.route(ChatMode.NORMAL)).not.toBe(first);

        router.reset(ChatMode.QA);
        expect(router.route(ChatMode.QA)).not.toBe(first);
    });

    it('tracks the empty and active states', () => {
        const router = new ModeRouter(instructions);
        expect(router.state(ChatMode.QA)).toBe('empty');

        router.route(ChatMode.QA);
        expect(router.state(ChatMode.QA)).toBe('empty');

        router.route(ChatMode.QA).memory.append({ role: 'user', content: 'hi' });
        expect(router.state(ChatMode.QA)).toBe('active');
        expect(router.state(ChatMode.NORMAL)).toBe('empty');

        router.reset(ChatMode.QA);
        expect(router.state(ChatMode.QA)).toBe('empty');
    });

    it('empties the dropped memory on reset', () => {
        const router = new ModeRouter(instructions);
        const old = router.route(ChatMode.NORMAL).memory;
        old.append({ role: 'user', content: 'hi' });

        router.reset(ChatMode.NORMAL);

        expect(old.size).toBe(0);
    });

    it('resetting an unused mode is a no-op', () => {
        const router = new ModeRouter(instructions);
        expect(() => router.reset(ChatMode.QA)).not.toThrow();
        expect(router.state(ChatMode.QA)).toBe('empty');
    });

    it('builds memories through the injected factory', () => {
        let created = 0;
        const router = new ModeRouter(instructions, () => {
            created += 1;
            return {
                append: () => undefined,
                history: () => [],
                reset: () => undefined,
                size: 0,
            };
        });

        router.route(ChatMode.QA);
        router.route(ChatMode.QA);
        router.route(ChatMode.NORMAL);

        expect(created).toBe(2);
    });
});
