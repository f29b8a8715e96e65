import { describe, it, expect } from 'vitest';
import { ModeLock } from '../ModeLock.js';

describe('ModeLock', () => {
    it('serializes holders of the same key in arrival order', async () => {
        const lock = new ModeLock<'qa' | 'normal'>();
        const order: string[] = [];

        const releaseFirst = await lock.acquire('qa');
        const second = lock.acquire('qa').then((release) => {
            order.push('second');
            release();
        });
        const third = lock.acquire('qa').then((release) => {
            order.push('third');
            release();
        });

        await new Promise((resolve) => setTimeout(resolve, 0));
        expect(order).toEqual([]);

        order.push('first');
        releaseFirst();
        await Promise.all([second, third]);

        expect(order).toEqual(['first', 'second', 'third']);
        expect(lock.isLocked('qa')).toBe(false);
    });

    it('does not block other keys', async () => {
        const lock = new ModeLock<'qa' | 'normal'>();
        const releaseQa = await lock.acquire('qa');
        const releaseNormal = await lock.acquire('normal');

        expect(lock.isLocked('qa')).toBe(true);
        expect(lock.isLocked('normal')).toBe(true);

        releaseNormal();
        expect(lock.isLocked('normal')).toBe(false);
        expect(lock.isLocked('qa')).toBe(true);
        releaseQa();
    });

    it('ignores a second release', async () => {
        const lock = new ModeLock();
        const release = await lock.acquire('k');
        release();
        release();

        const again = await lock.acquire('k');
        expect(lock.isLocked('k')).toBe(true);
        again();
        expect(lock.isLocked('k')).toBe(false);
    });
});
