// ModeLock: per-mode lock so at most one completion call is in flight per mode

export class ModeLock<K extends string = string> {
    private locks = new Map<K, Promise<void>>();

    /**
     * Acquire the lock for a key. Returns a release function.
     * Callers queue in arrival order while the lock is held.
     */
    async acquire(key: K): Promise<() => void> {
        const previous = this.locks.get(key) ?? Promise.resolve();

        let release!: () => void;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.locks.set(key, tail);

        await previous;

        let released = false;
        return () => {
            if (released) return;
            released = true;
            // Only the last caller in the queue clears the entry
            if (this.locks.get(key) === tail) {
                this.locks.delete(key);
            }
            release();
        };
    }

    /** Check if a key is held or has callers queued on it. */
    isLocked(key: K): boolean {
        return this.locks.has(key);
    }
}
