/**
 * Coin Migration Engine — Keyed Mutex
 *
 * Serializes async sections per key (one key per migration instance).
 * Sections on different keys run concurrently; sections on the same key
 * run strictly in arrival order, and a failing section releases the key.
 */

export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** Whether any section for `key` is running or queued. */
    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
