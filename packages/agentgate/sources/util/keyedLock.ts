/**
 * Serializes async work per key; work under different keys runs concurrently.
 * Expects: callers never re-enter the same key from inside a locked callback.
 */
export class KeyedLock<K> {
    private tails = new Map<K, Promise<void>>();

    async inLock<T>(key: K, func: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await func();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: K): boolean {
        return this.tails.has(key);
    }
}
