/**
 * Per-key mutual exclusion for async work inside one process.
 *
 * Callers for the same key run strictly one after another; different keys
 * never wait on each other. Keys are dropped once their queue drains.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await work();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
