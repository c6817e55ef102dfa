/**
 * Per-key mutual exclusion within one process.
 *
 * Tenants never contend with each other; callers for the same key run one at
 * a time in arrival order. This only narrows the race window: the store's
 * compare-and-append is what keeps chains linear across processes.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let unlock: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            unlock = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            unlock();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
