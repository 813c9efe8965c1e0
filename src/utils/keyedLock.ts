/**
 * Serializes async work per key. Tasks for the same key run one at a time in
 * call order; tasks for different keys never wait on each other.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(() => task());
        const tail = result.then(() => undefined, () => undefined);
        this.tails.set(key, tail);
        try {
            return await result;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }
}
