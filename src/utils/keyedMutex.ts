/**
 * src/utils/keyedMutex.ts
 *
 * Per-key single-writer gate. Tasks for the same key run one after another
 * in submission order; tasks for different keys never wait on each other.
 *
 * Each key holds the tail of a promise chain. A new task chains onto the
 * tail and becomes the new tail; when the last task for a key settles the
 * key is dropped, so idle keys cost nothing.
 */

export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
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

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get activeKeys(): number {
        return this.tails.size;
    }
}
