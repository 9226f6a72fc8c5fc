/**
 * Runs tasks one at a time per key, in the order they were queued.
 * Tasks under different keys run concurrently.
 */
export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail = result.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);
        void tail.then(() => {
            if (this.tails.get(key) === tail) this.tails.delete(key);
        });
        return result;
    }

    /** Keys with queued or running tasks. */
    get pending(): number {
        return this.tails.size;
    }
}
