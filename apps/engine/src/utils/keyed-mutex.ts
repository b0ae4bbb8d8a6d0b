/**
 * Per-key promise chain. Work for one key runs strictly in order; work for
 * different keys never waits on each other.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        try {
            await previous;
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }
}
