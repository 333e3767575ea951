import pLimit from "p-limit";

/**
 * Serialises async work per key. Work for different keys runs concurrently.
 */
export class KeyedLock {
    private readonly queues = new Map<string, { limit: ReturnType<typeof pLimit>; pending: number }>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        let queue = this.queues.get(key);
        if (!queue) {
            queue = { limit: pLimit(1), pending: 0 };
            this.queues.set(key, queue);
        }

        const entry = queue;
        entry.pending += 1;
        try {
            return await entry.limit(task);
        } finally {
            entry.pending -= 1;
            if (entry.pending === 0) {
                this.queues.delete(key);
            }
        }
    }

    get activeKeys(): number {
        return this.queues.size;
    }
}
