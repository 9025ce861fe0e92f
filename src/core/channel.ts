import { ResourceError } from './errors';

type Taker<T> = (result: IteratorResult<T>) => void;

/**
 * Single-consumer async queue. Producers either `push` (non-blocking, false
 * when full or closed) or `send` (waits for room up to a deadline). The
 * consumer reads with `take` or `for await`.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
    private items: T[] = [];
    private takers: Taker<T>[] = [];
    private spaceWaiters: Array<() => void> = [];
    private closed = false;

    constructor(private capacity: number = Number.POSITIVE_INFINITY) { }

    public get size(): number {
        return this.items.length;
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public push(item: T): boolean {
        if (this.closed) return false;

        const taker = this.takers.shift();
        if (taker) {
            taker({ done: false, value: item });
            return true;
        }

        if (this.items.length >= this.capacity) return false;
        this.items.push(item);
        return true;
    }

    public async send(item: T, timeoutMs: number): Promise<void> {
        const deadline = Date.now() + timeoutMs;
        while (!this.push(item)) {
            if (this.closed) throw new ResourceError('Queue is closed');
            const remaining = deadline - Date.now();
            if (remaining <= 0) throw new ResourceError(`Queue still full after ${timeoutMs} ms`);
            await this.waitForSpace(remaining, timeoutMs);
        }
    }

    public take(): Promise<IteratorResult<T>> {
        if (this.items.length > 0) {
            const value = this.items[0];
            this.items.shift();
            this.spaceWaiters.shift()?.();
            return Promise.resolve({ done: false, value });
        }
        if (this.closed) return Promise.resolve({ done: true, value: undefined });
        return new Promise((resolve) => this.takers.push(resolve));
    }

    /** Stops accepting items. Buffered items are still handed to the consumer. */
    public close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const taker of this.takers.splice(0)) taker({ done: true, value: undefined });
        for (const waiter of this.spaceWaiters.splice(0)) waiter();
    }

    /** Removes and returns everything still buffered. */
    public drain(): T[] {
        const drained = this.items;
        this.items = [];
        for (const waiter of this.spaceWaiters.splice(0)) waiter();
        return drained;
    }

    public [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.take(),
            return: async () => {
                this.close();
                return { done: true, value: undefined };
            },
        };
    }

    private waitForSpace(remainingMs: number, timeoutMs: number): Promise<void> {
        return new Promise((resolve, reject) => {
            const waiter = () => {
                clearTimeout(timer);
                resolve();
            };
            const timer = setTimeout(() => {
                this.spaceWaiters = this.spaceWaiters.filter((w) => w !== waiter);
                reject(new ResourceError(`Queue still full after ${timeoutMs} ms`));
            }, remainingMs);
            this.spaceWaiters.push(waiter);
        });
    }
}
