/**
 * Ordered, closable broadcast queue for the events of one pipeline run.
 *
 * The producer publishes and finally closes. Every consumer, whether it subscribes with a
 * listener or iterates with `for await`, receives the full history in publish order and then
 * the live tail, so attaching late never loses events. Iteration ends when the channel closes.
 */
export type ChannelListener<T> = (item: T) => void;

export class ProgressChannel<T> implements AsyncIterable<T> {
    private readonly history: T[] = [];
    private readonly listeners: Set<ChannelListener<T>> = new Set();
    private readonly wakeups: Set<() => void> = new Set();
    private closed = false;

    publish(item: T): void {
        if (this.closed) {
            throw new Error('Cannot publish to a closed progress channel');
        }
        this.history.push(item);

        for (const listener of this.listeners) {
            this.deliver(listener, item);
        }
        this.wake();
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.listeners.clear();
        this.wake();
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Replays history to the listener, then forwards live items until the channel closes.
     * Returns an unsubscribe function.
     */
    subscribe(listener: ChannelListener<T>): () => void {
        for (const item of this.history) {
            this.deliver(listener, item);
        }
        if (!this.closed) {
            this.listeners.add(listener);
        }
        return () => {
            this.listeners.delete(listener);
        };
    }

    snapshot(): T[] {
        return [...this.history];
    }

    /**
     * Resolves with every item once the channel closes.
     */
    async collect(): Promise<T[]> {
        const items: T[] = [];
        for await (const item of this) {
            items.push(item);
        }
        return items;
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        let index = 0;
        let stopped = false;

        const next = (): Promise<IteratorResult<T>> => {
            if (!stopped && index < this.history.length) {
                return Promise.resolve({ value: this.history[index++], done: false });
            }
            if (stopped || this.closed) {
                return Promise.resolve({ value: undefined, done: true });
            }
            return new Promise<void>(resolve => this.wakeups.add(resolve)).then(next);
        };

        return {
            next,
            return: async (): Promise<IteratorResult<T>> => {
                stopped = true;
                return { value: undefined, done: true };
            },
        };
    }

    private wake(): void {
        const pending = Array.from(this.wakeups);
        this.wakeups.clear();
        pending.forEach(resolve => resolve());
    }

    private deliver(listener: ChannelListener<T>, item: T): void {
        try {
            listener(item);
        } catch (error) {
            console.error('[ProgressChannel] Listener threw, continuing delivery:', error);
        }
    }
}
