type Waiter<T> = (value: T) => void;

/**
 * Bounded FIFO with async backpressure: push waits while full, shift waits while empty.
 * After close, push rejects and shift drains what is left, then returns null.
 */
export class EventQueue<T> {
    private readonly capacity: number;
    private readonly items: T[] = [];
    private readonly takers: Array<Waiter<T | null>> = [];
    private readonly pushers: Array<{ item: T; resolve: () => void }> = [];
    private closed = false;

    constructor(capacity: number) {
        if (capacity <= 0) {
            throw new Error("capacity must be greater than 0");
        }
        this.capacity = capacity;
    }

    get size(): number {
        return this.items.length + this.pushers.length;
    }

    push(item: T): Promise<void> {
        if (this.closed) {
            return Promise.reject(new Error("Queue is closed"));
        }
        const taker = this.takers.shift();
        if (taker) {
            taker(item);
            return Promise.resolve();
        }
        if (this.items.length < this.capacity) {
            this.items.push(item);
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.pushers.push({ item, resolve });
        });
    }

    shift(): Promise<T | null> {
        const item = this.take();
        if (item.found) {
            return Promise.resolve(item.value);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise((resolve) => {
            this.takers.push(resolve);
        });
    }

    /**
     * Removes and returns everything still queued, including blocked pushes.
     */
    drainRemaining(): T[] {
        const remaining = [...this.items, ...this.pushers.map((pusher) => pusher.item)];
        this.items.length = 0;
        for (const pusher of this.pushers.splice(0)) {
            pusher.resolve();
        }
        return remaining;
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        for (const taker of this.takers.splice(0)) {
            taker(null);
        }
    }

    private take(): { found: true; value: T } | { found: false } {
        if (this.items.length === 0) {
            const pusher = this.pushers.shift();
            if (!pusher) {
                return { found: false };
            }
            pusher.resolve();
            return { found: true, value: pusher.item };
        }
        const value = this.items.shift();
        const pusher = this.pushers.shift();
        if (pusher) {
            this.items.push(pusher.item);
            pusher.resolve();
        }
        return value === undefined ? { found: false } : { found: true, value };
    }
}
