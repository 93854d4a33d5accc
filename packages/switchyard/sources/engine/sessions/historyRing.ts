/**
 * Fixed-capacity FIFO buffer; pushing past capacity evicts the oldest item.
 * Expects: capacity >= 0 (zero keeps nothing).
 */
export class HistoryRing<T> {
    private slots: Array<T | undefined>;
    private head = 0;
    private count = 0;

    constructor(capacity: number) {
        this.slots = new Array<T | undefined>(Math.max(0, Math.floor(capacity)));
    }

    get capacity(): number {
        return this.slots.length;
    }

    get length(): number {
        return this.count;
    }

    push(item: T): void {
        if (this.slots.length === 0) {
            return;
        }
        const tail = (this.head + this.count) % this.slots.length;
        this.slots[tail] = item;
        if (this.count < this.slots.length) {
            this.count += 1;
        } else {
            this.head = (this.head + 1) % this.slots.length;
        }
    }

    toArray(): T[] {
        const items: T[] = [];
        for (let index = 0; index < this.count; index += 1) {
            const item = this.slots[(this.head + index) % this.slots.length];
            if (item !== undefined) {
                items.push(item);
            }
        }
        return items;
    }

    /**
     * Changes capacity and keeps the newest items that still fit.
     */
    resize(capacity: number): void {
        const nextCapacity = Math.max(0, Math.floor(capacity));
        if (nextCapacity === this.slots.length) {
            return;
        }
        const kept = this.toArray().slice(Math.max(0, this.count - nextCapacity));
        this.slots = new Array<T | undefined>(nextCapacity);
        this.head = 0;
        this.count = 0;
        for (const item of kept) {
            this.push(item);
        }
    }

    clear(): void {
        this.slots = new Array<T | undefined>(this.slots.length);
        this.head = 0;
        this.count = 0;
    }
}
