/**
 * Fixed-capacity FIFO buffer.
 *
 * Eviction policy: pushing into a full buffer drops the oldest item.
 * Items can also be dropped from the front while a predicate holds,
 * which is how time windows prune themselves.
 */
export class RingBuffer<T> {
    private readonly items: Array<T | undefined>;
    private head = 0;
    private size = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.items = new Array<T | undefined>(capacity);
    }

    get length(): number {
        return this.size;
    }

    /** Returns the evicted item when the buffer was full */
    push(item: T): T | undefined {
        let evicted: T | undefined;
        if (this.size === this.capacity) {
            evicted = this.items[this.head];
            this.items[this.head] = item;
            this.head = (this.head + 1) % this.capacity;
        } else {
            this.items[(this.head + this.size) % this.capacity] = item;
            this.size++;
        }
        return evicted;
    }

    at(index: number): T | undefined {
        if (index < 0 || index >= this.size) return undefined;
        return this.items[(this.head + index) % this.capacity];
    }

    first(): T | undefined {
        return this.at(0);
    }

    last(): T | undefined {
        return this.at(this.size - 1);
    }

    /** Drop items from the oldest end while `predicate` holds; returns how many */
    dropWhile(predicate: (item: T) => boolean): number {
        let dropped = 0;
        while (this.size > 0) {
            const oldest = this.items[this.head];
            if (oldest === undefined || !predicate(oldest)) break;
            this.items[this.head] = undefined;
            this.head = (this.head + 1) % this.capacity;
            this.size--;
            dropped++;
        }
        return dropped;
    }

    clear(): void {
        this.items.fill(undefined);
        this.head = 0;
        this.size = 0;
    }

    toArray(): T[] {
        const out: T[] = [];
        for (const item of this) out.push(item);
        return out;
    }

    *[Symbol.iterator](): IterableIterator<T> {
        for (let i = 0; i < this.size; i++) {
            const item = this.items[(this.head + i) % this.capacity];
            if (item !== undefined) yield item;
        }
    }
}
