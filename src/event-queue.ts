/**
 * One-directional, bounded event channel. The producer never waits: once
 * `maxSize` events are pending, the oldest is dropped to make room.
 */
export class EventQueue<T> {
    private items: T[];
    private maxSize: number;
    private dropped: number;

    constructor(maxSize: number) {
        if (!Number.isInteger(maxSize) || maxSize < 1) {
            throw new RangeError(`Queue size must be a positive integer, got ${maxSize}`);
        }
        this.items = [];
        this.maxSize = maxSize;
        this.dropped = 0;
    }

    get size(): number {
        return this.items.length;
    }

    /** Events discarded because the consumer fell behind. */
    get droppedCount(): number {
        return this.dropped;
    }

    push(item: T): void {
        this.items.push(item);
        if (this.items.length > this.maxSize) {
            this.items.shift();
            this.dropped++;
        }
    }

    /**
     * Take every pending event, oldest first
     */
    drain(): T[] {
        const out = this.items;
        this.items = [];
        return out;
    }
}
