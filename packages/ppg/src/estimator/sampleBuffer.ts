import type { Sample } from "../types";

/**
 * Fixed-capacity FIFO window of samples, stored as a ring.
 *
 * Single writer, single reader: owned by one estimator for one session.
 */
export class SampleBuffer {
    readonly capacity: number;

    private readonly slots: Array<Sample | undefined>;
    private head = 0; // index of the oldest sample
    private count = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error("@fingerpulse/ppg: SampleBuffer capacity must be a positive integer");
        }
        this.capacity = capacity;
        this.slots = new Array<Sample | undefined>(capacity).fill(undefined);
    }

    get size(): number {
        return this.count;
    }

    get isFull(): boolean {
        return this.count === this.capacity;
    }

    push(sample: Sample): void {
        const frozen = Object.freeze({ timestamp: sample.timestamp, value: sample.value });
        if (this.count < this.capacity) {
            this.slots[(this.head + this.count) % this.capacity] = frozen;
            this.count++;
            return;
        }
        // Full: overwrite the oldest and advance.
        this.slots[this.head] = frozen;
        this.head = (this.head + 1) % this.capacity;
    }

    /** Ordered copy, oldest first. */
    snapshot(): Sample[] {
        const out: Sample[] = [];
        for (let i = 0; i < this.count; i++) {
            const s = this.slots[(this.head + i) % this.capacity];
            if (s) out.push(s);
        }
        return out;
    }

    clear(): void {
        this.slots.fill(undefined);
        this.head = 0;
        this.count = 0;
    }
}
