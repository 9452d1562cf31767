import type { BpmEstimate } from "../types";

export type WeightedBpmAverageOptions = {
    /** Most recent readings kept. @default 50 */
    capacity?: number;
    /** Square each weight before use, penalising ambiguous reads. @default true */
    squareWeights?: boolean;
};

/**
 * Consumer-side running confidence-weighted average over the latest readings.
 *
 * The estimator emits raw weights; this is where they are squared and combined.
 */
export class WeightedBpmAverage {
    readonly capacity: number;
    readonly squareWeights: boolean;

    private readonly entries: Array<{ bpm: number; weight: number }> = [];

    constructor(options: WeightedBpmAverageOptions = {}) {
        const capacity = options.capacity ?? 50;
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error("@fingerpulse/ppg: WeightedBpmAverage capacity must be a positive integer");
        }
        this.capacity = capacity;
        this.squareWeights = options.squareWeights ?? true;
    }

    get count(): number {
        return this.entries.length;
    }

    add(reading: BpmEstimate): void {
        const weight = this.squareWeights ? reading.weight * reading.weight : reading.weight;
        this.entries.push({ bpm: reading.bpm, weight });
        if (this.entries.length > this.capacity) this.entries.shift();
    }

    /** Weighted mean BPM, or `null` without any weighted evidence. */
    get value(): number | null {
        let num = 0;
        let den = 0;
        for (const e of this.entries) {
            num += e.bpm * e.weight;
            den += e.weight;
        }
        return den > 0 ? num / den : null;
    }

    /** Mean effective weight of the kept readings, in [0, 1]. */
    get reliability(): number {
        if (this.entries.length === 0) return 0;
        let sum = 0;
        for (const e of this.entries) sum += e.weight;
        return sum / this.entries.length;
    }

    clear(): void {
        this.entries.length = 0;
    }
}
