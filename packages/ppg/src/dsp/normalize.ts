import { clamp, minMax } from "../util/stats";

/** Output range of the normaliser is [0, NORMALIZED_SCALE]. */
export const NORMALIZED_SCALE = 10;

/**
 * Window rescaler with periodic recalibration.
 *
 * Each call maps the window onto [0, 10] using its absolute min/max. Once per full
 * window turnover (every `windowLength`-th call) the unit-scaled values are also
 * clamped to the averaged per-block extrema, so one outlier sample cannot dominate
 * the scale for the whole cycle.
 */
export class Normalizer {
    private invocations = 0;

    constructor(
        readonly windowLength: number,
        readonly blockSize = 10
    ) {
        if (!Number.isInteger(windowLength) || windowLength <= 0) {
            throw new Error("@fingerpulse/ppg: Normalizer windowLength must be a positive integer");
        }
        if (!Number.isInteger(blockSize) || blockSize <= 0) {
            throw new Error("@fingerpulse/ppg: Normalizer blockSize must be a positive integer");
        }
    }

    /** True when the next `normalize()` call will recalibrate. */
    get recalibratesNext(): boolean {
        return (this.invocations + 1) % this.windowLength === 0;
    }

    normalize(values: Float32Array): Float32Array {
        const recalibrate = this.recalibratesNext;
        this.invocations = (this.invocations + 1) % this.windowLength;

        const n = values.length;
        const out = new Float32Array(n);
        const { min, max } = minMax(values);
        // Flat (or empty) window: all zeros.
        if (n === 0 || max === min) return out;

        const range = max - min;
        for (let i = 0; i < n; i++) out[i] = ((values[i] ?? 0) - min) / range;

        if (recalibrate) {
            const bounds = averagedBlockExtrema(out, this.blockSize);
            for (let i = 0; i < n; i++) out[i] = clamp(out[i] ?? 0, bounds.min, bounds.max);
        }

        for (let i = 0; i < n; i++) out[i] = (out[i] ?? 0) * NORMALIZED_SCALE;
        return out;
    }

    reset(): void {
        this.invocations = 0;
    }
}

/**
 * Mean of per-block minima and maxima. The trailing block may be shorter than
 * `blockSize`.
 */
export function averagedBlockExtrema(values: Float32Array, blockSize: number): { min: number; max: number } {
    let minSum = 0;
    let maxSum = 0;
    let blocks = 0;
    for (let start = 0; start < values.length; start += blockSize) {
        const block = minMax(values.subarray(start, Math.min(values.length, start + blockSize)));
        minSum += block.min;
        maxSum += block.max;
        blocks++;
    }
    if (blocks === 0) return { min: 0, max: 0 };
    return { min: minSum / blocks, max: maxSum / blocks };
}
