import type { EstimatorConfig } from "../config";
import type { FrequencyEstimate, FrequencyStrategy, SpectrumBin } from "../types";
import { clamp, mean, meanStd, minMax } from "../util/stats";
import { findLocalPeaks, scoreConfidence } from "./confidence";
import { realMagnitudes, trimEdges } from "./spectrum";

const MS_PER_MINUTE = 60000;

/**
 * Dominant-oscillation estimator over one conditioned window.
 *
 * `times` are epoch milliseconds aligned 1:1 with `values`. Returns `null` when
 * the window carries no usable estimate; that is a normal, per-cycle outcome.
 */
export interface FrequencyAnalyzer {
    readonly kind: FrequencyStrategy;
    analyze(times: Float64Array, values: Float32Array): FrequencyEstimate | null;
}

export type AnalyzerOptions = {
    /** Samples dropped from each edge before the transform. */
    edgeCutoff?: number;
};

// ----------------------------
// Spectral strategy
// ----------------------------

export class SpectralAnalyzer implements FrequencyAnalyzer {
    readonly kind = "spectral" as const;
    private readonly edgeCutoff: number;

    constructor(options: AnalyzerOptions = {}) {
        this.edgeCutoff = options.edgeCutoff ?? 0;
    }

    analyze(times: Float64Array, values: Float32Array): FrequencyEstimate | null {
        const trimmed = trimEdges(times, values, this.edgeCutoff);
        const length = trimmed.values.length;

        const mags = realMagnitudes(trimmed.values);
        // Fewer bins than a real DFT of this length yields: no reliable estimate.
        if (mags.length < 2 || mags.length < (length >>> 1) + 1) return null;

        const dominantBin = dominantBinIndex(mags);
        const peaks = findLocalPeaks(mags);
        if (peaks.length === 0 || !((mags[dominantBin] ?? 0) > 0)) return null;

        const durationMs = (trimmed.times[length - 1] ?? 0) - (trimmed.times[0] ?? 0);
        if (!(durationMs > 0)) return null;

        const periodMs = durationMs / dominantBin;
        const hzPerBin = 1000 / durationMs;

        const spectrum: SpectrumBin[] = [];
        for (let k = 0; k < mags.length; k++) {
            spectrum.push({ bin: k, frequencyHz: k * hzPerBin, magnitude: mags[k] ?? 0 });
        }

        return {
            strategy: this.kind,
            frequencyHz: 1000 / periodMs,
            bpm: MS_PER_MINUTE / periodMs,
            weight: scoreConfidence(mags, dominantBin, peaks),
            spectrum
        };
    }
}

/** Index of the largest magnitude in `[1, end)`; DC is never chosen. Ties keep the lowest bin. */
export function dominantBinIndex(magnitudes: Float32Array): number {
    let best = 1;
    let bestV = -Infinity;
    for (let k = 1; k < magnitudes.length; k++) {
        const v = magnitudes[k] ?? 0;
        if (v > bestV) {
            bestV = v;
            best = k;
        }
    }
    return best;
}

// ----------------------------
// Threshold-crossing strategy
// ----------------------------

export class ThresholdCrossingAnalyzer implements FrequencyAnalyzer {
    readonly kind = "thresholdCrossing" as const;
    private readonly edgeCutoff: number;

    constructor(options: AnalyzerOptions = {}) {
        this.edgeCutoff = options.edgeCutoff ?? 0;
    }

    analyze(times: Float64Array, values: Float32Array): FrequencyEstimate | null {
        const trimmed = trimEdges(times, values, this.edgeCutoff);
        const edges = risingEdges(trimmed.times, trimmed.values);

        const intervals: number[] = [];
        let bpmSum = 0;
        for (let i = 1; i < edges.length; i++) {
            const dt = (edges[i] ?? 0) - (edges[i - 1] ?? 0);
            if (!(dt > 0)) continue;
            intervals.push(dt);
            bpmSum += MS_PER_MINUTE / dt;
        }
        if (intervals.length === 0) return null;

        const bpm = bpmSum / intervals.length;
        const spread = meanStd(intervals);

        return {
            strategy: this.kind,
            frequencyHz: bpm / 60,
            bpm,
            // Regularity of the beat-to-beat intervals.
            weight: clamp(1 - spread.std / spread.mean, 0, 1)
        };
    }
}

/**
 * Timestamps where the series rises from below to at/above `(mean + max) / 2`.
 */
export function risingEdges(times: Float64Array, values: Float32Array): number[] {
    if (times.length !== values.length) {
        throw new Error("@fingerpulse/ppg: risingEdges times/values length mismatch");
    }
    const n = values.length;
    if (n < 2) return [];

    const threshold = (mean(values) + minMax(values).max) / 2;

    const edges: number[] = [];
    for (let i = 1; i < n; i++) {
        if ((values[i - 1] ?? 0) < threshold && (values[i] ?? 0) >= threshold) {
            edges.push(times[i] ?? 0);
        }
    }
    return edges;
}

export function createFrequencyAnalyzer(config: Pick<EstimatorConfig, "strategy" | "edgeCutoff">): FrequencyAnalyzer {
    switch (config.strategy) {
        case "spectral":
            return new SpectralAnalyzer({ edgeCutoff: config.edgeCutoff });
        case "thresholdCrossing":
            return new ThresholdCrossingAnalyzer({ edgeCutoff: config.edgeCutoff });
    }
}
