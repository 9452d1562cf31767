import { resolveEstimatorConfig, type EstimatorConfig, type EstimatorConfigInput } from "../config";
import { detrendCascade } from "../dsp/detrend";
import { createFrequencyAnalyzer, type FrequencyAnalyzer } from "../dsp/frequency";
import { Normalizer } from "../dsp/normalize";
import { emaRatio, smoothEma } from "../dsp/smooth";
import type { CycleResult, RunningBpmState, Sample } from "../types";
import { SampleBuffer } from "./sampleBuffer";

/**
 * Value-only conditioning of one window: normalise, detrend at each spread, then
 * EMA-smooth. Output is aligned 1:1 with the input.
 */
export function conditionWindow(
    values: Float32Array,
    normalizer: Normalizer,
    config: Pick<EstimatorConfig, "detrendSpreads" | "emaRatioConstant">
): Float32Array {
    const normalized = normalizer.normalize(values);
    const detrended = detrendCascade(normalized, config.detrendSpreads);
    return smoothEma(detrended, emaRatio(config.emaRatioConstant, values.length));
}

/**
 * One-step exponential update `(1 - alpha) * previous + alpha * raw`.
 * A session without a previous value starts at `raw`.
 */
export function smoothBpm(previous: number | null, raw: number, alpha: number): number {
    if (previous === null) return raw;
    return (1 - alpha) * previous + alpha * raw;
}

/**
 * Per-sample pipeline orchestration for one measurement session.
 *
 * Each `process()` call pushes the sample and, once the window is full, reruns the
 * whole pipeline on a snapshot of the buffer. Nothing but the raw window and the
 * running BPM carries over between calls.
 */
export class BpmEstimator {
    readonly config: EstimatorConfig;

    private readonly buffer: SampleBuffer;
    private readonly normalizer: Normalizer;
    private readonly analyzer: FrequencyAnalyzer;
    private readonly state: RunningBpmState = { smoothedBpm: null };

    constructor(config: EstimatorConfigInput = {}) {
        this.config = resolveEstimatorConfig(config);
        this.buffer = new SampleBuffer(this.config.windowLength);
        this.normalizer = new Normalizer(this.config.windowLength, this.config.normalizerBlockSize);
        this.analyzer = createFrequencyAnalyzer(this.config);
    }

    get smoothedBpm(): number | null {
        return this.state.smoothedBpm;
    }

    /** Samples currently held (saturates at `windowLength`). */
    get collected(): number {
        return this.buffer.size;
    }

    process(sample: Sample): CycleResult {
        this.buffer.push(sample);
        // No estimate until a full window of real samples exists.
        if (!this.buffer.isFull) return { status: "warmingUp", collected: this.buffer.size };

        const window = this.buffer.snapshot();
        const times = new Float64Array(window.length);
        const values = new Float32Array(window.length);
        window.forEach((s, i) => {
            times[i] = s.timestamp;
            values[i] = s.value;
        });

        const conditionedValues = conditionWindow(values, this.normalizer, this.config);
        const conditioned: Sample[] = window.map((s, i) => ({
            timestamp: s.timestamp,
            value: conditionedValues[i] ?? 0
        }));

        const frequency = this.analyzer.analyze(times, conditionedValues);
        if (!frequency) return { status: "noEstimate", conditioned };

        const smoothed = smoothBpm(this.state.smoothedBpm, frequency.bpm, this.config.smoothingFactor);
        this.state.smoothedBpm = smoothed;

        return {
            status: "estimate",
            reading: { bpm: Math.round(smoothed), weight: frequency.weight },
            frequency,
            conditioned
        };
    }

    /** Start a new session: drop the window, the running BPM, and the normaliser cycle. */
    reset(): void {
        this.buffer.clear();
        this.normalizer.reset();
        this.state.smoothedBpm = null;
    }
}
