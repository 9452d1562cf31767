import { WeightedBpmAverage, type WeightedBpmAverageOptions } from "../aggregate/weightedBpmAverage";
import type { EstimatorConfigInput } from "../config";
import { BpmEstimator } from "../estimator/bpmEstimator";
import type { BpmEstimate, FrequencyStrategy, Sample } from "../types";

function nowMs(): number {
    return typeof performance !== "undefined" ? performance.now() : Date.now();
}

export type TimedReading = BpmEstimate & {
    /** Timestamp of the sample that completed the cycle. */
    timestamp: number;
    /** Unsmoothed per-cycle BPM. */
    rawBpm: number;
};

export type AnalyseRecordingOptions = {
    config?: EstimatorConfigInput;
    average?: WeightedBpmAverageOptions;
    /** If provided, checked between samples; a cancelled run throws. */
    isCancelled?: () => boolean;
};

export type AnalyseRecordingResult = {
    readings: TimedReading[];
    average: {
        bpm: number | null;
        reliability: number;
    };
    meta: {
        strategy: FrequencyStrategy;
        cycles: number;
        estimates: number;
        timings: { totalMs: number };
    };
};

/**
 * Replay a recorded sample sequence through a fresh estimator.
 *
 * Pacing is ignored: every sample is processed, as if each arrived after the
 * previous cycle finished. Useful for offline analysis and regression logging.
 */
export function analyseRecording(
    samples: readonly Sample[],
    options: AnalyseRecordingOptions = {}
): AnalyseRecordingResult {
    const t0 = nowMs();
    const estimator = new BpmEstimator(options.config);
    const average = new WeightedBpmAverage(options.average);

    const readings: TimedReading[] = [];
    let cycles = 0;

    for (const sample of samples) {
        if (options.isCancelled?.()) {
            throw new Error("@fingerpulse/ppg: cancelled");
        }
        const result = estimator.process(sample);
        if (result.status === "warmingUp") continue;
        cycles++;
        if (result.status !== "estimate") continue;

        readings.push({ ...result.reading, timestamp: sample.timestamp, rawBpm: result.frequency.bpm });
        average.add(result.reading);
    }

    return {
        readings,
        average: { bpm: average.value, reliability: average.reliability },
        meta: {
            strategy: estimator.config.strategy,
            cycles,
            estimates: readings.length,
            timings: { totalMs: nowMs() - t0 }
        }
    };
}
