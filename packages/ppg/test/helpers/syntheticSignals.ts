/**
 * Synthetic intensity feeds for tests.
 */

import type { Sample } from "../../src/index";

export type SineFeedOptions = {
    count: number;
    frequencyHz: number;
    sampleRateHz?: number;
    amplitude?: number;
    offset?: number;
    startMs?: number;
};

/**
 * A sine sampled at a fixed rate. Phase follows the sample index, timestamps are
 * `startMs + i * 1000 / sampleRateHz`.
 */
export function generateSineSamples(options: SineFeedOptions): Sample[] {
    const sampleRateHz = options.sampleRateHz ?? 30;
    const amplitude = options.amplitude ?? 10;
    const offset = options.offset ?? 100;
    const startMs = options.startMs ?? 0;
    const dtMs = 1000 / sampleRateHz;

    const out: Sample[] = [];
    for (let i = 0; i < options.count; i++) {
        out.push({
            timestamp: startMs + i * dtMs,
            value: offset + amplitude * Math.sin((2 * Math.PI * options.frequencyHz * i) / sampleRateHz)
        });
    }
    return out;
}

export function generateConstantSamples(count: number, value: number, dtMs = 1000 / 30): Sample[] {
    const out: Sample[] = [];
    for (let i = 0; i < count; i++) out.push({ timestamp: i * dtMs, value });
    return out;
}

/** Split samples into the aligned arrays the analyzers take. */
export function toArrays(samples: readonly Sample[]): { times: Float64Array; values: Float32Array } {
    const times = new Float64Array(samples.length);
    const values = new Float32Array(samples.length);
    samples.forEach((s, i) => {
        times[i] = s.timestamp;
        values[i] = s.value;
    });
    return { times, values };
}

/** Deterministic pseudo-random values in [-1, 1) (LCG), for reproducible noise. */
export function pseudoRandom(count: number, seed = 1): Float32Array {
    const out = new Float32Array(count);
    let state = seed >>> 0;
    for (let i = 0; i < count; i++) {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        out[i] = state / 2 ** 31 - 1;
    }
    return out;
}

/**
 * 50 samples at 1.2 Hz, 100 at 1.8 Hz, then 80 flat samples at 100, on one continuous
 * 30 Hz clock.
 */
export function generatePulseSwitchThenFlat(): Sample[] {
    const dtMs = 1000 / 30;
    return [
        ...generateSineSamples({ count: 50, frequencyHz: 1.2 }),
        ...generateSineSamples({ count: 100, frequencyHz: 1.8, startMs: 50 * dtMs }),
        ...generateConstantSamples(80, 100, dtMs).map((s) => ({ timestamp: s.timestamp + 150 * dtMs, value: s.value }))
    ];
}
