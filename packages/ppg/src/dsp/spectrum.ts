import { getFftBackend } from "./fftBackend";

/**
 * Magnitudes of the non-redundant DFT bins `0..floor(L/2)` of a real series.
 */
export function realMagnitudes(values: Float32Array): Float32Array {
    const n = values.length;
    if (n === 0) return new Float32Array(0);

    const { real, imag } = getFftBackend(n).forwardReal(values);
    const nBins = (n >>> 1) + 1;
    const mags = new Float32Array(nBins);
    for (let k = 0; k < nBins; k++) {
        mags[k] = Math.hypot(real[k] ?? 0, imag[k] ?? 0);
    }
    return mags;
}

export type TrimmedWindow = {
    times: Float64Array;
    values: Float32Array;
};

/**
 * Drop `cutoff` samples from both edges, where detrending and smoothing distort the
 * series most. Returns views when possible.
 */
export function trimEdges(times: Float64Array, values: Float32Array, cutoff: number): TrimmedWindow {
    if (times.length !== values.length) {
        throw new Error("@fingerpulse/ppg: trimEdges times/values length mismatch");
    }
    const c = Math.max(0, Math.floor(cutoff));
    const end = Math.max(c, values.length - c);
    return { times: times.subarray(c, end), values: values.subarray(c, end) };
}
