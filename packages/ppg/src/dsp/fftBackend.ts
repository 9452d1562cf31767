/**
 * FFT backend abstraction.
 *
 * The spectral analyzer works on arbitrary window lengths (N - 2 * cutoff), while
 * `fft.js` only plans power-of-two sizes. Callers ask for a size and get whichever
 * backend handles it; both return the same unnormalised full spectrum.
 */

import { isPowerOfTwo } from "../util/pow2";
import { createBluesteinBackend } from "./fftBackendBluestein";
import { createFftJsBackend } from "./fftBackendFftjs";

export type FftComplexOutput = {
    /** Full-length FFT output (length = fftSize). */
    real: Float32Array;
    /** Full-length FFT output (length = fftSize). */
    imag: Float32Array;
};

export interface FftBackend {
    readonly fftSize: number;

    /**
     * Forward FFT for real-valued input.
     *
     * Contract:
     * - input length must equal fftSize.
     * - returns the full complex spectrum; consumers keep bins 0..fftSize/2.
     * - no normalisation is applied.
     *
     * The returned arrays are reused by the next call on the same backend.
     */
    forwardReal(input: Float32Array): FftComplexOutput;
}

// One plan per size. Sessions run on a single thread, so sharing plans is safe.
const backendCache = new Map<number, FftBackend>();

export function getFftBackend(fftSize: number): FftBackend {
    const existing = backendCache.get(fftSize);
    if (existing) return existing;

    // fft.js needs at least 2 points.
    const created = isPowerOfTwo(fftSize) && fftSize >= 2 ? createFftJsBackend(fftSize) : createBluesteinBackend(fftSize);
    backendCache.set(fftSize, created);
    return created;
}
