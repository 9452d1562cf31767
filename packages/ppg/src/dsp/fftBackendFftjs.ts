/**
 * Radix-2 path for window lengths that are already powers of two. Every other
 * length goes through the chirp-z backend, which reuses this plan type internally.
 */

import FFT from "fft.js";

import { isPowerOfTwo } from "../util/pow2";
import type { FftBackend, FftComplexOutput } from "./fftBackend";

export function createFftJsBackend(fftSize: number): FftBackend {
    if (!Number.isInteger(fftSize) || fftSize < 2 || !isPowerOfTwo(fftSize)) {
        throw new Error("@fingerpulse/ppg: fft.js backend needs a power-of-two size >= 2");
    }

    const plan = new FFT(fftSize);
    const input = new Array<number>(fftSize).fill(0);
    const interleaved = plan.createComplexArray();
    const spectrum: FftComplexOutput = {
        real: new Float32Array(fftSize),
        imag: new Float32Array(fftSize)
    };

    return {
        fftSize,
        forwardReal(frame: Float32Array): FftComplexOutput {
            if (frame.length !== fftSize) {
                throw new Error(
                    `@fingerpulse/ppg: FFT input length (${frame.length}) must equal fftSize (${fftSize})`
                );
            }
            frame.forEach((v, i) => {
                input[i] = v;
            });

            plan.realTransform(interleaved, input);
            // Upper half is left empty by realTransform.
            plan.completeSpectrum(interleaved);
            splitInterleaved(interleaved, spectrum);
            return spectrum;
        }
    };
}

/** `[re0, im0, re1, im1, ...]` into separate arrays, with -0 stored as 0. */
function splitInterleaved(interleaved: readonly number[], into: FftComplexOutput): void {
    for (let k = 0; k < into.real.length; k++) {
        const re = interleaved[2 * k] ?? 0;
        const im = interleaved[2 * k + 1] ?? 0;
        into.real[k] = re === 0 ? 0 : re;
        into.imag[k] = im === 0 ? 0 : im;
    }
}
