/**
 * Bluestein (chirp-z) backend for sizes `fft.js` cannot plan directly.
 *
 * X[k] = w[k] * sum_n (x[n] * w[n]) * conj(w[k - n]),  w[n] = exp(-i*pi*n^2/N)
 *
 * The convolution runs as a circular one on a power-of-two `fft.js` plan of length
 * M >= 2N - 1, so the whole transform stays O(N log N).
 */

import FFT from "fft.js";

import type { FftBackend, FftComplexOutput } from "./fftBackend";
import { nextPowerOfTwo } from "../util/pow2";

export function createBluesteinBackend(fftSize: number): FftBackend {
    if (!Number.isInteger(fftSize) || fftSize <= 0) {
        throw new Error("@fingerpulse/ppg: fftSize must be a positive integer");
    }

    const n = fftSize;
    const outReal = new Float32Array(n);
    const outImag = new Float32Array(n);

    if (n === 1) {
        return {
            fftSize,
            forwardReal(frame: Float32Array): FftComplexOutput {
                assertLength(frame, n);
                const v = frame[0] ?? 0;
                outReal[0] = v === 0 ? 0 : v;
                outImag[0] = 0;
                return { real: outReal, imag: outImag };
            }
        };
    }

    const m = nextPowerOfTwo(2 * n - 1);
    const fft = new FFT(m);

    // Chirp w[n]; n^2 is reduced mod 2N to keep the angle small for larger n.
    const chirpRe = new Float64Array(n);
    const chirpIm = new Float64Array(n);
    for (let i = 0; i < n; i++) {
        const angle = (Math.PI * ((i * i) % (2 * n))) / n;
        chirpRe[i] = Math.cos(angle);
        chirpIm[i] = -Math.sin(angle);
    }

    // Spectrum of the conjugate chirp, wrapped for circular convolution.
    const kernel = new Array<number>(2 * m).fill(0);
    for (let i = 0; i < n; i++) {
        const re = chirpRe[i] ?? 0;
        const im = -(chirpIm[i] ?? 0);
        kernel[2 * i] = re;
        kernel[2 * i + 1] = im;
        if (i > 0) {
            kernel[2 * (m - i)] = re;
            kernel[2 * (m - i) + 1] = im;
        }
    }
    const kernelSpectrum = fft.createComplexArray();
    fft.transform(kernelSpectrum, kernel);

    const a = new Array<number>(2 * m).fill(0);
    const aSpectrum = fft.createComplexArray();
    const conv = fft.createComplexArray();

    return {
        fftSize,
        forwardReal(frame: Float32Array): FftComplexOutput {
            assertLength(frame, n);

            a.fill(0);
            for (let i = 0; i < n; i++) {
                const x = frame[i] ?? 0;
                a[2 * i] = x * (chirpRe[i] ?? 0);
                a[2 * i + 1] = x * (chirpIm[i] ?? 0);
            }
            fft.transform(aSpectrum, a);

            // Pointwise product, written back into aSpectrum.
            for (let k = 0; k < m; k++) {
                const ar = aSpectrum[2 * k] ?? 0;
                const ai = aSpectrum[2 * k + 1] ?? 0;
                const br = kernelSpectrum[2 * k] ?? 0;
                const bi = kernelSpectrum[2 * k + 1] ?? 0;
                aSpectrum[2 * k] = ar * br - ai * bi;
                aSpectrum[2 * k + 1] = ar * bi + ai * br;
            }
            // inverseTransform applies the 1/M scaling.
            fft.inverseTransform(conv, aSpectrum);

            for (let k = 0; k < n; k++) {
                const cr = conv[2 * k] ?? 0;
                const ci = conv[2 * k + 1] ?? 0;
                const wr = chirpRe[k] ?? 0;
                const wi = chirpIm[k] ?? 0;
                const re = cr * wr - ci * wi;
                const im = cr * wi + ci * wr;
                outReal[k] = re === 0 ? 0 : re;
                outImag[k] = im === 0 ? 0 : im;
            }

            return { real: outReal, imag: outImag };
        }
    };
}

function assertLength(frame: Float32Array, fftSize: number): void {
    if (frame.length !== fftSize) {
        throw new Error(`@fingerpulse/ppg: FFT input length (${frame.length}) must equal fftSize (${fftSize})`);
    }
}
