/**
 * Strict local maxima of a magnitude spectrum. Boundary bins are never peaks.
 */
export function findLocalPeaks(magnitudes: Float32Array): number[] {
    const peaks: number[] = [];
    for (let k = 1; k < magnitudes.length - 1; k++) {
        const v = magnitudes[k] ?? 0;
        if (v > (magnitudes[k - 1] ?? 0) && v > (magnitudes[k + 1] ?? 0)) peaks.push(k);
    }
    return peaks;
}

/**
 * How dominant `dominantBin` is among all competing spectral peaks:
 * `mag[dominant] / sum(mag[peaks])`.
 *
 * Near 1 means one clear pulse frequency; near 1/peakCount means an ambiguous
 * spectrum. When the dominant bin is not itself a strict peak (e.g. it sits on a
 * slope next to DC) its magnitude is added to the denominator, so the result stays
 * in [0, 1].
 */
export function scoreConfidence(magnitudes: Float32Array, dominantBin: number, peaks = findLocalPeaks(magnitudes)): number {
    const dominant = magnitudes[dominantBin] ?? 0;
    if (peaks.length === 0 || !(dominant > 0)) return 0;

    let total = 0;
    for (const k of peaks) total += magnitudes[k] ?? 0;
    if (!peaks.includes(dominantBin)) total += dominant;

    if (!(total > 0)) return 0;
    return Math.min(1, dominant / total);
}
