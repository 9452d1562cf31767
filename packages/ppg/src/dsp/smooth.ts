/** In-window EMA ratio `constant / (length + 1)`. */
export function emaRatio(constant: number, length: number): number {
    return constant / (length + 1);
}

/**
 * Forward exponential moving average over one window.
 *
 * `ema[0] = v[0]`, `ema[i] = v[i] * ratio + ema[i - 1] * (1 - ratio)`.
 *
 * Not to be confused with the session-level BPM smoothing in the estimator.
 */
export function smoothEma(values: Float32Array, ratio: number): Float32Array {
    const n = values.length;
    const out = new Float32Array(n);
    if (n === 0) return out;

    let prev = values[0] ?? 0;
    out[0] = prev;
    for (let i = 1; i < n; i++) {
        prev = (values[i] ?? 0) * ratio + prev * (1 - ratio);
        out[i] = prev;
    }
    return out;
}
