/**
 * Baseline-wander removal by centred moving-average subtraction.
 *
 * For interior indices `spread <= i <= n - spread` the trend is the mean of
 * `values[i - spread .. i + spread)`, kept as a sliding sum. Indices closer to an
 * edge reuse the nearest interior trend (edge replication, no interpolation).
 *
 * `spread` is clamped to `floor(n / 2)`; a spread below 1 returns a copy.
 */
export function detrend(values: Float32Array, spread: number): Float32Array {
    const n = values.length;
    const s = Math.min(Math.floor(spread), n >>> 1);
    const out = new Float32Array(values);
    if (s < 1) return out;

    const width = 2 * s;
    const lastInterior = n - s;

    let sum = 0;
    for (let j = 0; j < width; j++) sum += values[j] ?? 0;

    const trend = new Float64Array(n);
    for (let i = s; i <= lastInterior; i++) {
        trend[i] = sum / width;
        if (i + s < n) sum += (values[i + s] ?? 0) - (values[i - s] ?? 0);
    }

    const head = trend[s] ?? 0;
    const tail = trend[lastInterior] ?? 0;
    for (let i = 0; i < s; i++) trend[i] = head;
    for (let i = lastInterior + 1; i < n; i++) trend[i] = tail;

    for (let i = 0; i < n; i++) out[i] = (values[i] ?? 0) - (trend[i] ?? 0);
    return out;
}

/** Apply `detrend` once per spread, each pass on the previous output. */
export function detrendCascade(values: Float32Array, spreads: readonly number[]): Float32Array {
    let out = values;
    for (const spread of spreads) out = detrend(out, spread);
    return out === values ? new Float32Array(values) : out;
}
