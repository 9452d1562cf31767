export type MinMax = {
    min: number;
    max: number;
};

/**
 * Compute min/max in a single pass without using spread / Math.min(...arr).
 *
 * Empty input yields `{ min: Infinity, max: -Infinity }`.
 */
export function minMax(values: ArrayLike<number>): MinMax {
    const n = values.length >>> 0;
    if (n === 0) return { min: Infinity, max: -Infinity };

    let min = Infinity;
    let max = -Infinity;

    for (let i = 0; i < n; i++) {
        const v = values[i] ?? 0;
        if (v < min) min = v;
        if (v > max) max = v;
    }

    return { min, max };
}

export function mean(values: ArrayLike<number>): number {
    const n = values.length;
    if (n === 0) return 0;
    let sum = 0;
    for (let i = 0; i < n; i++) sum += values[i] ?? 0;
    return sum / n;
}

/** Population mean and standard deviation. */
export function meanStd(values: ArrayLike<number>): { mean: number; std: number } {
    const n = values.length;
    if (n <= 0) return { mean: 0, std: 0 };

    const mu = mean(values);

    let varSum = 0;
    for (let i = 0; i < n; i++) {
        const d = (values[i] ?? 0) - mu;
        varSum += d * d;
    }

    return { mean: mu, std: Math.sqrt(varSum / n) };
}

export function clamp(v: number, lo: number, hi: number): number {
    return v < lo ? lo : v > hi ? hi : v;
}
