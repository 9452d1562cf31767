import { describe, expect, it } from "vitest";

import { detrend, detrendCascade } from "../src/index";
import { pseudoRandom } from "./helpers/syntheticSignals";

/** Direct (non-sliding) reference with the same edge replication. */
function detrendReference(values: Float32Array, spread: number): number[] {
    const n = values.length;
    const trendAt = (i: number) => {
        let sum = 0;
        for (let j = i - spread; j < i + spread; j++) sum += values[j] ?? 0;
        return sum / (2 * spread);
    };
    const out: number[] = [];
    for (let i = 0; i < n; i++) {
        const centre = Math.min(Math.max(i, spread), n - spread);
        out.push((values[i] ?? 0) - trendAt(centre));
    }
    return out;
}

describe("detrend", () => {
    it("constant series -> all zeros", () => {
        const out = detrend(new Float32Array(20).fill(7), 4);
        expect(Array.from(out)).toEqual(new Array(20).fill(0));
    });

    it("removes a linear ramp, replicating the nearest interior trend at the edges", () => {
        const ramp = new Float32Array(10);
        for (let i = 0; i < 10; i++) ramp[i] = i;

        // Interior trend mean(i-2 .. i+1) = i - 0.5; edges reuse trend[2] = 1.5 and trend[8] = 7.5.
        const out = detrend(ramp, 2);
        expect(Array.from(out)).toEqual([-1.5, -0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 1.5]);
    });

    it("sliding sum matches a direct moving average", () => {
        const values = pseudoRandom(37, 42);
        const out = detrend(values, 6);
        const ref = detrendReference(values, 6);
        ref.forEach((v, i) => expect(out[i]).toBeCloseTo(v, 5));
    });

    it("clamps the spread to half the series length", () => {
        const values = new Float32Array([1, 2, 3, 4, 5, 6]);
        // spread 3: the only interior index (3) averages the whole series (3.5).
        expect(Array.from(detrend(values, 100))).toEqual([-2.5, -1.5, -0.5, 0.5, 1.5, 2.5]);
    });

    it("spread below 1 returns an unchanged copy", () => {
        const values = new Float32Array([3, 1, 2]);
        const out = detrend(values, 0);
        expect(Array.from(out)).toEqual([3, 1, 2]);
        expect(out).not.toBe(values);
    });

    it("does not mutate its input", () => {
        const values = new Float32Array([5, 1, 4, 2, 3, 9]);
        detrend(values, 2);
        expect(Array.from(values)).toEqual([5, 1, 4, 2, 3, 9]);
    });
});

describe("detrendCascade", () => {
    it("applies each spread on the previous pass's output", () => {
        const values = pseudoRandom(30, 7);
        const cascaded = detrendCascade(values, [10, 5]);
        const manual = detrend(detrend(values, 10), 5);
        expect(Array.from(cascaded)).toEqual(Array.from(manual));
    });

    it("flat series stays flat at zero", () => {
        const out = detrendCascade(new Float32Array(64).fill(3), [25, 10, 5]);
        expect(out.every((v) => v === 0)).toBe(true);
    });

    it("an empty spread list returns a copy", () => {
        const values = new Float32Array([1, 2]);
        const out = detrendCascade(values, []);
        expect(Array.from(out)).toEqual([1, 2]);
        expect(out).not.toBe(values);
    });
});
