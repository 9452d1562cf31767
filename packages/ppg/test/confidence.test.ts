import { describe, expect, it } from "vitest";

import { findLocalPeaks, scoreConfidence } from "../src/index";
import { pseudoRandom } from "./helpers/syntheticSignals";

describe("findLocalPeaks", () => {
    it("returns strict interior maxima only", () => {
        expect(findLocalPeaks(new Float32Array([0, 3, 1, 2, 1]))).toEqual([1, 3]);
    });

    it("never reports boundary bins", () => {
        expect(findLocalPeaks(new Float32Array([9, 1, 9]))).toEqual([]);
    });

    it("plateaus are not peaks", () => {
        expect(findLocalPeaks(new Float32Array([0, 2, 2, 0]))).toEqual([]);
    });

    it("flat spectrum has no peaks", () => {
        expect(findLocalPeaks(new Float32Array(10))).toEqual([]);
    });
});

describe("scoreConfidence", () => {
    it("single unambiguous peak -> 1", () => {
        expect(scoreConfidence(new Float32Array([0, 0, 4, 0, 0]), 2)).toBe(1);
    });

    it("divides the dominant magnitude by all peak magnitudes", () => {
        // Peaks at 1 (3) and 3 (2).
        expect(scoreConfidence(new Float32Array([0, 3, 1, 2, 0]), 1)).toBeCloseTo(0.6, 6);
    });

    it("counts a non-peak dominant bin in the denominator", () => {
        // Bin 1 sits on the slope from DC; the only strict peak is bin 3.
        expect(scoreConfidence(new Float32Array([5, 4, 1, 2, 0]), 1)).toBeCloseTo(4 / 6, 6);
    });

    it("no peaks or zero magnitude -> 0", () => {
        expect(scoreConfidence(new Float32Array(8), 1)).toBe(0);
        expect(scoreConfidence(new Float32Array([3, 2, 1, 0]), 1)).toBe(0);
    });

    it("stays within [0, 1] for arbitrary spectra", () => {
        for (let seed = 1; seed <= 20; seed++) {
            const mags = pseudoRandom(33, seed).map(Math.abs);
            for (let k = 1; k < mags.length; k++) {
                const w = scoreConfidence(mags, k);
                expect(w).toBeGreaterThanOrEqual(0);
                expect(w).toBeLessThanOrEqual(1);
            }
        }
    });
});
