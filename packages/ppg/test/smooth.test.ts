import { describe, expect, it } from "vitest";

import { emaRatio, smoothEma } from "../src/index";

describe("in-window EMA", () => {
    it("ratio is K / (N + 1)", () => {
        expect(emaRatio(20, 49)).toBe(0.4);
        expect(emaRatio(20, 64)).toBeCloseTo(20 / 65, 12);
    });

    it("starts at the first value and decays towards later ones", () => {
        const out = smoothEma(new Float32Array([1, 0, 0, 4]), 0.5);
        expect(Array.from(out)).toEqual([1, 0.5, 0.25, 2.125]);
    });

    it("ratio 1 is the identity", () => {
        expect(Array.from(smoothEma(new Float32Array([3, -1, 2]), 1))).toEqual([3, -1, 2]);
    });

    it("empty input -> empty output", () => {
        expect(smoothEma(new Float32Array(0), 0.3).length).toBe(0);
    });
});
