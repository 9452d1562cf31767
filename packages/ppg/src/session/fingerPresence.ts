import type { RgbTriple } from "../types";

export type FingerPredicate = (color: RgbTriple) => boolean;

/**
 * A fingertip over a lit torch reads strongly red with little green and blue.
 */
export const defaultFingerPredicate: FingerPredicate = (color) =>
    color.red > 150 && color.green < 100 && color.blue < 50;
