/**
 * One intensity reading from the capture side.
 *
 * `timestamp` is epoch milliseconds. `value` is the frame's mean intensity (any unit).
 */
export type Sample = {
    readonly timestamp: number;
    readonly value: number;
};

/** Mean colour of one captured frame, each channel in 0..255. */
export type RgbTriple = {
    red: number;
    green: number;
    blue: number;
};

/** One capture event delivered by an external producer. */
export type CaptureFrame = {
    sample: Sample;
    color?: RgbTriple;
};

export type SpectrumBin = {
    /** Index into the real (non-redundant) DFT output. */
    bin: number;
    /** Bin centre, derived from the trimmed window's real elapsed time. */
    frequencyHz: number;
    magnitude: number;
};

export type FrequencyStrategy = "spectral" | "thresholdCrossing";

/** Per-cycle output of a frequency analyzer. */
export type FrequencyEstimate = {
    strategy: FrequencyStrategy;
    frequencyHz: number;
    bpm: number;
    /** Reliability in [0, 1]; not a probability. */
    weight: number;
    /** Only present for the spectral strategy. */
    spectrum?: SpectrumBin[];
};

/**
 * A heart-rate reading as emitted to consumers.
 *
 * `weight` is raw (unsquared). Consumers aggregating many readings are expected
 * to square it so ambiguous reads are penalised super-linearly.
 */
export type BpmEstimate = {
    bpm: number;
    weight: number;
};

export type RunningBpmState = {
    /** `null` until the first valid estimate of a session. */
    smoothedBpm: number | null;
};

export type CycleResult =
    | { status: "warmingUp"; collected: number }
    | { status: "noEstimate"; conditioned: Sample[] }
    | {
          status: "estimate";
          reading: BpmEstimate;
          frequency: FrequencyEstimate;
          conditioned: Sample[];
      };
