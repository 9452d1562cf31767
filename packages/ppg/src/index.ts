export type PpgVersion = "0.1.0";

export const PPG_VERSION: PpgVersion = "0.1.0";

// ----------------------------
// Core Types
// ----------------------------

export type {
  Sample,
  RgbTriple,
  CaptureFrame,
  SpectrumBin,
  FrequencyStrategy,
  FrequencyEstimate,
  BpmEstimate,
  RunningBpmState,
  CycleResult
} from "./types";

// ----------------------------
// Configuration
// ----------------------------

export type { EstimatorConfig, EstimatorConfigInput } from "./config";
export { estimatorConfigSchema, resolveEstimatorConfig } from "./config";

// ----------------------------
// Conditioning stages
// ----------------------------

export { Normalizer, NORMALIZED_SCALE, averagedBlockExtrema } from "./dsp/normalize";
export { detrend, detrendCascade } from "./dsp/detrend";
export { emaRatio, smoothEma } from "./dsp/smooth";

// ----------------------------
// Spectrum / frequency analysis
// ----------------------------

export type { FftBackend, FftComplexOutput } from "./dsp/fftBackend";
export { getFftBackend } from "./dsp/fftBackend";

export type { TrimmedWindow } from "./dsp/spectrum";
export { realMagnitudes, trimEdges } from "./dsp/spectrum";

export type { FrequencyAnalyzer, AnalyzerOptions } from "./dsp/frequency";
export {
  SpectralAnalyzer,
  ThresholdCrossingAnalyzer,
  createFrequencyAnalyzer,
  dominantBinIndex,
  risingEdges
} from "./dsp/frequency";

export { findLocalPeaks, scoreConfidence } from "./dsp/confidence";

// ----------------------------
// Estimation + sessions
// ----------------------------

export { SampleBuffer } from "./estimator/sampleBuffer";
export { BpmEstimator, conditionWindow, smoothBpm } from "./estimator/bpmEstimator";

export type { MeasurementSessionOptions, ConsumeStats } from "./session/measurementSession";
export { MeasurementSession } from "./session/measurementSession";

export type { FingerPredicate } from "./session/fingerPresence";
export { defaultFingerPredicate } from "./session/fingerPresence";

export type { PulseLogger } from "./session/logger";

// ----------------------------
// Consumer-side aggregation
// ----------------------------

export type { WeightedBpmAverageOptions } from "./aggregate/weightedBpmAverage";
export { WeightedBpmAverage } from "./aggregate/weightedBpmAverage";

// ----------------------------
// Offline runner
// ----------------------------

export type { AnalyseRecordingOptions, AnalyseRecordingResult, TimedReading } from "./runner/analyseRecording";
export { analyseRecording } from "./runner/analyseRecording";

// ----------------------------
// Utility helpers
// ----------------------------

export type { MinMax } from "./util/stats";
export { minMax, mean, meanStd } from "./util/stats";
