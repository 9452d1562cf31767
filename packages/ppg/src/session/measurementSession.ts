import type { EstimatorConfig, EstimatorConfigInput } from "../config";
import { BpmEstimator } from "../estimator/bpmEstimator";
import type { BpmEstimate, CaptureFrame, CycleResult, RgbTriple, Sample, SpectrumBin } from "../types";
import { defaultFingerPredicate, type FingerPredicate } from "./fingerPresence";
import { LOG_TAG, type PulseLogger } from "./logger";

export type MeasurementSessionOptions = {
    config?: EstimatorConfigInput;

    /** Fired once per cycle that produced a frequency estimate. */
    onBpm?: (bpm: number, weight: number) => void;
    /** Conditioned window, fired on every cycle the pipeline ran. */
    onRawData?: (series: Sample[]) => void;
    /** Spectral strategy only. */
    onSpectrum?: (bins: SpectrumBin[]) => void;
    /** Fired for every accepted sample that came with a colour. */
    onSignalQuality?: (present: boolean) => void;

    fingerPredicate?: FingerPredicate;
    logger?: PulseLogger;
};

export type ConsumeStats = {
    accepted: number;
    dropped: number;
};

/**
 * One measurement session: owns the sample window and running BPM for its lifetime.
 *
 * Samples come in through `offer()`, a drop-on-busy channel. An accepted sample runs
 * one full pipeline cycle synchronously, then the session stays busy for
 * `minSampleDelayMs`; anything offered meanwhile is dropped, not queued.
 */
export class MeasurementSession {
    private readonly estimator: BpmEstimator;
    private readonly options: MeasurementSessionOptions;
    private readonly fingerPredicate: FingerPredicate;
    private readonly logger: PulseLogger;

    private isBusy = false;
    private isClosed = false;
    private releaseTimer: ReturnType<typeof setTimeout> | null = null;
    private latest: BpmEstimate | null = null;

    constructor(options: MeasurementSessionOptions = {}) {
        this.estimator = new BpmEstimator(options.config);
        this.options = options;
        this.fingerPredicate = options.fingerPredicate ?? defaultFingerPredicate;
        this.logger = options.logger ?? console;
    }

    get busy(): boolean {
        return this.isBusy;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    get lastReading(): BpmEstimate | null {
        return this.latest;
    }

    get estimatorConfig(): EstimatorConfig {
        return this.estimator.config;
    }

    /**
     * Offer one sample. Returns `false` if it was dropped (session busy or closed).
     */
    offer(sample: Sample, color?: RgbTriple): boolean {
        if (this.isClosed) {
            this.logger.warn(`${LOG_TAG} sample offered to a closed session; dropped`);
            return false;
        }
        if (this.isBusy) {
            this.logger.debug(`${LOG_TAG} busy, dropping sample`, { timestamp: sample.timestamp });
            return false;
        }

        this.isBusy = true;
        try {
            if (color) {
                const present = this.fingerPredicate(color);
                this.notify("onSignalQuality", () => this.options.onSignalQuality?.(present));
            }
            this.emit(this.estimator.process(sample));
        } finally {
            this.scheduleRelease();
        }
        return true;
    }

    /**
     * Drain an external producer through `offer()`. Resolves when the source ends
     * or the session is closed.
     */
    async consume(source: AsyncIterable<CaptureFrame>): Promise<ConsumeStats> {
        const stats: ConsumeStats = { accepted: 0, dropped: 0 };
        for await (const frame of source) {
            if (this.isClosed) break;
            if (this.offer(frame.sample, frame.color)) stats.accepted++;
            else stats.dropped++;
        }
        return stats;
    }

    /** Discard the window and running BPM; the next sample starts a fresh warm-up. */
    reset(): void {
        this.cancelRelease();
        this.isBusy = false;
        this.latest = null;
        this.estimator.reset();
    }

    close(): void {
        this.cancelRelease();
        this.isBusy = false;
        this.isClosed = true;
    }

    private emit(result: CycleResult): void {
        if (result.status === "warmingUp") {
            this.logger.debug(`${LOG_TAG} warming up`, { collected: result.collected });
            return;
        }

        this.notify("onRawData", () => this.options.onRawData?.(result.conditioned));

        if (result.status === "noEstimate") {
            this.logger.debug(`${LOG_TAG} no estimate this cycle`);
            return;
        }

        const { reading, frequency } = result;
        this.latest = reading;
        this.notify("onBpm", () => this.options.onBpm?.(reading.bpm, reading.weight));
        const spectrum = frequency.spectrum;
        if (spectrum) this.notify("onSpectrum", () => this.options.onSpectrum?.(spectrum));
    }

    /** Consumer callbacks must not break the cycle; failures are logged. */
    private notify(name: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            this.logger.error(`${LOG_TAG} ${name} handler failed:`, error);
        }
    }

    private scheduleRelease(): void {
        const delay = this.estimator.config.minSampleDelayMs;
        if (delay <= 0) {
            this.isBusy = false;
            return;
        }
        this.releaseTimer = setTimeout(() => {
            this.releaseTimer = null;
            this.isBusy = false;
        }, delay);
    }

    private cancelRelease(): void {
        if (this.releaseTimer !== null) {
            clearTimeout(this.releaseTimer);
            this.releaseTimer = null;
        }
    }
}
