import { z } from "zod";

/**
 * Estimator configuration.
 *
 * All fields have defaults, so `resolveEstimatorConfig({})` yields a working setup
 * for a ~30 fps camera feed. Invalid values are rejected, never clamped.
 */
export const estimatorConfigSchema = z
    .object({
        /** Rolling window length N (samples). */
        windowLength: z.number().int().positive().default(64),
        /** Samples trimmed from each edge before frequency analysis. */
        edgeCutoff: z.number().int().nonnegative().default(7),
        /** Detrend half-widths, applied in order. */
        detrendSpreads: z.array(z.number().int().positive()).nonempty().default([25, 10, 5]),
        /** K in the in-window EMA ratio K / (N + 1). */
        emaRatioConstant: z.number().positive().default(20),
        /** Session-level smoothing factor alpha in (0, 1]. */
        smoothingFactor: z
            .number()
            .gt(0, "smoothing factor cannot be 0 or negative")
            .lte(1, "smoothing factor cannot be greater than 1")
            .default(0.8),
        /** Minimum delay between accepted samples (ms). */
        minSampleDelayMs: z.number().int().nonnegative().default(50),
        /** Block size for the normaliser's periodic extrema recalibration. */
        normalizerBlockSize: z.number().int().positive().default(10),
        strategy: z.enum(["spectral", "thresholdCrossing"]).default("spectral")
    })
    .superRefine((cfg, ctx) => {
        if (cfg.windowLength - 2 * cfg.edgeCutoff < 4) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["edgeCutoff"],
                message: `must leave at least 4 samples of a ${cfg.windowLength}-sample window`
            });
        }
        cfg.detrendSpreads.forEach((spread, i) => {
            if (2 * spread > cfg.windowLength) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["detrendSpreads", i],
                    message: `spread ${spread} needs a window of at least ${2 * spread} samples`
                });
            }
        });
        if (cfg.emaRatioConstant > cfg.windowLength + 1) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["emaRatioConstant"],
                message: `must not exceed windowLength + 1 (${cfg.windowLength + 1})`
            });
        }
    });

export type EstimatorConfigInput = z.input<typeof estimatorConfigSchema>;
export type EstimatorConfig = z.output<typeof estimatorConfigSchema>;

export function resolveEstimatorConfig(input: EstimatorConfigInput = {}): EstimatorConfig {
    const parsed = estimatorConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new Error(`@fingerpulse/ppg: invalid estimator config (${issues})`);
    }
    return parsed.data;
}
