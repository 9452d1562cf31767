/** The subset of `console` the session writes to. */
export type PulseLogger = Pick<Console, "debug" | "warn" | "error">;

export const LOG_TAG = "[fingerpulse]";
