import type { PollingPolicy } from "./types/supervised-call.types.js";

export const DOCUMENT_TO_VIDEO = "document-to-video";

export const DEFAULT_POLICY_REJECTION_CODES = [
    "OutputVideoSensitiveContentDetected",
    "OutputImageSensitiveContentDetected",
    "InputTextSensitiveContentDetected",
    "InputImageSensitiveContentDetected",
    "content_policy_violation",
] as const;

/** Narration, stills, chat completions. */
export const LIGHT_POLLING: PollingPolicy = {
    intervalMs: 2000,
    maxAttempts: 60,
};

/** Motion clips: long provider queues, so back off while still queued. */
export const HEAVY_POLLING: PollingPolicy = {
    intervalMs: 10000,
    maxAttempts: 90,
    queuedBackoffFactor: 1.5,
    maxIntervalMs: 30000,
};

export const TASK_TABLE = "tasks";
export const STAGE_UNIT_TABLE = "stage_units";
export const CALL_RECORD_TABLE = "supervised_calls";
