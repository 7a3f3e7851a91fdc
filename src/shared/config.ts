import { z } from "zod";
import * as dotenv from "dotenv";
import { DEFAULT_POLICY_REJECTION_CODES, HEAVY_POLLING, LIGHT_POLLING } from "./constants.js";
import type { PollingPolicy } from "./types/supervised-call.types.js";



const csv = z.string().transform(value => value.split(",").map(s => s.trim()).filter(Boolean));

const EnvSchema = z.object({
    STORE_BACKEND: z.enum([ "postgres", "memory" ]).default("postgres"),
    POSTGRES_URL: z.string().url().optional(),

    WORKER_COUNT: z.coerce.number().int().min(1).max(64).default(3),
    TASK_TIMEOUT_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
    MONITOR_INTERVAL_MS: z.coerce.number().int().positive().default(30 * 1000),
    DEQUEUE_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
    STOP_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),

    MAX_POLICY_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
    MAX_RATE_LIMIT_RETRIES: z.coerce.number().int().min(0).default(2),
    RATE_LIMIT_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    POLICY_REJECTION_CODES: csv.default(DEFAULT_POLICY_REJECTION_CODES.join(",")),

    LIGHT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(LIGHT_POLLING.intervalMs),
    LIGHT_POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(LIGHT_POLLING.maxAttempts),
    HEAVY_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(HEAVY_POLLING.intervalMs),
    HEAVY_POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(HEAVY_POLLING.maxAttempts),

    OUTPUT_DIR: z.string().default("data/output"),
    WORK_DIR: z.string().default("data/temp"),
    MAX_SCENES: z.coerce.number().int().positive().default(10),
    IMAGE_WIDTH: z.coerce.number().int().positive().default(1920),
    IMAGE_HEIGHT: z.coerce.number().int().positive().default(1080),
    DEFAULT_SCENE_SECONDS: z.coerce.number().positive().default(5),
});

export interface SchedulerConfig {
    workerCount: number;
    taskTimeoutMs: number;
    monitorIntervalMs: number;
    dequeueTimeoutMs: number;
    stopTimeoutMs: number;
}

export interface SupervisionConfig {
    maxPolicyRetries: number;
    policyRejectionCodes: ReadonlySet<string>;
    rateLimit: { maxRetries: number; initialDelayMs: number; };
    lightPolling: PollingPolicy;
    heavyPolling: PollingPolicy;
}

export interface PipelineConfig {
    outputDir: string;
    workDir: string;
    maxScenes: number;
    imageWidth: number;
    imageHeight: number;
    defaultSceneSeconds: number;
}

export interface OrchestratorConfig {
    store: { backend: "postgres" | "memory"; postgresUrl?: string; };
    scheduler: SchedulerConfig;
    supervision: SupervisionConfig;
    pipeline: PipelineConfig;
}

/**
 * Builds the orchestrator configuration from environment variables.
 * Pass an explicit record in tests; the process environment (plus `.env`) otherwise.
 * @throws {Error} listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = loadProcessEnv()): OrchestratorConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    }
    const e = parsed.data;

    if (e.STORE_BACKEND === "postgres" && !e.POSTGRES_URL) {
        throw new Error("Invalid configuration:\n  POSTGRES_URL: required when STORE_BACKEND=postgres");
    }

    return Object.freeze({
        store: { backend: e.STORE_BACKEND, postgresUrl: e.POSTGRES_URL },
        scheduler: {
            workerCount: e.WORKER_COUNT,
            taskTimeoutMs: e.TASK_TIMEOUT_MS,
            monitorIntervalMs: e.MONITOR_INTERVAL_MS,
            dequeueTimeoutMs: e.DEQUEUE_TIMEOUT_MS,
            stopTimeoutMs: e.STOP_TIMEOUT_MS,
        },
        supervision: {
            maxPolicyRetries: e.MAX_POLICY_RETRIES,
            policyRejectionCodes: new Set(e.POLICY_REJECTION_CODES),
            rateLimit: { maxRetries: e.MAX_RATE_LIMIT_RETRIES, initialDelayMs: e.RATE_LIMIT_INITIAL_DELAY_MS },
            lightPolling: { ...LIGHT_POLLING, intervalMs: e.LIGHT_POLL_INTERVAL_MS, maxAttempts: e.LIGHT_POLL_MAX_ATTEMPTS },
            heavyPolling: { ...HEAVY_POLLING, intervalMs: e.HEAVY_POLL_INTERVAL_MS, maxAttempts: e.HEAVY_POLL_MAX_ATTEMPTS },
        },
        pipeline: {
            outputDir: e.OUTPUT_DIR,
            workDir: e.WORK_DIR,
            maxScenes: e.MAX_SCENES,
            imageWidth: e.IMAGE_WIDTH,
            imageHeight: e.IMAGE_HEIGHT,
            defaultSceneSeconds: e.DEFAULT_SCENE_SECONDS,
        },
    });
}

function loadProcessEnv(): Record<string, string | undefined> {
    dotenv.config();
    return process.env;
}
