import type { Logger } from "../shared/logger.js";
import type { JsonObject, Task } from "../shared/types/task.types.js";
import type { TaskStore } from "../shared/services/task-store.js";
import type { CallAuditSink } from "../shared/services/call-audit-log.js";
import { LeaseLostError, StageFailedError, TaskCancelledError, describeStoreError, extractErrorMessage } from "../shared/utils/errors.js";



export interface StageContext {
    /** Task as of the start of the stage; `state` holds every earlier stage's patch. */
    task: Task;
    workerId: string;
    signal: AbortSignal;
    logger: Logger;
    audit?: CallAuditSink;
    /** Progress inside the stage's window, 0..1. */
    reportProgress(fraction: number): Promise<void>;
}

export interface StageOutcome {
    statePatch?: JsonObject;
    /** Set by the stage that produces the final artifact. */
    outputRef?: string;
}

export interface StageDefinition {
    name: string;
    /** Task progress once the stage is persisted. */
    checkpoint: number;
    run(ctx: StageContext): Promise<StageOutcome>;
    /** Undoes side effects of an outcome that could not be persisted. */
    discard?(outcome: StageOutcome): Promise<void>;
}

export interface PipelineDefinition {
    kind: string;
    stages: StageDefinition[];
}

export interface PipelineRunOptions {
    store: TaskStore;
    workerId: string;
    signal: AbortSignal;
    logger: Logger;
    audit?: CallAuditSink;
    onProgress?: (stage: string, progress: number) => Promise<void>;
}

/**
 * Maps task kinds to pipeline definitions.
 */
export class PipelineRegistry {
    private definitions = new Map<string, PipelineDefinition>();

    register(definition: PipelineDefinition): this {
        validateDefinition(definition);
        this.definitions.set(definition.kind, definition);
        return this;
    }

    get(kind: string): PipelineDefinition | undefined {
        return this.definitions.get(kind);
    }

    has(kind: string): boolean {
        return this.definitions.has(kind);
    }

    kinds(): string[] {
        return [ ...this.definitions.keys() ];
    }
}

function validateDefinition(definition: PipelineDefinition): void {
    if (definition.stages.length === 0) {
        throw new Error(`pipeline ${definition.kind} has no stages`);
    }
    let previous = 0;
    for (const stage of definition.stages) {
        if (!(stage.checkpoint > previous && stage.checkpoint <= 1)) {
            throw new Error(`pipeline ${definition.kind}: checkpoint of stage ${stage.name} must be in (${previous}, 1]`);
        }
        previous = stage.checkpoint;
    }
}

/**
 * Runs every stage of `definition` for a claimed task, in order.
 *
 * After each stage the runner re-reads the task and persists the stage's state
 * patch only while the task is still running under this worker. There is no
 * resume: every run starts at the first stage.
 *
 * @returns the output reference produced by the pipeline.
 * @throws {StageFailedError} when a stage fails.
 * @throws {TaskCancelledError} when the task was cancelled meanwhile.
 * @throws {LeaseLostError} when the worker no longer owns the task.
 */
export async function runPipeline(definition: PipelineDefinition, task: Task, options: PipelineRunOptions): Promise<string> {
    const { store, workerId, signal, logger } = options;
    let current = task;
    let windowStart = 0;
    let outputRef: string | undefined;

    for (const stage of definition.stages) {
        ensureNotAborted(current.id, signal);
        const stageLogger = logger.child({ stage: stage.name });
        const from = windowStart;
        const span = stage.checkpoint - from;

        const reportProgress = async (fraction: number) => {
            ensureNotAborted(current.id, signal);
            const progress = from + span * Math.min(1, Math.max(0, fraction));
            const advanced = await store.advance(current.id, progress, undefined, workerId);
            if (!advanced.ok) {
                await ensureOwnership(store, current.id, workerId, signal);
                throw new Error(describeStoreError(advanced.error));
            }
            await options.onProgress?.(stage.name, advanced.value.progress);
        };

        stageLogger.info({ checkpoint: stage.checkpoint }, `Stage ${stage.name} started`);
        let outcome: StageOutcome;
        try {
            outcome = await stage.run({ task: current, workerId, signal, logger: stageLogger, audit: options.audit, reportProgress });
        } catch (error) {
            if (error instanceof TaskCancelledError || error instanceof LeaseLostError) throw error;
            ensureNotAborted(current.id, signal);
            stageLogger.error({ error: extractErrorMessage(error) }, `Stage ${stage.name} failed`);
            throw new StageFailedError(stage.name, error);
        }

        try {
            await ensureOwnership(store, current.id, workerId, signal);
        } catch (error) {
            await discardOutcome(stage, outcome, stageLogger);
            throw error;
        }

        const advanced = await store.advance(current.id, stage.checkpoint, outcome.statePatch, workerId);
        if (!advanced.ok) {
            await discardOutcome(stage, outcome, stageLogger);
            await ensureOwnership(store, current.id, workerId, signal);
            throw new StageFailedError(stage.name, new Error(describeStoreError(advanced.error)));
        }
        current = advanced.value;
        outputRef = outcome.outputRef ?? outputRef;
        await options.onProgress?.(stage.name, current.progress);
        stageLogger.info({ progress: current.progress }, `Stage ${stage.name} completed`);

        windowStart = stage.checkpoint;
    }

    if (!outputRef) {
        throw new StageFailedError(definition.stages[ definition.stages.length - 1 ].name, new Error("pipeline produced no output"));
    }
    return outputRef;
}

function ensureNotAborted(taskId: string, signal: AbortSignal): void {
    if (signal.aborted) {
        if (signal.reason instanceof LeaseLostError) throw signal.reason;
        throw new LeaseLostError(taskId, extractErrorMessage(signal.reason ?? "aborted"));
    }
}

async function ensureOwnership(store: TaskStore, taskId: string, workerId: string, signal: AbortSignal): Promise<void> {
    ensureNotAborted(taskId, signal);
    const current = await store.get(taskId);
    if (!current.ok) {
        throw new LeaseLostError(taskId, describeStoreError(current.error));
    }
    const task = current.value;
    if (task.status === "cancelled") {
        throw new TaskCancelledError(taskId);
    }
    if (task.status !== "running" || task.workerId !== workerId) {
        throw new LeaseLostError(taskId, `task is ${task.status} under ${task.workerId ?? "no worker"}`);
    }
}

async function discardOutcome(stage: StageDefinition, outcome: StageOutcome, logger: Logger): Promise<void> {
    if (!stage.discard) return;
    try {
        await stage.discard(outcome);
    } catch (error) {
        logger.warn({ error: extractErrorMessage(error) }, `Could not discard output of stage ${stage.name}`);
    }
}
