import { v7 as uuidv7 } from "uuid";
import type { TaskStore } from "../shared/services/task-store.js";
import type { CallAuditSink } from "../shared/services/call-audit-log.js";
import type { Task, TaskDescriptor, TaskErrorKind, TaskEvent } from "../shared/types/task.types.js";
import { createTaskLogger, logger as rootLogger, withLogContext } from "../shared/logger.js";
import type { Logger } from "../shared/logger.js";
import { LeaseLostError, StageFailedError, TaskCancelledError, describeStoreError, extractErrorMessage } from "../shared/utils/errors.js";
import { runPipeline } from "../pipeline/pipeline-runner.js";
import type { PipelineRegistry } from "../pipeline/pipeline-runner.js";
import type { TaskQueue } from "../pipeline/services/task-queue.js";



export type PublishTaskEvent = (event: TaskEvent) => Promise<void>;

export interface TaskWorkerDeps {
    store: TaskStore;
    queue: TaskQueue;
    registry: PipelineRegistry;
    dequeueTimeoutMs: number;
    audit?: CallAuditSink;
    publishTaskEvent?: PublishTaskEvent;
    logger?: Logger;
}

interface Lease {
    taskId: string;
    controller: AbortController;
    /** Set when someone else ends the lease; the failure kind to record. */
    revokedAs?: TaskErrorKind;
}

/**
 * Pulls tasks off the queue and runs their pipelines, one at a time.
 * Workers know nothing about the scheduler: the store decides ownership,
 * and the lease is the only handle others hold on a running task.
 */
export class TaskWorker {
    private lease: Lease | null = null;
    private logger: Logger;

    constructor(readonly id: string, private deps: TaskWorkerDeps) {
        this.logger = createTaskLogger({ workerId: id }, deps.logger ?? rootLogger);
    }

    get currentTaskId(): string | null {
        return this.lease?.taskId ?? null;
    }

    /**
     * Dequeue loop. Returns once `signal` aborts and the task in hand, if any, has finished.
     */
    async run(signal: AbortSignal): Promise<void> {
        this.logger.info("Worker started");
        while (!signal.aborted) {
            const descriptor = await this.deps.queue.dequeue(this.deps.dequeueTimeoutMs, signal);
            if (!descriptor) continue;

            try {
                await this.processTask(descriptor);
            } catch (error) {
                this.logger.error({ error, taskId: descriptor.taskId }, "Unexpected error while processing task");
            }
        }
        this.logger.info("Worker stopped");
    }

    /**
     * Ends the lease on `taskId` if this worker holds it. The running pipeline
     * sees the abort at its next suspension point and stops.
     */
    revokeLease(taskId: string, kind: TaskErrorKind, reason: string): boolean {
        if (!this.lease || this.lease.taskId !== taskId) return false;
        this.lease.revokedAs = kind;
        this.lease.controller.abort(new LeaseLostError(taskId, reason));
        return true;
    }

    /**
     * Claims the task and runs it to a terminal status. Losing the claim race is
     * not an error: another worker has it, or it is no longer pending.
     */
    async processTask(descriptor: TaskDescriptor): Promise<void> {
        const claim = await this.deps.store.claim(descriptor.taskId, this.id);
        if (!claim.ok) {
            this.logger.warn({ taskId: descriptor.taskId, reason: describeStoreError(claim.error) }, "Task unavailable");
            return;
        }
        const task = claim.value;
        const lease: Lease = { taskId: task.id, controller: new AbortController() };
        this.lease = lease;

        try {
            await withLogContext({ taskId: task.id, workerId: this.id, correlationId: uuidv7() }, () => this.execute(task, lease));
        } finally {
            this.lease = null;
        }
    }

    private async execute(task: Task, lease: Lease): Promise<void> {
        const log = createTaskLogger({ taskId: task.id, run: task.runCount }, this.logger);
        await this.publish({ type: "TASK_STARTED", taskId: task.id, workerId: this.id });

        const definition = this.deps.registry.get(task.kind);
        if (!definition) {
            await this.fail(task.id, `no pipeline registered for kind ${task.kind}`, "internal", log);
            return;
        }

        let outputRef: string;
        try {
            log.info({ kind: task.kind, inputRef: task.inputRef }, "Executing task");
            outputRef = await runPipeline(definition, task, {
                store: this.deps.store,
                workerId: this.id,
                signal: lease.controller.signal,
                logger: log,
                audit: this.deps.audit,
                onProgress: (stage, progress) => this.publish({ type: "TASK_PROGRESS", taskId: task.id, stage, progress }),
            });
        } catch (error) {
            await this.handleFailure(task.id, error, lease, log);
            return;
        }

        const completed = await this.deps.store.transition(task.id, { status: "completed", outputRef }, this.id);
        if (!completed.ok) {
            log.warn({ reason: describeStoreError(completed.error) }, "Result discarded: task already finished elsewhere");
            return;
        }
        log.info({ outputRef }, "Task completed");
        await this.publish({ type: "TASK_COMPLETED", taskId: task.id, outputRef });
    }

    private async handleFailure(taskId: string, error: unknown, lease: Lease, log: Logger): Promise<void> {
        if (error instanceof TaskCancelledError) {
            log.info("Task cancelled; result discarded");
            return;
        }
        if (error instanceof LeaseLostError) {
            log.warn({ reason: error.message }, "Lease lost");
            // A revoked lease is also failed by whoever revoked it; the guarded write lets one of us win.
            // Any other loss means the task moved on without us, so nothing is written.
            if (lease.revokedAs) await this.fail(taskId, error.message, lease.revokedAs, log);
            return;
        }
        const kind: TaskErrorKind = error instanceof StageFailedError ? "stage" : "internal";
        log.error({ error, errorKind: kind }, "Task failed");
        await this.fail(taskId, extractErrorMessage(error), kind, log);
    }

    private async fail(taskId: string, message: string, errorKind: TaskErrorKind, log: Logger): Promise<void> {
        const failed = await this.deps.store.transition(taskId, { status: "failed", error: message, errorKind }, this.id);
        if (!failed.ok) {
            log.debug({ reason: describeStoreError(failed.error) }, "Failure not recorded: task already finished");
            return;
        }
        await this.publish({ type: "TASK_FAILED", taskId, error: message, errorKind });
    }

    private async publish(event: TaskEvent): Promise<void> {
        if (!this.deps.publishTaskEvent) return;
        try {
            await this.deps.publishTaskEvent(event);
        } catch (error) {
            this.logger.error({ error, event: event.type }, "Failed to publish task event");
        }
    }
}
