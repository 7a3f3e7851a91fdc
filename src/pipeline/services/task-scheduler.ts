import { v7 as uuidv7 } from "uuid";
import type { SchedulerConfig } from "../../shared/config.js";
import type { Stores } from "../../shared/services/task-store.js";
import { CallAuditLog } from "../../shared/services/call-audit-log.js";
import type { JsonObject, Task, TaskCounts, TaskEvent, TaskStatus } from "../../shared/types/task.types.js";
import { err, ok } from "../../shared/utils/result.js";
import type { Result } from "../../shared/utils/result.js";
import { describeStoreError } from "../../shared/utils/errors.js";
import { shortId } from "../../shared/utils/utils.js";
import { logger as rootLogger } from "../../shared/logger.js";
import type { Logger } from "../../shared/logger.js";
import type { PipelineRegistry } from "../pipeline-runner.js";
import { TaskWorker } from "../../worker/task-worker.js";
import { TaskQueue } from "./task-queue.js";
import { TaskMonitor } from "./task-monitor.js";
import type { MaintenanceReport } from "./task-monitor.js";



export type SubmitError =
    | { kind: "unknown_kind"; taskKind: string; }
    | { kind: "duplicate_task"; taskId: string; };

export type SchedulerError =
    | { kind: "not_found"; taskId: string; }
    | { kind: "not_failed"; taskId: string; status: TaskStatus; }
    | { kind: "not_running"; taskId: string; status: TaskStatus; };

export interface SchedulerStats {
    workerCount: number;
    activeWorkers: number;
    queueDepth: number;
    countByStatus: TaskCounts;
}

export interface RecoveryReport {
    requeued: string[];
    workerLost: string[];
}

export interface TaskSchedulerDeps {
    stores: Stores;
    registry: PipelineRegistry;
    config: SchedulerConfig;
    queue?: TaskQueue;
    publishTaskEvent?: (event: TaskEvent) => Promise<void>;
    clock?: () => number;
    logger?: Logger;
}

export const newTaskId = (kind: string) => `${kind}_${uuidv7()}`;

export function describeSchedulerError(error: SubmitError | SchedulerError): string {
    switch (error.kind) {
        case "unknown_kind":
            return `no pipeline registered for kind ${error.taskKind}`;
        case "duplicate_task":
            return `task ${error.taskId} already exists`;
        case "not_found":
            return `task ${error.taskId} not found`;
        case "not_failed":
            return `task ${error.taskId} is ${error.status}; only failed tasks can be retried`;
        case "not_running":
            return `task ${error.taskId} is ${error.status}; only running tasks can be cancelled`;
    }
}

/**
 * Operator-facing entry point: submits, inspects, retries and cancels tasks,
 * and owns the worker pool and the monitor.
 */
export class TaskScheduler {
    readonly queue: TaskQueue;
    readonly audit: CallAuditLog;
    readonly monitor: TaskMonitor;
    private workers: TaskWorker[] = [];
    private runs: Promise<void>[] = [];
    private loops: AbortController | null = null;
    private logger: Logger;

    constructor(private deps: TaskSchedulerDeps) {
        this.logger = (deps.logger ?? rootLogger).child({ component: "task-scheduler" });
        this.queue = deps.queue ?? new TaskQueue();
        this.audit = new CallAuditLog(deps.stores.calls);
        this.monitor = new TaskMonitor({
            store: deps.stores.tasks,
            queue: this.queue,
            audit: this.audit,
            taskTimeoutMs: deps.config.taskTimeoutMs,
            onTimeout: (task) => this.revokeLease(task.id, "timeout", "task timed out"),
            publishTaskEvent: deps.publishTaskEvent,
            clock: deps.clock,
            logger: this.logger,
        });
    }

    get isRunning(): boolean {
        return this.loops !== null;
    }

    async submit(kind: string, inputRef: string, params: JsonObject = {}, taskId = newTaskId(kind)): Promise<Result<string, SubmitError>> {
        if (!this.deps.registry.has(kind)) {
            return err({ kind: "unknown_kind", taskKind: kind });
        }

        const created = await this.deps.stores.tasks.create({ id: taskId, kind, inputRef, params });
        if (!created.ok) {
            return err({ kind: "duplicate_task", taskId });
        }

        this.queue.enqueue({ taskId, kind, inputRef, enqueuedAt: new Date() });
        this.logger.info({ taskId, kind, inputRef }, "Task submitted");
        await this.publish({ type: "TASK_SUBMITTED", taskId, kind });
        return ok(taskId);
    }

    async status(taskId: string): Promise<Result<Task, SchedulerError>> {
        const task = await this.deps.stores.tasks.get(taskId);
        return task.ok ? ok(task.value) : err({ kind: "not_found", taskId });
    }

    async listByStatus(status?: TaskStatus): Promise<Task[]> {
        return this.deps.stores.tasks.list(status);
    }

    async stats(): Promise<SchedulerStats> {
        return {
            workerCount: this.deps.config.workerCount,
            activeWorkers: this.workers.filter(worker => worker.currentTaskId !== null).length,
            queueDepth: this.queue.size(),
            countByStatus: await this.deps.stores.tasks.countByStatus(),
        };
    }

    /** Puts a failed task back to pending with a clean slate and queues it. */
    async retry(taskId: string): Promise<Result<Task, SchedulerError>> {
        const reopened = await this.deps.stores.tasks.reopen(taskId);
        if (!reopened.ok) {
            const { error } = reopened;
            return err(error.kind === "invalid_transition"
                ? { kind: "not_failed", taskId, status: error.from }
                : { kind: "not_found", taskId });
        }

        const task = reopened.value;
        this.queue.enqueue({ taskId, kind: task.kind, inputRef: task.inputRef, enqueuedAt: new Date() });
        this.logger.info({ taskId }, "Task queued for retry");
        await this.publish({ type: "TASK_REQUEUED", taskId, reason: "retry" });
        return ok(task);
    }

    /**
     * Marks a running task cancelled. Advisory: the worker keeps going until it
     * next checks the task, then discards what it produced.
     */
    async cancel(taskId: string): Promise<Result<Task, SchedulerError>> {
        const cancelled = await this.deps.stores.tasks.transition(taskId, { status: "cancelled" });
        if (!cancelled.ok) {
            const { error } = cancelled;
            return err(error.kind === "invalid_transition"
                ? { kind: "not_running", taskId, status: error.from }
                : { kind: "not_found", taskId });
        }

        this.logger.info({ taskId }, "Task cancelled");
        await this.publish({ type: "TASK_CANCELLED", taskId });
        return ok(cancelled.value);
    }

    /**
     * Recovers durable state left by a previous process, then starts the workers
     * and the monitor.
     */
    async start(): Promise<RecoveryReport> {
        if (this.loops) throw new Error("scheduler already started");

        const recovery = await this.recover();
        this.loops = new AbortController();
        const signal = this.loops.signal;

        this.workers = Array.from({ length: this.deps.config.workerCount }, (_, index) =>
            new TaskWorker(`worker-${index + 1}-${shortId(uuidv7())}`, {
                store: this.deps.stores.tasks,
                queue: this.queue,
                registry: this.deps.registry,
                dequeueTimeoutMs: this.deps.config.dequeueTimeoutMs,
                audit: this.audit,
                publishTaskEvent: this.deps.publishTaskEvent,
                logger: this.logger,
            }));
        this.runs = this.workers.map(worker => worker.run(signal));
        this.monitor.start(this.deps.config.monitorIntervalMs);

        this.logger.info({ workers: this.workers.length, ...recovery }, "Scheduler started");
        return recovery;
    }

    /**
     * Stops accepting work, gives running tasks `stopTimeoutMs` to finish, then
     * fails the rest with `shutdown` and flushes the audit log.
     */
    async stop(): Promise<void> {
        if (!this.loops) return;
        this.logger.info("Stopping scheduler");

        this.loops.abort();
        await this.monitor.stop();

        const finished = await settlesWithin(Promise.all(this.runs), this.deps.config.stopTimeoutMs);
        if (!finished) {
            for (const worker of this.workers) {
                const taskId = worker.currentTaskId;
                if (!taskId) continue;

                worker.revokeLease(taskId, "shutdown", "scheduler stopped");
                const failed = await this.deps.stores.tasks.transition(taskId, {
                    status: "failed", error: "aborted by scheduler shutdown", errorKind: "shutdown"
                });
                if (failed.ok) {
                    this.logger.warn({ taskId, workerId: worker.id }, "Task aborted by shutdown");
                    await this.publish({ type: "TASK_FAILED", taskId, error: "aborted by scheduler shutdown", errorKind: "shutdown" });
                } else {
                    this.logger.debug({ taskId, reason: describeStoreError(failed.error) }, "Task finished during shutdown");
                }
            }
            await settlesWithin(Promise.all(this.runs), this.deps.config.stopTimeoutMs);
        }

        await this.audit.flush();
        this.queue.clear();
        this.workers = [];
        this.runs = [];
        this.loops = null;
        this.logger.info("Scheduler stopped");
    }

    /** Runs one monitor cycle now. */
    async maintain(): Promise<MaintenanceReport> {
        return this.monitor.maintenanceCycle();
    }

    /**
     * Pending tasks are queued again, oldest first. Running tasks belong to a
     * process that is gone: they are failed with `worker_lost`.
     */
    private async recover(): Promise<RecoveryReport> {
        const report: RecoveryReport = { requeued: [], workerLost: [] };

        for (const task of await this.deps.stores.tasks.list("running")) {
            const error = `worker ${task.workerId ?? "unknown"} lost before the task finished`;
            const failed = await this.deps.stores.tasks.transition(task.id, { status: "failed", error, errorKind: "worker_lost" });
            if (!failed.ok) continue;
            report.workerLost.push(task.id);
            await this.publish({ type: "TASK_FAILED", taskId: task.id, error, errorKind: "worker_lost" });
        }

        const pending = await this.deps.stores.tasks.list("pending");
        for (const task of [ ...pending ].reverse()) {
            if (!this.queue.enqueue({ taskId: task.id, kind: task.kind, inputRef: task.inputRef, enqueuedAt: new Date() })) continue;
            report.requeued.push(task.id);
            await this.publish({ type: "TASK_REQUEUED", taskId: task.id, reason: "recovery" });
        }

        if (report.workerLost.length > 0 || report.requeued.length > 0) {
            this.logger.info(report, "Recovered tasks from previous run");
        }
        return report;
    }

    private revokeLease(taskId: string, kind: "timeout" | "shutdown", reason: string): void {
        for (const worker of this.workers) {
            if (worker.revokeLease(taskId, kind, reason)) return;
        }
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

/** @returns whether `promise` settled before `ms` elapsed. */
async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>(resolve => { timer = setTimeout(() => resolve(false), ms); });
    try {
        return await Promise.race([ promise.then(() => true), timeout ]);
    } finally {
        clearTimeout(timer);
    }
}
