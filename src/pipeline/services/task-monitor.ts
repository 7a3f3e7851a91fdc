import type { TaskStore } from "../../shared/services/task-store.js";
import type { CallAuditLog } from "../../shared/services/call-audit-log.js";
import type { Task, TaskEvent } from "../../shared/types/task.types.js";
import { logger as rootLogger } from "../../shared/logger.js";
import type { Logger } from "../../shared/logger.js";
import { describeStoreError } from "../../shared/utils/errors.js";
import type { TaskQueue } from "./task-queue.js";



export interface TaskMonitorDeps {
    store: TaskStore;
    queue: TaskQueue;
    audit: CallAuditLog;
    taskTimeoutMs: number;
    /** Called after a timed-out task is failed, to stop whoever still runs it. */
    onTimeout: (task: Task) => void;
    publishTaskEvent?: (event: TaskEvent) => Promise<void>;
    clock?: () => number;
    logger?: Logger;
}

export interface MaintenanceReport {
    timedOut: string[];
    requeued: string[];
    newlyFailed: string[];
    flushed: number;
}

/**
 * Periodic housekeeping: reclaims tasks that ran too long, picks up pending
 * tasks nobody queued (submitted by another process), reports failures and
 * flushes the call audit log.
 */
export class TaskMonitor {
    private interval: NodeJS.Timeout | null = null;
    private cycle: Promise<MaintenanceReport> | null = null;
    private reportedFailures = new Set<string>();
    private logger: Logger;

    constructor(private deps: TaskMonitorDeps) {
        this.logger = (deps.logger ?? rootLogger).child({ component: "task-monitor" });
    }

    get isRunning(): boolean {
        return this.interval !== null;
    }

    start(frequencyMs: number) {
        if (this.interval) return;
        this.interval = setInterval(() => {
            this.runCycle().catch((error) => this.logger.error({ error }, "maintenanceCycle failed"));
        }, frequencyMs);
        this.interval.unref();
    }

    /** Stops the timer and waits for a cycle in flight. */
    async stop(): Promise<void> {
        if (this.interval) clearInterval(this.interval);
        this.interval = null;
        if (this.cycle) await this.cycle;
    }

    /** One cycle at a time; overlapping ticks are skipped. */
    private async runCycle(): Promise<void> {
        if (this.cycle) return;
        this.cycle = this.maintenanceCycle();
        try {
            await this.cycle;
        } finally {
            this.cycle = null;
        }
    }

    async maintenanceCycle(): Promise<MaintenanceReport> {
        const report: MaintenanceReport = { timedOut: [], requeued: [], newlyFailed: [], flushed: 0 };

        await this.step("processTimedOutTasks", async () => { report.timedOut = await this.processTimedOutTasks(); });
        await this.step("processOrphanedTasks", async () => { report.requeued = await this.processOrphanedTasks(); });
        await this.step("reportFailedTasks", async () => { report.newlyFailed = await this.reportFailedTasks(); });
        await this.step("flushAuditLog", async () => { report.flushed = await this.deps.audit.flush(); });

        return report;
    }

    /**
     * RECLAIM: Fails running tasks past the timeout and revokes their lease.
     */
    private async processTimedOutTasks(): Promise<string[]> {
        const now = (this.deps.clock ?? Date.now)();
        const running = await this.deps.store.list("running");
        const reclaimed: string[] = [];

        for (const task of running) {
            if (!task.startedAt || now - task.startedAt.getTime() <= this.deps.taskTimeoutMs) continue;

            const error = `task exceeded timeout of ${formatDuration(this.deps.taskTimeoutMs)}`;
            const failed = await this.deps.store.transition(task.id, { status: "failed", error, errorKind: "timeout" });
            if (!failed.ok) {
                this.logger.debug({ taskId: task.id, reason: describeStoreError(failed.error) }, "Timed-out task already finished");
                continue;
            }

            this.logger.warn({ taskId: task.id, workerId: task.workerId, startedAt: task.startedAt }, "Task timed out");
            reclaimed.push(task.id);
            this.deps.onTimeout(failed.value);
            await this.publish({ type: "TASK_FAILED", taskId: task.id, error, errorKind: "timeout" });
        }
        return reclaimed;
    }

    /**
     * RECOVERY: Queues pending tasks that are not in the queue, oldest first.
     */
    private async processOrphanedTasks(): Promise<string[]> {
        const pending = await this.deps.store.list("pending");
        const requeued: string[] = [];

        for (const task of [ ...pending ].reverse()) {
            if (this.deps.queue.has(task.id)) continue;
            this.deps.queue.enqueue({ taskId: task.id, kind: task.kind, inputRef: task.inputRef, enqueuedAt: new Date() });
            requeued.push(task.id);
            await this.publish({ type: "TASK_REQUEUED", taskId: task.id, reason: "orphaned" });
        }
        if (requeued.length > 0) this.logger.info({ tasks: requeued }, `Queued ${requeued.length} orphaned pending task(s)`);
        return requeued;
    }

    /** Logs each failed task once per process. */
    private async reportFailedTasks(): Promise<string[]> {
        const failed = await this.deps.store.list("failed");
        const current = new Set(failed.map(task => task.id));
        const fresh = failed.filter(task => !this.reportedFailures.has(task.id));

        for (const task of fresh) {
            this.logger.error({ taskId: task.id, errorKind: task.errorKind, error: task.error }, "Task failed");
        }
        // Forget tasks that left `failed` (retried), so a second failure is reported again.
        this.reportedFailures = current;
        return fresh.map(task => task.id);
    }

    private async step(name: string, fn: () => Promise<void>): Promise<void> {
        try {
            await fn();
        } catch (error) {
            this.logger.error({ error }, `${name} failed`);
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

const formatDuration = (ms: number) => ms >= 1000 ? `${Math.round(ms / 1000)}s` : `${ms}ms`;
