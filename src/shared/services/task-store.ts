import { Result } from "../utils/result.js";
import {
    JsonObject, NewTask, StageUnit, StageUnitPatch, StoreError, Task, TaskCounts, TaskStatus, TerminalFields
} from "../types/task.types.js";
import { CallRecord, CallRecordQuery, NewCallRecord, OperationCallSummary, UsageMetrics } from "../types/supervised-call.types.js";



/**
 * Durable record of every task: the source of truth across restarts.
 *
 * Writes are atomic per task row. Status moves follow the task state machine:
 * `pending -> running -> completed | failed | cancelled`, and `failed -> pending`
 * only through {@link TaskStore.reopen}. Every write bumps `updatedAt`.
 */
export interface TaskStore {
    create(task: NewTask): Promise<Result<Task, StoreError>>;
    get(taskId: string): Promise<Result<Task, StoreError>>;
    /** Newest first. */
    list(status?: TaskStatus): Promise<Task[]>;
    /** `pending -> running` for exactly one caller. */
    claim(taskId: string, workerId: string): Promise<Result<Task, StoreError>>;
    /**
     * `running -> completed | failed | cancelled`. With `ownerId`, only while
     * that worker still holds the task.
     */
    transition(taskId: string, fields: TerminalFields, ownerId?: string): Promise<Result<Task, StoreError>>;
    /**
     * Progress must not decrease; the state patch is merged shallowly. With
     * `ownerId`, only while that worker still holds the task.
     */
    advance(taskId: string, progress: number, statePatch?: JsonObject, ownerId?: string): Promise<Result<Task, StoreError>>;
    /** `failed -> pending`, clearing the error and resetting progress. */
    reopen(taskId: string): Promise<Result<Task, StoreError>>;
    countByStatus(): Promise<TaskCounts>;
}

export interface StageUnitStore {
    replaceUnits(taskId: string, units: StageUnit[]): Promise<void>;
    updateUnit(taskId: string, sequence: number, patch: StageUnitPatch): Promise<StageUnit | null>;
    listUnits(taskId: string): Promise<StageUnit[]>;
}

/** Append-only audit of external calls. Never consulted for scheduling. */
export interface CallRecordStore {
    append(records: NewCallRecord[]): Promise<void>;
    list(query?: CallRecordQuery): Promise<CallRecord[]>;
    summarize(taskId?: string): Promise<OperationCallSummary[]>;
}

export interface Stores {
    tasks: TaskStore;
    units: StageUnitStore;
    calls: CallRecordStore;
    close(): Promise<void>;
}

export const ALLOWED_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
    pending: [ "running" ],
    running: [ "completed", "failed", "cancelled" ],
    failed: [ "pending" ],
    completed: [],
    cancelled: [],
};

export const canTransition = (from: TaskStatus, to: TaskStatus): boolean =>
    ALLOWED_TRANSITIONS[ from ].includes(to);

export const clampProgress = (progress: number): number =>
    Math.min(1, Math.max(0, Number.isFinite(progress) ? progress : 0));

export function summarizeCalls(records: CallRecord[]): OperationCallSummary[] {
    const byOperation = new Map<string, CallRecord[]>();
    for (const record of records) {
        const bucket = byOperation.get(record.operation) ?? [];
        bucket.push(record);
        byOperation.set(record.operation, bucket);
    }

    return [ ...byOperation.entries() ]
        .sort(([ a ], [ b ]) => a.localeCompare(b))
        .map(([ operation, calls ]) => {
            const errors = calls.filter(c => c.outcome === "error").length;
            const usage: UsageMetrics = {};
            for (const call of calls) {
                for (const [ key, value ] of Object.entries(call.usage ?? {})) {
                    if (typeof value === "number") usage[ key ] = (usage[ key ] ?? 0) + value;
                }
            }
            return {
                operation,
                calls: calls.length,
                errors,
                errorRate: errors / calls.length,
                meanLatencyMs: calls.reduce((sum, c) => sum + c.latencyMs, 0) / calls.length,
                usage,
            };
        });
}
