import { v7 as uuidv7 } from "uuid";
import { err, ok, Result } from "../utils/result.js";
import {
    emptyTaskCounts, JsonObject, NewTask, StageUnit, StageUnitPatch, StoreError, Task, TaskCounts, TaskStatus, TerminalFields
} from "../types/task.types.js";
import { CallRecord, CallRecordQuery, NewCallRecord, OperationCallSummary } from "../types/supervised-call.types.js";
import { CallRecordStore, canTransition, clampProgress, StageUnitStore, Stores, summarizeCalls, TaskStore } from "./task-store.js";



type Clock = () => Date;

/**
 * Process-local task store. Same contract as the Postgres store; used by tests
 * and by `STORE_BACKEND=memory` runs where durability is not needed.
 */
export class InMemoryTaskStore implements TaskStore {
    private rows = new Map<string, { task: Task; seq: number; }>();
    private seq = 0;

    constructor(private now: Clock = () => new Date()) { }

    async create(input: NewTask): Promise<Result<Task, StoreError>> {
        if (this.rows.has(input.id)) {
            return err({ kind: "already_exists", taskId: input.id });
        }
        const at = this.now();
        const task: Task = {
            id: input.id,
            kind: input.kind,
            status: "pending",
            inputRef: input.inputRef,
            outputRef: null,
            progress: 0,
            params: structuredClone(input.params ?? {}),
            state: {},
            error: null,
            errorKind: null,
            workerId: null,
            runCount: 0,
            createdAt: at,
            updatedAt: at,
            startedAt: null,
            completedAt: null,
        };
        this.rows.set(task.id, { task, seq: this.seq++ });
        return ok(structuredClone(task));
    }

    async get(taskId: string): Promise<Result<Task, StoreError>> {
        const row = this.rows.get(taskId);
        return row ? ok(structuredClone(row.task)) : err({ kind: "not_found", taskId });
    }

    async list(status?: TaskStatus): Promise<Task[]> {
        return [ ...this.rows.values() ]
            .filter(row => !status || row.task.status === status)
            .sort((a, b) => b.task.createdAt.getTime() - a.task.createdAt.getTime() || b.seq - a.seq)
            .map(row => structuredClone(row.task));
    }

    async claim(taskId: string, workerId: string): Promise<Result<Task, StoreError>> {
        return this.update(taskId, "running", undefined, (task, at) => ({
            ...task,
            status: "running",
            workerId,
            startedAt: at,
            completedAt: null,
            runCount: task.runCount + 1,
        }));
    }

    async transition(taskId: string, fields: TerminalFields, ownerId?: string): Promise<Result<Task, StoreError>> {
        return this.update(taskId, fields.status, ownerId, (task, at) => {
            switch (fields.status) {
                case "completed":
                    return { ...task, status: "completed", outputRef: fields.outputRef, progress: 1, completedAt: at };
                case "failed":
                    return { ...task, status: "failed", error: fields.error, errorKind: fields.errorKind, completedAt: at };
                case "cancelled":
                    return { ...task, status: "cancelled", completedAt: at };
            }
        });
    }

    async advance(taskId: string, progress: number, statePatch?: JsonObject, ownerId?: string): Promise<Result<Task, StoreError>> {
        const row = this.rows.get(taskId);
        if (!row) return err({ kind: "not_found", taskId });

        const next = clampProgress(progress);
        const foreign = ownerId !== undefined && row.task.workerId !== ownerId;
        if (row.task.status !== "running" || foreign || next < row.task.progress) {
            return err({ kind: "invalid_transition", taskId, from: row.task.status, to: "progress" });
        }
        row.task = {
            ...row.task,
            progress: next,
            state: statePatch ? { ...row.task.state, ...structuredClone(statePatch) } : row.task.state,
            updatedAt: this.now(),
        };
        return ok(structuredClone(row.task));
    }

    async reopen(taskId: string): Promise<Result<Task, StoreError>> {
        return this.update(taskId, "pending", undefined, task => ({
            ...task,
            status: "pending",
            progress: 0,
            state: {},
            outputRef: null,
            error: null,
            errorKind: null,
            workerId: null,
            startedAt: null,
            completedAt: null,
        }));
    }

    async countByStatus(): Promise<TaskCounts> {
        const counts = emptyTaskCounts();
        for (const { task } of this.rows.values()) counts[ task.status ]++;
        return counts;
    }

    private update(
        taskId: string,
        to: TaskStatus,
        ownerId: string | undefined,
        apply: (task: Task, at: Date) => Task
    ): Result<Task, StoreError> {
        const row = this.rows.get(taskId);
        if (!row) return err({ kind: "not_found", taskId });
        if (!canTransition(row.task.status, to) || (ownerId !== undefined && row.task.workerId !== ownerId)) {
            return err({ kind: "invalid_transition", taskId, from: row.task.status, to });
        }
        const at = this.now();
        row.task = { ...apply(row.task, at), updatedAt: at };
        return ok(structuredClone(row.task));
    }
}

export class InMemoryStageUnitStore implements StageUnitStore {
    private units = new Map<string, StageUnit[]>();

    async replaceUnits(taskId: string, units: StageUnit[]): Promise<void> {
        this.units.set(taskId, [ ...units ].sort((a, b) => a.sequence - b.sequence).map(u => ({ ...u, taskId })));
    }

    async updateUnit(taskId: string, sequence: number, patch: StageUnitPatch): Promise<StageUnit | null> {
        const units = this.units.get(taskId) ?? [];
        const index = units.findIndex(u => u.sequence === sequence);
        if (index === -1) return null;
        units[ index ] = { ...units[ index ], ...patch };
        return { ...units[ index ] };
    }

    async listUnits(taskId: string): Promise<StageUnit[]> {
        return (this.units.get(taskId) ?? []).map(u => ({ ...u }));
    }
}

export class InMemoryCallRecordStore implements CallRecordStore {
    private records: CallRecord[] = [];

    constructor(private now: Clock = () => new Date()) { }

    async append(records: NewCallRecord[]): Promise<void> {
        for (const record of records) {
            this.records.push({ ...record, id: uuidv7(), createdAt: this.now() });
        }
    }

    async list(query: CallRecordQuery = {}): Promise<CallRecord[]> {
        const matches = this.records.filter(r =>
            (!query.taskId || r.taskId === query.taskId) &&
            (!query.operation || r.operation === query.operation) &&
            (!query.outcome || r.outcome === query.outcome)
        );
        return query.limit !== undefined ? matches.slice(-query.limit) : [ ...matches ];
    }

    async summarize(taskId?: string): Promise<OperationCallSummary[]> {
        return summarizeCalls(await this.list({ taskId }));
    }
}

export function createMemoryStores(now?: Clock): Stores {
    return {
        tasks: new InMemoryTaskStore(now),
        units: new InMemoryStageUnitStore(),
        calls: new InMemoryCallRecordStore(now),
        close: async () => { },
    };
}
