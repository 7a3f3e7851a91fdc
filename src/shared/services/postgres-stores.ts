import { and, asc, desc, eq, lte, sql, SQL } from "drizzle-orm";
import type { PgUpdateSetSource } from "drizzle-orm/pg-core";
import { createDatabase, createPool, ensureSchema, schema } from "../db/index.js";
import type { Database } from "../db/index.js";
import type { TaskRow } from "../db/schema.js";
import { logger } from "../logger.js";
import { err, ok } from "../utils/result.js";
import type { Result } from "../utils/result.js";
import { emptyTaskCounts } from "../types/task.types.js";
import type {
    JsonObject, NewTask, StageUnit, StageUnitPatch, StoreError, Task, TaskCounts, TaskStatus, TerminalFields
} from "../types/task.types.js";
import type { CallRecord, CallRecordQuery, NewCallRecord, OperationCallSummary } from "../types/supervised-call.types.js";
import { clampProgress, summarizeCalls } from "./task-store.js";
import type { CallRecordStore, StageUnitStore, Stores, TaskStore } from "./task-store.js";



const { tasks, stageUnits, supervisedCalls } = schema;

const toTask = (row: TaskRow): Task => ({ ...row });

/**
 * Task store on Postgres. Every status move is a single conditional UPDATE
 * guarded on the expected current status, so concurrent callers race on the row
 * and exactly one wins.
 */
export class PostgresTaskStore implements TaskStore {

    constructor(private db: Database) { }

    async create(input: NewTask): Promise<Result<Task, StoreError>> {
        const [ row ] = await this.db.insert(tasks).values({
            id: input.id,
            kind: input.kind,
            inputRef: input.inputRef,
            params: input.params ?? {},
        })
            .onConflictDoNothing({ target: tasks.id })
            .returning();

        return row ? ok(toTask(row)) : err({ kind: "already_exists", taskId: input.id });
    }

    async get(taskId: string): Promise<Result<Task, StoreError>> {
        const [ row ] = await this.db.select().from(tasks).where(eq(tasks.id, taskId)).limit(1);
        return row ? ok(toTask(row)) : err({ kind: "not_found", taskId });
    }

    async list(status?: TaskStatus): Promise<Task[]> {
        const rows = await this.db.select()
            .from(tasks)
            .where(status ? eq(tasks.status, status) : undefined)
            .orderBy(desc(tasks.createdAt), desc(tasks.id));
        return rows.map(toTask);
    }

    async claim(taskId: string, workerId: string): Promise<Result<Task, StoreError>> {
        return this.guardedUpdate(taskId, "pending", "running", {
            status: "running",
            workerId,
            startedAt: new Date(),
            completedAt: null,
            runCount: sql`${tasks.runCount} + 1`,
        });
    }

    async transition(taskId: string, fields: TerminalFields, ownerId?: string): Promise<Result<Task, StoreError>> {
        const completedAt = new Date();
        switch (fields.status) {
            case "completed":
                return this.guardedUpdate(taskId, "running", "completed", {
                    status: "completed", outputRef: fields.outputRef, progress: 1, completedAt
                }, ownerId);
            case "failed":
                return this.guardedUpdate(taskId, "running", "failed", {
                    status: "failed", error: fields.error, errorKind: fields.errorKind, completedAt
                }, ownerId);
            case "cancelled":
                return this.guardedUpdate(taskId, "running", "cancelled", { status: "cancelled", completedAt }, ownerId);
        }
    }

    async advance(taskId: string, progress: number, statePatch?: JsonObject, ownerId?: string): Promise<Result<Task, StoreError>> {
        const next = clampProgress(progress);
        const [ row ] = await this.db.update(tasks)
            .set({
                progress: next,
                state: statePatch ? sql`${tasks.state} || ${JSON.stringify(statePatch)}::jsonb` : undefined,
                updatedAt: new Date(),
            })
            .where(and(
                eq(tasks.id, taskId),
                eq(tasks.status, "running"),
                lte(tasks.progress, next),
                ownerId !== undefined ? eq(tasks.workerId, ownerId) : undefined
            ))
            .returning();

        if (row) return ok(toTask(row));
        return this.explainMiss(taskId, "progress");
    }

    async reopen(taskId: string): Promise<Result<Task, StoreError>> {
        return this.guardedUpdate(taskId, "failed", "pending", {
            status: "pending",
            progress: 0,
            state: {},
            outputRef: null,
            error: null,
            errorKind: null,
            workerId: null,
            startedAt: null,
            completedAt: null,
        });
    }

    async countByStatus(): Promise<TaskCounts> {
        const rows = await this.db
            .select({ status: tasks.status, count: sql<number>`count(*)::int` })
            .from(tasks)
            .groupBy(tasks.status);

        const counts = emptyTaskCounts();
        for (const row of rows) counts[ row.status ] = Number(row.count);
        return counts;
    }

    private async guardedUpdate(
        taskId: string,
        from: TaskStatus,
        to: TaskStatus,
        updates: PgUpdateSetSource<typeof tasks>,
        ownerId?: string
    ): Promise<Result<Task, StoreError>> {
        const [ row ] = await this.db.update(tasks)
            .set({ ...updates, updatedAt: new Date() })
            .where(and(
                eq(tasks.id, taskId),
                eq(tasks.status, from),
                ownerId !== undefined ? eq(tasks.workerId, ownerId) : undefined
            ))
            .returning();

        if (row) return ok(toTask(row));
        return this.explainMiss(taskId, to);
    }

    /** A guarded update matched nothing: either the row is gone or its status moved. */
    private async explainMiss(taskId: string, to: TaskStatus | "progress"): Promise<Result<Task, StoreError>> {
        const current = await this.get(taskId);
        if (!current.ok) return current;

        logger.warn({ taskId, from: current.value.status, to }, "Guarded task update rejected");
        return err({ kind: "invalid_transition", taskId, from: current.value.status, to });
    }
}

export class PostgresStageUnitStore implements StageUnitStore {

    constructor(private db: Database) { }

    async replaceUnits(taskId: string, units: StageUnit[]): Promise<void> {
        await this.db.transaction(async (tx) => {
            await tx.delete(stageUnits).where(eq(stageUnits.taskId, taskId));
            if (units.length === 0) return;
            await tx.insert(stageUnits).values(units.map(unit => ({ ...unit, taskId })));
        });
    }

    async updateUnit(taskId: string, sequence: number, patch: StageUnitPatch): Promise<StageUnit | null> {
        const [ row ] = await this.db.update(stageUnits)
            .set(patch)
            .where(and(eq(stageUnits.taskId, taskId), eq(stageUnits.sequence, sequence)))
            .returning();
        return row ?? null;
    }

    async listUnits(taskId: string): Promise<StageUnit[]> {
        return this.db.select()
            .from(stageUnits)
            .where(eq(stageUnits.taskId, taskId))
            .orderBy(asc(stageUnits.sequence));
    }
}

export class PostgresCallRecordStore implements CallRecordStore {

    constructor(private db: Database) { }

    async append(records: NewCallRecord[]): Promise<void> {
        if (records.length === 0) return;
        await this.db.insert(supervisedCalls).values(records.map(record => ({
            ...record,
            // jsonb columns reject values JSON cannot carry
            request: JSON.parse(JSON.stringify(record.request ?? null)),
            response: JSON.parse(JSON.stringify(record.response ?? null)),
        })));
    }

    async list(query: CallRecordQuery = {}): Promise<CallRecord[]> {
        const conditions: SQL[] = [];
        if (query.taskId) conditions.push(eq(supervisedCalls.taskId, query.taskId));
        if (query.operation) conditions.push(eq(supervisedCalls.operation, query.operation));
        if (query.outcome) conditions.push(eq(supervisedCalls.outcome, query.outcome));

        const base = this.db.select()
            .from(supervisedCalls)
            .where(conditions.length > 0 ? and(...conditions) : undefined)
            .orderBy(desc(supervisedCalls.createdAt), desc(supervisedCalls.id));

        const rows = query.limit !== undefined ? await base.limit(query.limit) : await base;
        return rows.reverse();
    }

    async summarize(taskId?: string): Promise<OperationCallSummary[]> {
        return summarizeCalls(await this.list({ taskId }));
    }
}

export async function createPostgresStores(connectionString: string): Promise<Stores> {
    const pool = createPool(connectionString);
    await ensureSchema(pool);
    const db = createDatabase(pool);

    return {
        tasks: new PostgresTaskStore(db),
        units: new PostgresStageUnitStore(db),
        calls: new PostgresCallRecordStore(db),
        close: async () => {
            await pool.end();
            logger.info("Postgres pool closed successfully.");
        },
    };
}
