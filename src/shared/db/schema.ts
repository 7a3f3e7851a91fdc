import {
  pgTable, uuid, text, timestamp, integer,
  jsonb, real, pgEnum,
  index, primaryKey
} from "drizzle-orm/pg-core";
import { v7 as uuidv7 } from "uuid";
import { TASK_ERROR_KINDS, TASK_STATUSES } from "../types/task.types.js";
import type { JsonObject } from "../types/task.types.js";
import type { UsageMetrics } from "../types/supervised-call.types.js";
import { CALL_RECORD_TABLE, STAGE_UNIT_TABLE, TASK_TABLE } from "../constants.js";

// --- ENUMS ---
export const taskStatusEnum = pgEnum("task_status", TASK_STATUSES);
export const taskErrorKindEnum = pgEnum("task_error_kind", TASK_ERROR_KINDS);
export const callOutcomeEnum = pgEnum("call_outcome", [ "success", "error" ]);

// --- TABLES ---

export const tasks = pgTable(TASK_TABLE, {
  id: text("id").notNull().primaryKey(), // e.g. document-to-video_0192...
  kind: text("kind").notNull(),
  status: taskStatusEnum("status").default("pending").notNull(),
  inputRef: text("input_ref").notNull(),
  outputRef: text("output_ref"),
  progress: real("progress").default(0).notNull(),
  params: jsonb("params").$type<JsonObject>().default({}).notNull(),
  state: jsonb("state").$type<JsonObject>().default({}).notNull(),
  error: text("error"),
  errorKind: taskErrorKindEnum("error_kind"),
  workerId: text("worker_id"),
  runCount: integer("run_count").default(0).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  startedAt: timestamp("started_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
}, (t) => ({
  statusIdx: index("idx_tasks_status").on(t.status),
  createdIdx: index("idx_tasks_created_at").on(t.createdAt),
}));

export const stageUnits = pgTable(STAGE_UNIT_TABLE, {
  taskId: text("task_id").references(() => tasks.id, { onDelete: "cascade" }).notNull(),
  sequence: integer("sequence").notNull(),
  description: text("description").notNull(),
  narration: text("narration").default("").notNull(),
  sceneType: text("scene_type"),
  durationHint: real("duration_hint"),
  audioRef: text("audio_ref"),
  audioDurationSec: real("audio_duration_sec"),
  imageRef: text("image_ref"),
  clipRef: text("clip_ref"),
  composedRef: text("composed_ref"),
}, (t) => ({
  pk: primaryKey({ columns: [ t.taskId, t.sequence ] }),
}));

export const supervisedCalls = pgTable(CALL_RECORD_TABLE, {
  id: uuid("id").notNull().primaryKey().$defaultFn(() => uuidv7()),
  taskId: text("task_id").notNull(),
  operation: text("operation").notNull(),
  attempt: integer("attempt").notNull(),
  outcome: callOutcomeEnum("outcome").notNull(),
  latencyMs: integer("latency_ms").notNull(),
  request: jsonb("request").$type<unknown>(),
  response: jsonb("response").$type<unknown>(),
  usage: jsonb("usage").$type<UsageMetrics>(),
  error: text("error"),
  errorKind: text("error_kind"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (t) => ({
  taskIdx: index("idx_supervised_calls_task").on(t.taskId, t.createdAt),
  operationIdx: index("idx_supervised_calls_operation").on(t.operation),
}));

export type TaskRow = typeof tasks.$inferSelect;
export type StageUnitRow = typeof stageUnits.$inferSelect;
export type SupervisedCallRow = typeof supervisedCalls.$inferSelect;
