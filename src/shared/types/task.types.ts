//shared/types/task.types.ts

// ============================================================================
// TASK PROPERTIES
// ============================================================================

export const TASK_STATUSES = [
    "pending",
    "running",
    "completed",
    "failed",
    "cancelled"
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[ number ];

export const TASK_ERROR_KINDS = [
    "stage",
    "timeout",
    "worker_lost",
    "shutdown",
    "internal"
] as const;
export type TaskErrorKind = (typeof TASK_ERROR_KINDS)[ number ];

export type JsonObject = { [ key: string ]: unknown; };

// ============================================================================
// TASK RECORD
// ============================================================================

export interface Task {
    id: string;
    kind: string;
    status: TaskStatus;
    inputRef: string;
    outputRef: string | null;
    progress: number;
    params: JsonObject;
    /** Intermediate outputs persisted by completed stages of the current run. */
    state: JsonObject;
    error: string | null;
    errorKind: TaskErrorKind | null;
    workerId: string | null;
    runCount: number;
    createdAt: Date;
    updatedAt: Date;
    startedAt: Date | null;
    completedAt: Date | null;
}

export type NewTask = Pick<Task, "id" | "kind" | "inputRef"> & { params?: JsonObject; };

export type TerminalFields =
    | { status: "completed"; outputRef: string; }
    | { status: "failed"; error: string; errorKind: TaskErrorKind; }
    | { status: "cancelled"; };

/** What a worker pulls off the queue. Authoritative state stays in the store. */
export interface TaskDescriptor {
    taskId: string;
    kind: string;
    inputRef: string;
    enqueuedAt: Date;
}

// ============================================================================
// STAGE UNITS
// ============================================================================

export interface StageUnit {
    taskId: string;
    sequence: number;
    description: string;
    narration: string;
    sceneType: string | null;
    durationHint: number | null;
    audioRef: string | null;
    audioDurationSec: number | null;
    imageRef: string | null;
    clipRef: string | null;
    composedRef: string | null;
}

export type StageUnitPatch = Partial<Pick<StageUnit, "audioRef" | "audioDurationSec" | "imageRef" | "clipRef" | "composedRef">>;

export const isUnitComplete = (unit: StageUnit): boolean =>
    !!unit.audioRef && !!unit.imageRef && !!unit.clipRef;

// ============================================================================
// STORE ERRORS
// ============================================================================

export type StoreError =
    | { kind: "not_found"; taskId: string; }
    | { kind: "already_exists"; taskId: string; }
    | { kind: "invalid_transition"; taskId: string; from: TaskStatus; to: TaskStatus | "progress"; };

export type TaskCounts = Record<TaskStatus, number>;

export const emptyTaskCounts = (): TaskCounts => ({
    pending: 0,
    running: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
});

// ============================================================================
// TASK EVENTS
// ============================================================================

export type TaskEvent =
    | { type: "TASK_SUBMITTED"; taskId: string; kind: string; }
    | { type: "TASK_STARTED"; taskId: string; workerId: string; }
    | { type: "TASK_PROGRESS"; taskId: string; stage: string; progress: number; }
    | { type: "TASK_COMPLETED"; taskId: string; outputRef: string; }
    | { type: "TASK_FAILED"; taskId: string; error: string; errorKind: TaskErrorKind; }
    | { type: "TASK_CANCELLED"; taskId: string; }
    | { type: "TASK_REQUEUED"; taskId: string; reason: "retry" | "recovery" | "orphaned"; };
