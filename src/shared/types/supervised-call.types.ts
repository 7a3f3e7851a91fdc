//shared/types/supervised-call.types.ts
import { Result } from "../utils/result.js";



// ============================================================================
// PROVIDER FAULTS
// ============================================================================

/**
 * Structured error reported by an external generator.
 * `kind` is set by the provider adapter from the vendor's status/code fields.
 */
export type ProviderFaultKind = "policy" | "transient" | "invalid" | "quota";

export interface ProviderFault {
    kind: ProviderFaultKind;
    code: string;
    message: string;
    status?: number;
}

export interface UsageMetrics {
    inputTokens?: number;
    outputTokens?: number;
    units?: number;
    [ key: string ]: number | undefined;
}

// ============================================================================
// OPERATION SNAPSHOTS
// ============================================================================

export type OperationSnapshot<T> =
    | { state: "succeeded"; payload: T; usage?: UsageMetrics; }
    | { state: "failed"; fault: ProviderFault; }
    | { state: "cancelled"; reason?: string; }
    | { state: "queued" | "running"; handle: string; };

export type OperationReply<T> = Result<OperationSnapshot<T>, ProviderFault>;

/**
 * A single external generation operation. `poll` is required for operations
 * that answer with a handle instead of a finished payload.
 */
export interface ExternalOperation<Req, T> {
    readonly name: string;
    submit(request: Req, signal?: AbortSignal): Promise<OperationReply<T>>;
    poll?(handle: string, signal?: AbortSignal): Promise<OperationReply<T>>;
}

// ============================================================================
// POLLING
// ============================================================================

export interface PollingPolicy {
    intervalMs: number;
    maxAttempts: number;
    /** Growth applied to the interval while the operation is still `queued`. */
    queuedBackoffFactor?: number;
    maxIntervalMs?: number;
}

// ============================================================================
// POLICY RETRY
// ============================================================================

/** Fresh, frozen value per attempt. Never mutated between attempts. */
export interface RetryContext {
    readonly originalContent: string;
    readonly attempt: number;
    readonly maxAttempts: number;
    readonly lastRejection: ProviderFault | null;
}

export interface PromptRewriter {
    rewrite(context: RetryContext, signal?: AbortSignal): Promise<Result<string, ProviderFault>>;
}

/** Reads and replaces the rewritable content of a request without touching its other fields. */
export interface ContentLens<Req> {
    get(request: Req): string;
    set(request: Req, content: string): Req;
}

// ============================================================================
// RESULTS & ERRORS
// ============================================================================

export interface SupervisedResult<T> {
    payload: T;
    attempts: number;
    /** Content that produced the accepted payload (rewritten when a policy retry happened). */
    content: string | null;
    usage?: UsageMetrics;
}

export type SupervisedCallError =
    | { kind: "provider_error"; operation: string; fault: ProviderFault; }
    | { kind: "provider_failed"; operation: string; fault: ProviderFault; }
    | { kind: "operation_cancelled"; operation: string; reason?: string; }
    | { kind: "poll_timeout"; operation: string; handle: string; pollAttempts: number; }
    | { kind: "policy_exhausted"; operation: string; attempts: number; lastRejection: ProviderFault; }
    | { kind: "rewrite_unavailable"; operation: string; attempts: number; cause: string; }
    | { kind: "aborted"; operation: string; };

// ============================================================================
// AUDIT
// ============================================================================

export interface CallRecord {
    id: string;
    taskId: string;
    operation: string;
    attempt: number;
    outcome: "success" | "error";
    latencyMs: number;
    request: unknown;
    response: unknown;
    usage: UsageMetrics | null;
    error: string | null;
    errorKind: string | null;
    createdAt: Date;
}

export type NewCallRecord = Omit<CallRecord, "id" | "createdAt">;

export interface CallRecordQuery {
    taskId?: string;
    operation?: string;
    outcome?: CallRecord[ "outcome" ];
    limit?: number;
}

export interface OperationCallSummary {
    operation: string;
    calls: number;
    errors: number;
    errorRate: number;
    meanLatencyMs: number;
    usage: UsageMetrics;
}
