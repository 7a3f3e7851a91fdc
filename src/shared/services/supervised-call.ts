import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { err, ok } from "../utils/result.js";
import type { Result } from "../utils/result.js";
import { describeCallError, describeFault, extractErrorMessage } from "../utils/errors.js";
import { sleep as defaultSleep } from "../utils/utils.js";
import type { Sleep } from "../utils/utils.js";
import { retryTransient } from "../utils/transient-retry.js";
import type {
    ContentLens, ExternalOperation, OperationReply, OperationSnapshot, PollingPolicy, PromptRewriter,
    ProviderFault, RetryContext, SupervisedCallError, SupervisedResult, UsageMetrics
} from "../types/supervised-call.types.js";
import type { CallAuditSink } from "./call-audit-log.js";



export const DEFAULT_MAX_POLICY_RETRIES = 3;

export interface SupervisedCallOptions<Req> {
    /** Task the audit records belong to. */
    taskId: string;
    polling: PollingPolicy;
    /** Provider codes treated as content-policy rejections, in addition to `kind: "policy"`. */
    policyRejectionCodes: ReadonlySet<string>;
    maxPolicyRetries?: number;
    /** Both required for policy retry; without them a rejection ends the call. */
    lens?: ContentLens<Req>;
    rewriter?: PromptRewriter;
    /** Rate-limit retries around each submit and poll. */
    rateLimit?: { maxRetries: number; initialDelayMs: number; };
    audit?: CallAuditSink;
    signal?: AbortSignal;
    logger?: Logger;
    sleep?: Sleep;
    clock?: () => number;
}

type AttemptSuccess<T> = { payload: T; usage?: UsageMetrics; };

export function isPolicyRejection(fault: ProviderFault, codes: ReadonlySet<string>): boolean {
    return fault.kind === "policy" || codes.has(fault.code);
}

/**
 * Runs one external generation call to completion under supervision.
 *
 * Each attempt submits the request and polls the returned handle until the
 * operation reaches a terminal state or the polling ceiling is hit. When an
 * attempt is rejected on content policy, the rewriter produces new content from a
 * fresh {@link RetryContext}, the lens places it into a copy of the original
 * request, and the next attempt starts from scratch. Every attempt is audited.
 */
export async function runSupervisedCall<Req, T>(
    operation: ExternalOperation<Req, T>,
    request: Req,
    options: SupervisedCallOptions<Req>
): Promise<Result<SupervisedResult<T>, SupervisedCallError>> {
    const log = (options.logger ?? rootLogger).child({ operation: operation.name });
    const clock = options.clock ?? Date.now;
    const maxAttempts = (options.maxPolicyRetries ?? DEFAULT_MAX_POLICY_RETRIES) + 1;
    const { lens, rewriter } = options;

    const originalContent = lens ? lens.get(request) : null;
    let content = originalContent;
    let current = request;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            return err({ kind: "aborted", operation: operation.name });
        }

        const startedAt = clock();
        const outcome = await runAttempt(operation, current, options);
        const latencyMs = clock() - startedAt;

        options.audit?.record({
            taskId: options.taskId,
            operation: operation.name,
            attempt,
            outcome: outcome.ok ? "success" : "error",
            latencyMs,
            request: snapshotOf(current),
            response: outcome.ok ? snapshotOf(outcome.value.payload) : snapshotOf(outcome.error),
            usage: outcome.ok ? outcome.value.usage ?? null : null,
            error: outcome.ok ? null : describeCallError(outcome.error),
            errorKind: outcome.ok ? null : outcome.error.kind,
        });

        if (outcome.ok) {
            log.info({ attempt, latencyMs }, `${operation.name} succeeded`);
            return ok({ payload: outcome.value.payload, attempts: attempt, content, usage: outcome.value.usage });
        }

        const rejection = policyRejectionOf(outcome.error, options.policyRejectionCodes);
        if (!rejection) {
            log.warn({ attempt, error: outcome.error }, describeCallError(outcome.error));
            return outcome;
        }

        if (attempt === maxAttempts || !lens || !rewriter || originalContent === null) {
            const exhausted: SupervisedCallError = {
                kind: "policy_exhausted", operation: operation.name, attempts: attempt, lastRejection: rejection
            };
            log.error({ attempt, maxAttempts }, describeCallError(exhausted));
            return err(exhausted);
        }

        log.warn({ attempt, maxAttempts, code: rejection.code }, `Content policy rejection. Rewriting prompt...`);
        const context: RetryContext = Object.freeze({
            originalContent,
            attempt: attempt + 1,
            maxAttempts,
            lastRejection: rejection,
        });

        let rewritten: Result<string, ProviderFault>;
        try {
            rewritten = await rewriter.rewrite(context, options.signal);
        } catch (error) {
            if (options.signal?.aborted) return err({ kind: "aborted", operation: operation.name });
            return err({
                kind: "rewrite_unavailable",
                operation: operation.name,
                attempts: attempt,
                cause: extractErrorMessage(error),
            });
        }
        if (!rewritten.ok) {
            return err({
                kind: "rewrite_unavailable",
                operation: operation.name,
                attempts: attempt,
                cause: describeFault(rewritten.error),
            });
        }
        content = rewritten.value;
        current = lens.set(request, content);
    }

    // Unreachable: the final attempt always returns.
    return err({ kind: "aborted", operation: operation.name });
}

function policyRejectionOf(error: SupervisedCallError, codes: ReadonlySet<string>): ProviderFault | null {
    if (error.kind !== "provider_error" && error.kind !== "provider_failed") return null;
    return isPolicyRejection(error.fault, codes) ? error.fault : null;
}

async function runAttempt<Req, T>(
    operation: ExternalOperation<Req, T>,
    request: Req,
    options: SupervisedCallOptions<Req>
): Promise<Result<AttemptSuccess<T>, SupervisedCallError>> {
    const name = operation.name;
    const { polling, signal } = options;
    const wait = options.sleep ?? defaultSleep;
    const aborted = (): Result<AttemptSuccess<T>, SupervisedCallError> => err({ kind: "aborted", operation: name });

    const submitted = await guarded(options, () => operation.submit(request, signal));
    if (!submitted.ok) return signal?.aborted ? aborted() : err({ kind: "provider_error", operation: name, fault: submitted.error });

    let snapshot: OperationSnapshot<T> = submitted.value;
    let interval = polling.intervalMs;
    let polls = 0;

    while (snapshot.state === "queued" || snapshot.state === "running") {
        const { handle } = snapshot;
        if (!operation.poll) {
            return err({
                kind: "provider_error",
                operation: name,
                fault: { kind: "invalid", code: "poll_unsupported", message: `returned handle ${handle} but cannot be polled` },
            });
        }
        if (polls >= polling.maxAttempts) {
            return err({ kind: "poll_timeout", operation: name, handle, pollAttempts: polls });
        }

        try {
            await wait(interval, signal);
        } catch (error) {
            if (signal?.aborted) return aborted();
            throw error;
        }
        polls++;

        const poll = operation.poll.bind(operation);
        const reply = await guarded(options, () => poll(handle, signal));
        if (!reply.ok) return signal?.aborted ? aborted() : err({ kind: "provider_error", operation: name, fault: reply.error });

        if (reply.value.state === "queued" && polling.queuedBackoffFactor) {
            interval = Math.min(interval * polling.queuedBackoffFactor, polling.maxIntervalMs ?? Number.POSITIVE_INFINITY);
        }
        snapshot = reply.value;
    }

    switch (snapshot.state) {
        case "succeeded":
            return ok({ payload: snapshot.payload, usage: snapshot.usage });
        case "failed":
            return err({ kind: "provider_failed", operation: name, fault: snapshot.fault });
        case "cancelled":
            return err({ kind: "operation_cancelled", operation: name, reason: snapshot.reason });
    }
}

/**
 * Applies rate-limit retries and turns a thrown provider exception into a
 * transient fault so the caller only ever sees results.
 */
async function guarded<Req, T>(
    options: SupervisedCallOptions<Req>,
    call: () => Promise<OperationReply<T>>
): Promise<OperationReply<T>> {
    const safeCall = async (): Promise<OperationReply<T>> => {
        try {
            return await call();
        } catch (error) {
            return err({ kind: "transient", code: "exception", message: extractErrorMessage(error) });
        }
    };
    if (!options.rateLimit || options.rateLimit.maxRetries === 0) return safeCall();

    return retryTransient(safeCall, {
        ...options.rateLimit,
        signal: options.signal,
        sleep: options.sleep,
        logger: options.logger,
    });
}

const MAX_SNAPSHOT_STRING = 256;

/** Copy of a request or response for the audit log, with long strings (inline media) cut short. */
export function snapshotOf(value: unknown): unknown {
    if (typeof value === "string") {
        return value.length > MAX_SNAPSHOT_STRING
            ? `${value.slice(0, MAX_SNAPSHOT_STRING)}...(${value.length} chars)`
            : value;
    }
    if (Array.isArray(value)) return value.map(snapshotOf);
    if (value instanceof Date) return value.toISOString();
    if (value && typeof value === "object") {
        return Object.fromEntries(Object.entries(value).map(([ key, inner ]) => [ key, snapshotOf(inner) ]));
    }
    return value;
}
