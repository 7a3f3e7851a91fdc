import type { ProviderFault, SupervisedCallError } from "../types/supervised-call.types.js";
import type { StoreError } from "../types/task.types.js";



/**
 * Raised by the pipeline runner when a stage fails.
 * The message is what operators see in the task's error field.
 */
export class StageFailedError extends Error {
    constructor(public readonly stage: string, cause: unknown) {
        super(`stage "${stage}" failed: ${extractErrorMessage(cause)}`, { cause });
        this.name = 'StageFailedError';
    }
}

/** The task was cancelled while its pipeline was still running. */
export class TaskCancelledError extends Error {
    constructor(public readonly taskId: string) {
        super(`task ${taskId} was cancelled`);
        this.name = 'TaskCancelledError';
    }
}

/** The worker no longer owns the task (monitor timeout, shutdown, another owner). */
export class LeaseLostError extends Error {
    constructor(public readonly taskId: string, reason: string) {
        super(`lease on task ${taskId} lost: ${reason}`);
        this.name = 'LeaseLostError';
    }
}

export class SupervisedCallFailedError extends Error {
    constructor(public readonly detail: SupervisedCallError) {
        super(describeCallError(detail));
        this.name = 'SupervisedCallFailedError';
    }
}

export function describeFault(fault: ProviderFault): string {
    const status = fault.status !== undefined ? ` ${fault.status}` : "";
    return `[${fault.kind}${status}] ${fault.code}: ${fault.message}`;
}

export function describeCallError(error: SupervisedCallError): string {
    switch (error.kind) {
        case "provider_error":
            return `${error.operation} request failed ${describeFault(error.fault)}`;
        case "provider_failed":
            return `${error.operation} reported failure ${describeFault(error.fault)}`;
        case "operation_cancelled":
            return `${error.operation} was cancelled by the provider${error.reason ? `: ${error.reason}` : ""}`;
        case "poll_timeout":
            return `${error.operation} timed out waiting for operation ${error.handle} after ${error.pollAttempts} status checks`;
        case "policy_exhausted":
            return `${error.operation} rejected by content policy after ${error.attempts} attempts ${describeFault(error.lastRejection)}`;
        case "rewrite_unavailable":
            return `${error.operation} rejected by content policy and the prompt rewrite failed after ${error.attempts} attempts: ${error.cause}`;
        case "aborted":
            return `${error.operation} aborted`;
    }
}

export function describeStoreError(error: StoreError): string {
    switch (error.kind) {
        case "not_found":
            return `task ${error.taskId} not found`;
        case "already_exists":
            return `task ${error.taskId} already exists`;
        case "invalid_transition":
            return `task ${error.taskId} cannot move from ${error.from} to ${error.to}`;
    }
}

export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.toString();
    }

    if (error && typeof error === 'object') {
        if ('message' in error && typeof error.message === 'string') {
            return error.message;
        }
        try {
            return JSON.stringify(error);
        } catch {
            return String(error);
        }
    }

    return String(error);
}

/**
 * Extract structured error details for log lines and audit records.
 */
export function extractErrorDetails(error: unknown): Record<string, unknown> | undefined {
    if (!error || typeof error !== 'object') {
        return undefined;
    }

    const details: Record<string, unknown> = {};

    if (error instanceof Error) {
        details.name = error.name;
        details.message = error.message;
        if (error.stack) details.stack = error.stack;
    }

    if ('code' in error) details.code = error.code;
    if ('kind' in error) details.kind = error.kind;
    if ('status' in error) details.status = error.status;
    if ('detail' in error) details.detail = error.detail;
    if ('stage' in error) details.stage = error.stage;

    return Object.keys(details).length > 0 ? details : undefined;
}
