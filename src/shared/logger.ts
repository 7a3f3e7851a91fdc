import pino, { type Logger } from 'pino';
import os from 'os';
import { AsyncLocalStorage } from 'async_hooks';



export interface LogContext {
    taskId?: string;
    workerId?: string;
    stage?: string;
    correlationId?: string;
    [ key: string ]: unknown;
}

export type { Logger };

const isDev = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test' || !!process.env.VITEST;

export const logContextStore = new AsyncLocalStorage<LogContext>();

export const logger = pino({
    level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
    // Mix in process identity and the ambient task context to every log
    mixin() {
        return {
            process_id: `${os.hostname()}-${process.pid}`.toLowerCase(),
            ...logContextStore.getStore(),
        };
    },
    formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
    },
    base: undefined,
    timestamp: () => `,"timestamp_iso":"${new Date().toISOString()}"`,
    transport: isDev ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' }
    } : undefined,
});

/**
 * Creates a scoped logger for a specific task or worker.
 * Every line logged within a task execution carries the ids without re-typing them.
 */
export function createTaskLogger(context: LogContext, parent: Logger = logger): Logger {
    return parent.child(context);
}

/**
 * Runs `fn` with `context` attached to every log line emitted beneath it,
 * including lines from collaborators that only hold the root logger.
 */
export function withLogContext<T>(context: LogContext, fn: () => Promise<T>): Promise<T> {
    const parent = logContextStore.getStore() ?? {};
    return logContextStore.run({ ...parent, ...context }, fn);
}
