#!/usr/bin/env node
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";
import { loadConfig } from "../shared/config.js";
import type { OrchestratorConfig } from "../shared/config.js";
import { DOCUMENT_TO_VIDEO } from "../shared/constants.js";
import { TASK_STATUSES, isUnitComplete } from "../shared/types/task.types.js";
import type { Task } from "../shared/types/task.types.js";
import { describeSchedulerError } from "../pipeline/services/task-scheduler.js";
import { unwrapOr } from "../shared/utils/result.js";
import { extractErrorDetails, extractErrorMessage } from "../shared/utils/errors.js";
import { formatTime } from "../shared/utils/utils.js";
import { logger } from "../shared/logger.js";
import { createApp } from "./app.js";
import type { App } from "./app.js";



const TaskParams = z.string()
    .transform((value, ctx) => {
        try {
            return JSON.parse(value);
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "--params must be JSON" });
            return z.NEVER;
        }
    })
    .pipe(z.record(z.unknown()));

const storeOverride = (config: OrchestratorConfig, store: string | undefined): OrchestratorConfig =>
    store === "memory" || store === "postgres"
        ? { ...config, store: { ...config.store, backend: store } }
        : config;

async function withApp(store: string | undefined, fn: (app: App) => Promise<void>): Promise<void> {
    const app = await createApp(storeOverride(loadConfig(), store));
    try {
        await fn(app);
    } finally {
        await app.close();
    }
}

const formatTask = (task: Task) =>
    `${task.id}  ${task.status.padEnd(9)}  ${Math.round(task.progress * 100).toString().padStart(3)}%  ${task.inputRef}${task.error ? `  [${task.errorKind}] ${task.error}` : ""}`;

/** Resolves once no task is pending or running. */
async function waitUntilIdle(app: App, pollMs: number): Promise<void> {
    for (; ;) {
        const counts = await app.stores.tasks.countByStatus();
        if (counts.pending === 0 && counts.running === 0) return;
        await new Promise(resolve => setTimeout(resolve, pollMs));
    }
}

async function main() {
    await yargs(hideBin(process.argv))
        .scriptName("storyreel")
        .option("store", {
            type: "string",
            choices: [ "postgres", "memory" ],
            description: "Task store backend (overrides STORE_BACKEND)",
        })
        .command("run [files..]", "Start the scheduler, optionally submitting documents first", (y) => y
            .positional("files", { type: "string", array: true, description: "Documents to submit on start" })
            .option("exit-when-idle", { type: "boolean", default: false, description: "Stop once no task is pending or running" }),
            async (argv) => {
                const app = await createApp(storeOverride(loadConfig(), argv.store));
                const recovery = await app.scheduler.start();
                console.log(`Scheduler running with ${app.config.scheduler.workerCount} worker(s); recovered ${recovery.requeued.length} pending, failed ${recovery.workerLost.length} orphaned`);

                for (const file of argv.files ?? []) {
                    const id = unwrapOr(await app.scheduler.submit(DOCUMENT_TO_VIDEO, path.resolve(file)), e => new Error(describeSchedulerError(e)));
                    console.log(`Submitted ${id}`);
                }

                const shutdown = async (signal: string) => {
                    logger.info({ signal }, "Shutting down");
                    await app.close();
                    process.exit(0);
                };
                for (const signal of [ "SIGINT", "SIGTERM" ] as const) {
                    process.once(signal, () => {
                        shutdown(signal).catch((error) => {
                            logger.error({ error: extractErrorDetails(error) }, "Shutdown failed");
                            process.exit(1);
                        });
                    });
                }

                if (argv.exitWhenIdle) {
                    await waitUntilIdle(app, app.config.scheduler.dequeueTimeoutMs);
                    for (const task of await app.stores.tasks.list()) console.log(formatTask(task));
                    await app.close();
                }
            })
        .command("submit <file>", "Submit a document for conversion", (y) => y
            .positional("file", { type: "string", demandOption: true })
            .option("kind", { type: "string", default: DOCUMENT_TO_VIDEO })
            .option("id", { type: "string", description: "Task id (generated otherwise)" })
            .option("params", { type: "string", description: "Task parameters as a JSON object" }),
            async (argv) => withApp(argv.store, async (app) => {
                const params = argv.params !== undefined ? TaskParams.parse(argv.params) : {};
                const result = await app.scheduler.submit(argv.kind, path.resolve(argv.file), params, argv.id);
                console.log(unwrapOr(result, e => new Error(describeSchedulerError(e))));
            }))
        .command("status <id>", "Show a task and its scenes", (y) => y
            .positional("id", { type: "string", demandOption: true }),
            async (argv) => withApp(argv.store, async (app) => {
                const task = unwrapOr(await app.scheduler.status(argv.id), e => new Error(describeSchedulerError(e)));
                console.log(formatTask(task));
                if (task.outputRef) console.log(`output: ${task.outputRef}`);
                for (const unit of await app.stores.units.listUnits(task.id)) {
                    const duration = unit.audioDurationSec !== null ? formatTime(unit.audioDurationSec) : "--:--";
                    console.log(`  scene ${unit.sequence.toString().padStart(3)}  ${duration}  ${isUnitComplete(unit) ? "assets ready" : "pending assets"}  ${unit.description}`);
                }
            }))
        .command("list", "List tasks, newest first", (y) => y
            .option("status", { type: "string", choices: TASK_STATUSES }),
            async (argv) => withApp(argv.store, async (app) => {
                const status = argv.status !== undefined ? z.enum(TASK_STATUSES).parse(argv.status) : undefined;
                for (const task of await app.scheduler.listByStatus(status)) console.log(formatTask(task));
            }))
        .command("retry <id>", "Put a failed task back in the queue", (y) => y
            .positional("id", { type: "string", demandOption: true }),
            async (argv) => withApp(argv.store, async (app) => {
                const task = unwrapOr(await app.scheduler.retry(argv.id), e => new Error(describeSchedulerError(e)));
                console.log(formatTask(task));
            }))
        .command("cancel <id>", "Cancel a running task", (y) => y
            .positional("id", { type: "string", demandOption: true }),
            async (argv) => withApp(argv.store, async (app) => {
                const task = unwrapOr(await app.scheduler.cancel(argv.id), e => new Error(describeSchedulerError(e)));
                console.log(formatTask(task));
            }))
        .command("stats", "Task counts by status", (y) => y,
            async (argv) => withApp(argv.store, async (app) => {
                console.log(JSON.stringify(await app.scheduler.stats(), null, 2));
            }))
        .command("calls", "Show audited provider calls", (y) => y
            .option("task", { type: "string" })
            .option("summary", { type: "boolean", default: false })
            .option("limit", { type: "number", default: 50 }),
            async (argv) => withApp(argv.store, async (app) => {
                if (argv.summary) {
                    for (const s of await app.stores.calls.summarize(argv.task)) {
                        console.log(`${s.operation.padEnd(10)}  calls=${s.calls}  errors=${s.errors}  errorRate=${(s.errorRate * 100).toFixed(1)}%  meanLatency=${Math.round(s.meanLatencyMs)}ms  usage=${JSON.stringify(s.usage)}`);
                    }
                    return;
                }
                for (const call of await app.stores.calls.list({ taskId: argv.task, limit: argv.limit })) {
                    console.log(`${call.createdAt.toISOString()}  ${call.taskId}  ${call.operation}#${call.attempt}  ${call.outcome}  ${call.latencyMs}ms${call.error ? `  [${call.errorKind}] ${call.error}` : ""}`);
                }
            }))
        .demandCommand(1)
        .strict()
        .help()
        .parseAsync();
}

main().catch((error) => {
    logger.error({ error: extractErrorDetails(error) }, "Command failed");
    console.error(extractErrorMessage(error));
    process.exit(1);
});
