import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { TaskScheduler, describeSchedulerError } from '../services/task-scheduler.js';
import { PipelineRegistry } from '../pipeline-runner.js';
import type { StageContext, StageOutcome } from '../pipeline-runner.js';
import { createMemoryStores } from '../../shared/services/memory-stores.js';
import type { SchedulerConfig } from '../../shared/config.js';
import type { Stores } from '../../shared/services/task-store.js';
import { isUnitComplete } from '../../shared/types/task.types.js';
import type { TaskEvent } from '../../shared/types/task.types.js';
import { createOfflineProviders } from '../../shared/services/offline-providers.js';
import { loadConfig } from '../../shared/config.js';
import { DOCUMENT_TO_VIDEO } from '../../shared/constants.js';
import { err } from '../../shared/utils/result.js';
import type { ImageRequest, MediaPayload } from '../../shared/types/pipeline.types.js';
import type { OperationReply } from '../../shared/types/supervised-call.types.js';
import { createApp } from '../../cli/app.js';

const config: SchedulerConfig = {
    workerCount: 2,
    taskTimeoutMs: 60_000,
    monitorIntervalMs: 60_000,
    dequeueTimeoutMs: 20,
    stopTimeoutMs: 50,
};

/** Stage that waits for its lease to be revoked. */
const blockUntilRevoked = (ctx: StageContext) => new Promise<StageOutcome>((_, reject) => {
    ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true });
});

describe('TaskScheduler', () => {
    let stores: Stores;
    let registry: PipelineRegistry;
    let events: TaskEvent[];
    let scheduler: TaskScheduler;

    const createScheduler = (overrides: Partial<SchedulerConfig> = {}) => new TaskScheduler({
        stores,
        registry,
        config: { ...config, ...overrides },
        publishTaskEvent: async (event) => { events.push(event); },
    });

    beforeEach(() => {
        stores = createMemoryStores();
        registry = new PipelineRegistry();
        events = [];
        registry.register({ kind: 'quick', stages: [ { name: 'only', checkpoint: 1, run: async (ctx) => ({ outputRef: `/out/${ctx.task.id}.mp4` }) } ] });
        registry.register({ kind: 'blocking', stages: [ { name: 'generate_assets', checkpoint: 1, run: blockUntilRevoked } ] });
        scheduler = createScheduler();
    });

    afterEach(async () => {
        await scheduler.stop();
    });

    describe('submit', () => {
        it('should create a pending task, queue it and announce it', async () => {
            const submitted = await scheduler.submit('quick', '/docs/a.txt', { voice: 'calm' }, 'task-a');

            expect(submitted).toEqual({ ok: true, value: 'task-a' });
            const task = await scheduler.status('task-a');
            expect(task.ok && task.value).toMatchObject({ status: 'pending', kind: 'quick', params: { voice: 'calm' } });
            expect(scheduler.queue.has('task-a')).toBe(true);
            expect(events).toEqual([ { type: 'TASK_SUBMITTED', taskId: 'task-a', kind: 'quick' } ]);
        });

        it('should generate ids prefixed with the kind', async () => {
            const submitted = await scheduler.submit('quick', '/docs/a.txt');

            expect(submitted.ok && submitted.value).toMatch(/^quick_[0-9a-f-]{36}$/);
        });

        it('should reject unknown kinds and duplicate ids', async () => {
            await scheduler.submit('quick', '/docs/a.txt', {}, 'task-a');

            const unknown = await scheduler.submit('podcast', '/docs/a.txt');
            const duplicate = await scheduler.submit('quick', '/docs/b.txt', {}, 'task-a');

            expect(unknown).toEqual({ ok: false, error: { kind: 'unknown_kind', taskKind: 'podcast' } });
            expect(duplicate).toEqual({ ok: false, error: { kind: 'duplicate_task', taskId: 'task-a' } });
            expect(scheduler.queue.size()).toBe(1);
        });
    });

    describe('status and listing', () => {
        it('should report missing tasks as not_found', async () => {
            const missing = await scheduler.status('nope');

            expect(missing).toEqual({ ok: false, error: { kind: 'not_found', taskId: 'nope' } });
            expect(!missing.ok && describeSchedulerError(missing.error)).toBe('task nope not found');
        });

        it('should list by status and count tasks', async () => {
            await scheduler.submit('quick', '/docs/a.txt', {}, 'a');
            await scheduler.submit('quick', '/docs/b.txt', {}, 'b');
            await stores.tasks.claim('a', 'w1');

            expect((await scheduler.listByStatus('pending')).map(t => t.id)).toEqual([ 'b' ]);
            expect(await scheduler.stats()).toEqual({
                workerCount: 2,
                activeWorkers: 0,
                queueDepth: 2,
                countByStatus: { pending: 1, running: 1, completed: 0, failed: 0, cancelled: 0 },
            });
        });
    });

    describe('retry', () => {
        it('should reopen a failed task once and queue it again', async () => {
            await scheduler.submit('quick', '/docs/a.txt', {}, 'a');
            scheduler.queue.clear();
            await stores.tasks.claim('a', 'w1');
            await stores.tasks.transition('a', { status: 'failed', error: 'boom', errorKind: 'stage' });

            const first = await scheduler.retry('a');
            const second = await scheduler.retry('a');

            expect(first.ok && first.value).toMatchObject({ status: 'pending', error: null, errorKind: null, progress: 0 });
            expect(second).toEqual({ ok: false, error: { kind: 'not_failed', taskId: 'a', status: 'pending' } });
            expect(scheduler.queue.size()).toBe(1);
            expect(events.at(-1)).toEqual({ type: 'TASK_REQUEUED', taskId: 'a', reason: 'retry' });
        });

        it('should rerun a task whose second stage failed from the start', async () => {
            let secondStageRuns = 0;
            registry.register({
                kind: 'three',
                stages: [
                    { name: 'first', checkpoint: 0.3, run: async () => ({ statePatch: { first: true } }) },
                    {
                        name: 'second', checkpoint: 0.6, async run() {
                            if (secondStageRuns++ === 0) throw new Error('provider down');
                            return {};
                        }
                    },
                    { name: 'third', checkpoint: 1, run: async (ctx) => ({ outputRef: `/out/${ctx.task.id}.mp4` }) },
                ],
            });
            await scheduler.start();
            await scheduler.submit('three', '/docs/doc.txt', {}, 'a');
            await vi.waitFor(async () => {
                const task = await scheduler.status('a');
                expect(task.ok && task.value.status).toBe('failed');
            });
            await scheduler.stop();

            const failed = await scheduler.status('a');
            expect(failed.ok && [ failed.value.error, failed.value.progress ]).toEqual([ 'stage "second" failed: provider down', 0.3 ]);

            const retried = await scheduler.retry('a');
            expect(retried.ok && [ retried.value.progress, retried.value.error ]).toEqual([ 0, null ]);
            expect((await scheduler.listByStatus('pending')).map(t => t.id)).toEqual([ 'a' ]);

            await scheduler.start();
            await vi.waitFor(async () => {
                const task = await scheduler.status('a');
                expect(task.ok && task.value.status).toBe('completed');
            });
            const done = await scheduler.status('a');
            expect(done.ok && [ done.value.outputRef, done.value.runCount ]).toEqual([ '/out/a.mp4', 2 ]);
            expect(secondStageRuns).toBe(2);
        });

        it('should refuse to retry unknown tasks', async () => {
            expect(await scheduler.retry('nope')).toEqual({ ok: false, error: { kind: 'not_found', taskId: 'nope' } });
        });
    });

    describe('cancel', () => {
        it('should only cancel running tasks', async () => {
            await scheduler.submit('quick', '/docs/a.txt', {}, 'a');

            expect(await scheduler.cancel('a')).toEqual({ ok: false, error: { kind: 'not_running', taskId: 'a', status: 'pending' } });

            await stores.tasks.claim('a', 'w1');
            const cancelled = await scheduler.cancel('a');

            expect(cancelled.ok && cancelled.value.status).toBe('cancelled');
            expect(events.at(-1)).toEqual({ type: 'TASK_CANCELLED', taskId: 'a' });
            expect(await scheduler.cancel('a')).toEqual({ ok: false, error: { kind: 'not_running', taskId: 'a', status: 'cancelled' } });
        });

        it('should remove the output of a task cancelled while it runs', async () => {
            const dir = await mkdtemp(path.join(os.tmpdir(), 'scheduler-cancel-'));
            try {
                const outputPath = path.join(dir, 'final.mp4');
                registry.register({
                    kind: 'assemble',
                    stages: [ {
                        name: 'assemble',
                        checkpoint: 1,
                        async run(ctx) {
                            await writeFile(outputPath, 'video');
                            await scheduler.cancel(ctx.task.id);
                            return { outputRef: outputPath };
                        },
                        async discard(outcome) {
                            if (outcome.outputRef) await rm(outcome.outputRef, { force: true });
                        },
                    } ],
                });
                await scheduler.start();

                await scheduler.submit('assemble', '/docs/a.txt', {}, 'a');
                await vi.waitFor(async () => {
                    const task = await scheduler.status('a');
                    expect(task.ok && task.value.status).toBe('cancelled');
                    expect((await scheduler.stats()).activeWorkers).toBe(0);
                });
                await scheduler.stop();

                await expect(stat(outputPath)).rejects.toThrow();
                const task = await scheduler.status('a');
                expect(task.ok && task.value.outputRef).toBeNull();
            } finally {
                await rm(dir, { recursive: true, force: true });
            }
        });
    });

    describe('start and stop', () => {
        it('should fail orphaned running tasks and queue pending ones on start', async () => {
            await stores.tasks.create({ id: 'r1', kind: 'quick', inputRef: '/docs/r.txt' });
            await stores.tasks.claim('r1', 'old-worker');
            await stores.tasks.create({ id: 'p1', kind: 'quick', inputRef: '/docs/p.txt' });

            const recovery = await scheduler.start();

            expect(recovery).toEqual({ workerLost: [ 'r1' ], requeued: [ 'p1' ] });
            const lost = await scheduler.status('r1');
            expect(lost.ok && lost.value).toMatchObject({ status: 'failed', errorKind: 'worker_lost', error: 'worker old-worker lost before the task finished' });
            await vi.waitFor(async () => {
                const done = await scheduler.status('p1');
                expect(done.ok && done.value.status).toBe('completed');
            });
        });

        it('should refuse to start twice', async () => {
            await scheduler.start();

            await expect(scheduler.start()).rejects.toThrow('scheduler already started');
        });

        it('should run many tasks with each claimed by exactly one worker', async () => {
            const started: string[] = [];
            registry.register({
                kind: 'tracked',
                stages: [ {
                    name: 'only', checkpoint: 1, async run(ctx) {
                        started.push(ctx.task.id);
                        return { outputRef: `/out/${ctx.task.id}.mp4` };
                    }
                } ],
            });
            await scheduler.start();

            const ids = [ 'a', 'b', 'c', 'd', 'e' ];
            for (const id of ids) await scheduler.submit('tracked', `/docs/${id}.txt`, {}, id);
            await vi.waitFor(async () => {
                expect((await stores.tasks.countByStatus()).completed).toBe(5);
            });

            expect([ ...started ].sort()).toEqual(ids);
            for (const task of await stores.tasks.list()) expect(task.runCount).toBe(1);
        });

        it('should fail tasks still running when stop times out', async () => {
            await scheduler.start();
            await scheduler.submit('blocking', '/docs/a.txt', {}, 'a');
            await vi.waitFor(async () => {
                expect((await scheduler.stats()).activeWorkers).toBe(1);
            });

            await scheduler.stop();

            const task = await scheduler.status('a');
            expect(task.ok && task.value).toMatchObject({ status: 'failed', errorKind: 'shutdown', error: 'aborted by scheduler shutdown' });
            expect(scheduler.isRunning).toBe(false);
        });

        it('should reclaim a timed-out task and free its worker', async () => {
            scheduler = createScheduler({ taskTimeoutMs: 20 });
            await scheduler.start();
            await scheduler.submit('blocking', '/docs/a.txt', {}, 'a');
            await vi.waitFor(async () => {
                expect((await scheduler.stats()).activeWorkers).toBe(1);
            });
            await new Promise(resolve => setTimeout(resolve, 40));

            const report = await scheduler.maintain();

            expect(report.timedOut).toEqual([ 'a' ]);
            await vi.waitFor(async () => {
                expect((await scheduler.stats()).activeWorkers).toBe(0);
            });
            const task = await scheduler.status('a');
            expect(task.ok && task.value).toMatchObject({ status: 'failed', errorKind: 'timeout', error: 'task exceeded timeout of 20ms' });
        });

        it('should flush buffered call records on stop', async () => {
            await scheduler.start();
            scheduler.audit.record({
                taskId: 'a', operation: 'image', attempt: 1, outcome: 'success', latencyMs: 3,
                request: {}, response: {}, usage: null, error: null, errorKind: null,
            });

            await scheduler.stop();

            expect(await stores.calls.list()).toHaveLength(1);
        });
    });
});

describe('document-to-video end to end', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'storyreel-e2e-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should turn a document into a final video, retrying policy rejections', async () => {
        const documentPath = path.join(dir, 'tides.md');
        await writeFile(documentPath, 'Tides\n\nThe moon pulls on the oceans.\n\nTwice a day the shore floods.\n');
        const config = loadConfig({
            STORE_BACKEND: 'memory',
            WORKER_COUNT: '2',
            OUTPUT_DIR: path.join(dir, 'out'),
            WORK_DIR: path.join(dir, 'work'),
            LIGHT_POLL_INTERVAL_MS: '1',
            HEAVY_POLL_INTERVAL_MS: '1',
            DEQUEUE_TIMEOUT_MS: '20',
            MAX_RATE_LIMIT_RETRIES: '0',
        });

        const offline = createOfflineProviders();
        let rejections = 2;
        const imageSubmit = vi.fn(async (request: ImageRequest): Promise<OperationReply<MediaPayload>> => {
            if (rejections > 0) {
                rejections--;
                return err({ kind: 'policy', code: 'content_policy_violation', message: 'flagged' });
            }
            return offline.image.submit(request);
        });
        const app = await createApp(config, {
            stores: createMemoryStores(),
            providers: { ...offline, image: { name: 'image', submit: imageSubmit } },
        });

        try {
            await app.scheduler.start();
            const submitted = await app.scheduler.submit(DOCUMENT_TO_VIDEO, documentPath);
            if (!submitted.ok) throw new Error(describeSchedulerError(submitted.error));
            const taskId = submitted.value;

            await vi.waitFor(async () => {
                const task = await app.scheduler.status(taskId);
                expect(task.ok && task.value.status).toBe('completed');
            }, { timeout: 5000 });
            await app.scheduler.stop();

            const task = await app.scheduler.status(taskId);
            const finalPath = path.resolve(dir, 'out', `${taskId}_final.mp4`);
            expect(task.ok && task.value).toMatchObject({ progress: 1, outputRef: finalPath, state: { title: 'Tides', sceneCount: 2 } });
            expect(await readFile(finalPath, 'utf8')).toMatch(/^title: Tides\nscene 1\n/);
            await expect(stat(path.join(dir, 'work', taskId))).rejects.toThrow();

            const units = await app.stores.units.listUnits(taskId);
            expect(units.map(u => [ u.sequence, isUnitComplete(u), u.composedRef !== null ])).toEqual([ [ 1, true, true ], [ 2, true, true ] ]);

            const imageCalls = await app.stores.calls.list({ taskId, operation: 'image' });
            expect(imageCalls.map(r => [ r.attempt, r.outcome ])).toEqual([
                [ 1, 'error' ],
                [ 2, 'error' ],
                [ 3, 'success' ],
                [ 1, 'success' ],
            ]);
            expect(imageCalls[ 0 ].errorKind).toBe('provider_error');
            expect(imageSubmit).toHaveBeenCalledTimes(4);
        } finally {
            await app.close();
        }
    });
});
