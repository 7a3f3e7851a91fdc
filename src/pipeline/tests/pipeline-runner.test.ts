import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PipelineRegistry, runPipeline } from '../pipeline-runner.js';
import type { PipelineDefinition, PipelineRunOptions, StageOutcome } from '../pipeline-runner.js';
import { InMemoryTaskStore } from '../../shared/services/memory-stores.js';
import { LeaseLostError, StageFailedError, TaskCancelledError } from '../../shared/utils/errors.js';
import { logger } from '../../shared/logger.js';
import type { Task } from '../../shared/types/task.types.js';

describe('runPipeline', () => {
    let store: InMemoryTaskStore;
    let task: Task;
    let progress: [ string, number ][];

    const options = (overrides: Partial<PipelineRunOptions> = {}): PipelineRunOptions => ({
        store,
        workerId: 'w1',
        signal: new AbortController().signal,
        logger,
        onProgress: async (stage, value) => { progress.push([ stage, value ]); },
        ...overrides,
    });

    beforeEach(async () => {
        store = new InMemoryTaskStore();
        progress = [];
        await store.create({ id: 't1', kind: 'demo', inputRef: '/docs/a.txt' });
        const claimed = await store.claim('t1', 'w1');
        if (!claimed.ok) throw new Error('claim failed');
        task = claimed.value;
    });

    it('should run stages in order and persist their state and checkpoints', async () => {
        const seen: unknown[] = [];
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [
                {
                    name: 'first', checkpoint: 0.5, async run(ctx) {
                        await ctx.reportProgress(0.5);
                        return { statePatch: { title: 'Tides' } };
                    }
                },
                {
                    name: 'second', checkpoint: 1, async run(ctx) {
                        seen.push(ctx.task.state.title);
                        return { outputRef: '/out/t1.mp4' };
                    }
                },
            ],
        };

        const outputRef = await runPipeline(definition, task, options());

        expect(outputRef).toBe('/out/t1.mp4');
        expect(seen).toEqual([ 'Tides' ]);
        expect(progress).toEqual([ [ 'first', 0.25 ], [ 'first', 0.5 ], [ 'second', 1 ] ]);
        const stored = await store.get('t1');
        expect(stored.ok && stored.value).toMatchObject({ status: 'running', progress: 1, state: { title: 'Tides' } });
    });

    it('should wrap a stage error in StageFailedError and keep earlier checkpoints', async () => {
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [
                { name: 'first', checkpoint: 0.4, run: async () => ({ statePatch: { done: true } }) },
                { name: 'second', checkpoint: 1, run: async () => { throw new Error('provider down'); } },
            ],
        };

        const run = runPipeline(definition, task, options());

        await expect(run).rejects.toBeInstanceOf(StageFailedError);
        await expect(run).rejects.toThrow('stage "second" failed: provider down');
        const stored = await store.get('t1');
        expect(stored.ok && [ stored.value.progress, stored.value.state ]).toEqual([ 0.4, { done: true } ]);
    });

    it('should discard the outcome of a stage that finished after cancellation', async () => {
        const discard = vi.fn(async (_outcome: StageOutcome) => { });
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [
                {
                    name: 'assemble', checkpoint: 1, discard, async run() {
                        await store.transition('t1', { status: 'cancelled' });
                        return { outputRef: '/out/t1.mp4' };
                    }
                },
            ],
        };

        await expect(runPipeline(definition, task, options())).rejects.toBeInstanceOf(TaskCancelledError);
        expect(discard).toHaveBeenCalledWith({ outputRef: '/out/t1.mp4' });
        const stored = await store.get('t1');
        expect(stored.ok && stored.value.status).toBe('cancelled');
    });

    it('should stop with LeaseLostError when another worker owns the task', async () => {
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [ { name: 'only', checkpoint: 1, run: async () => ({ outputRef: 'x' }) } ],
        };

        await expect(runPipeline(definition, task, options({ workerId: 'w2' }))).rejects.toBeInstanceOf(LeaseLostError);
    });

    it('should rethrow the lease error the signal was aborted with', async () => {
        const controller = new AbortController();
        const reason = new LeaseLostError('t1', 'task timed out');
        const run = vi.fn(async () => ({ outputRef: 'x' }));
        controller.abort(reason);

        const result = runPipeline({ kind: 'demo', stages: [ { name: 'only', checkpoint: 1, run } ] }, task, options({ signal: controller.signal }));

        await expect(result).rejects.toBe(reason);
        expect(run).not.toHaveBeenCalled();
    });

    it('should not write progress into a run another worker took over', async () => {
        const controller = new AbortController();
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [ {
                name: 'generate_assets', checkpoint: 0.9, async run(ctx) {
                    await store.transition('t1', { status: 'failed', error: 'task exceeded timeout of 60s', errorKind: 'timeout' });
                    controller.abort(new LeaseLostError('t1', 'task timed out'));
                    await store.reopen('t1');
                    await store.claim('t1', 'w2');
                    await ctx.reportProgress(1);
                    return {};
                }
            } ],
        };

        await expect(runPipeline(definition, task, options({ signal: controller.signal }))).rejects.toThrow('lease on task t1 lost: task timed out');
        const stored = await store.get('t1');
        expect(stored.ok && [ stored.value.status, stored.value.workerId, stored.value.progress ]).toEqual([ 'running', 'w2', 0 ]);
        expect(progress).toEqual([]);
    });

    it('should refuse progress from a worker that no longer owns the task', async () => {
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [ {
                name: 'generate_assets', checkpoint: 0.9, async run(ctx) {
                    await store.transition('t1', { status: 'failed', error: 'boom', errorKind: 'stage' });
                    await store.reopen('t1');
                    await store.claim('t1', 'w2');
                    await ctx.reportProgress(0.5);
                    return {};
                }
            } ],
        };

        await expect(runPipeline(definition, task, options())).rejects.toThrow('lease on task t1 lost: task is running under w2');
        const stored = await store.get('t1');
        expect(stored.ok && stored.value.progress).toBe(0);
    });

    it('should fail when no stage produced an output', async () => {
        const definition: PipelineDefinition = {
            kind: 'demo',
            stages: [ { name: 'only', checkpoint: 1, run: async () => ({}) } ],
        };

        await expect(runPipeline(definition, task, options())).rejects.toThrow('stage "only" failed: pipeline produced no output');
    });
});

describe('PipelineRegistry', () => {
    it('should register pipelines by kind', () => {
        const registry = new PipelineRegistry().register({ kind: 'demo', stages: [ { name: 'a', checkpoint: 1, run: async () => ({}) } ] });

        expect(registry.has('demo')).toBe(true);
        expect(registry.get('other')).toBeUndefined();
        expect(registry.kinds()).toEqual([ 'demo' ]);
    });

    it('should reject checkpoints that do not increase', () => {
        const registry = new PipelineRegistry();

        expect(() => registry.register({
            kind: 'bad',
            stages: [
                { name: 'a', checkpoint: 0.5, run: async () => ({}) },
                { name: 'b', checkpoint: 0.5, run: async () => ({}) },
            ],
        })).toThrow('pipeline bad: checkpoint of stage b must be in (0.5, 1]');
        expect(() => registry.register({ kind: 'empty', stages: [] })).toThrow('pipeline empty has no stages');
    });
});
