import { describe, it, expect } from 'vitest';
import os from 'os';
import path from 'path';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { pathToFileURL } from 'url';
import { createOfflineComposer, createOfflineProviders, offlineStoryboard, silentWav } from './offline-providers.js';
import { parseStoryboard } from '../agents/breakdown-agent.js';
import type { StageUnit } from '../types/task.types.js';

const document = `Tides

The moon pulls on the oceans. Water bulges toward it.

Twice a day the shore floods. Then it drains again.`;

describe('offlineStoryboard', () => {
    it('should make one scene per paragraph that the breakdown parser accepts', () => {
        const storyboard = parseStoryboard(JSON.stringify(offlineStoryboard(document, 10)));

        expect(storyboard.title).toBe('Tides');
        expect(storyboard.summary).toBe('The moon pulls on the oceans.');
        expect(storyboard.scenes.map(s => s.description)).toEqual([
            'The moon pulls on the oceans.',
            'Twice a day the shore floods.',
        ]);
    });

    it('should respect the scene limit', () => {
        expect(offlineStoryboard(document, 1).scenes).toHaveLength(1);
    });
});

describe('createOfflineProviders', () => {
    it('should refuse blocked image prompts on policy grounds', async () => {
        const providers = createOfflineProviders({ blockedTerms: [ 'forbidden' ] });

        const refused = await providers.image.submit({ prompt: 'a Forbidden door', width: 1, height: 1 });
        const accepted = await providers.image.submit({ prompt: 'a door', width: 1, height: 1 });

        expect(!refused.ok && refused.error.kind).toBe('policy');
        expect(accepted.ok && accepted.value.state).toBe('succeeded');
    });

    it('should strip blocked terms when rewriting', async () => {
        const providers = createOfflineProviders({ blockedTerms: [ 'forbidden' ] });

        const rewritten = await providers.rewriter.rewrite({
            originalContent: 'a forbidden  door', attempt: 2, maxAttempts: 4, lastRejection: null,
        });

        expect(rewritten).toEqual({ ok: true, value: 'a door' });
    });

    it('should keep motion clips queued for the configured number of polls', async () => {
        const { motion } = createOfflineProviders({ motionQueuedPolls: 2 });
        const submitted = await motion.submit({ prompt: 'pan', imageRef: '/img.png', durationSec: 4 });
        if (!submitted.ok || submitted.value.state !== 'queued') throw new Error('expected a queued clip');
        const { handle } = submitted.value;

        const states: string[] = [];
        for (let i = 0; i < 3; i++) {
            const reply = await motion.poll?.(handle);
            states.push(reply?.ok ? reply.value.state : 'error');
        }

        expect(states).toEqual([ 'queued', 'queued', 'succeeded' ]);
    });

    it('should forget the oldest motion jobs past the job limit', async () => {
        const { motion } = createOfflineProviders({ maxMotionJobs: 1, motionQueuedPolls: 0 });
        await motion.submit({ prompt: 'pan', imageRef: '/a.png', durationSec: 4 });
        await motion.submit({ prompt: 'tilt', imageRef: '/b.png', durationSec: 4 });

        const forgotten = await motion.poll?.('motion-1');
        const kept = await motion.poll?.('motion-2');

        expect(forgotten && !forgotten.ok && forgotten.error.code).toBe('unknown_handle');
        expect(kept?.ok && kept.value.state).toBe('succeeded');
    });

    it('should size narration audio from the word count', async () => {
        const { narration } = createOfflineProviders({ wordsPerMinute: 60 });

        const reply = await narration.submit({ text: 'one two three four five' });

        expect(reply.ok && reply.value.state === 'succeeded' && reply.value.payload.durationSec).toBe(5);
    });

    it('should read file URLs only', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'offline-fetch-'));
        try {
            const file = path.join(dir, 'clip.bin');
            await writeFile(file, 'bytes');
            const { fetcher } = createOfflineProviders();

            expect(Buffer.from(await fetcher.fetch(pathToFileURL(file).href)).toString()).toBe('bytes');
            await expect(fetcher.fetch('https://media.example.test/clip.mp4')).rejects.toThrow('offline fetcher cannot download');
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});

describe('createOfflineComposer', () => {
    it('should compose scenes and merge them in order', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'offline-compose-'));
        try {
            const composer = createOfflineComposer();
            const unit: StageUnit = {
                taskId: 't1', sequence: 1, description: 'beach', narration: 'Waves.', sceneType: null, durationHint: null,
                audioRef: '/a.wav', audioDurationSec: 1, imageRef: '/i.png', clipRef: '/c.mp4', composedRef: null,
            };

            const scene = await composer.composeScene({
                unit, clipPath: '/c.mp4', audioPath: '/a.wav', subtitleText: 'Waves.', outputPath: path.join(dir, 'composed', 'scene_001.mp4'),
            });
            const final = await composer.merge({ scenePaths: [ scene ], outputPath: path.join(dir, 'out', 'final.mp4'), title: 'Sea' });

            expect(await readFile(final, 'utf8')).toBe('title: Sea\nscene 1\nclip: /c.mp4\naudio: /a.wav\nsubtitle: Waves.\n');
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});

describe('silentWav', () => {
    it('should write a RIFF header and two bytes per sample', () => {
        const wav = silentWav(1);

        expect(wav.subarray(0, 4).toString()).toBe('RIFF');
        expect(wav.length).toBe(44 + 8000 * 2);
    });
});
