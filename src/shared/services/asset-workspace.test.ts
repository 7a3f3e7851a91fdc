import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import os from 'os';
import path from 'path';
import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { AssetWorkspace, readMediaPayload } from './asset-workspace.js';

describe('AssetWorkspace', () => {
    let workDir: string;

    beforeEach(async () => {
        workDir = await mkdtemp(path.join(os.tmpdir(), 'asset-workspace-'));
    });

    afterEach(async () => {
        await rm(workDir, { recursive: true, force: true });
    });

    it('should lay out assets per task and scene', () => {
        const workspace = new AssetWorkspace(workDir, 'task-1');

        expect(workspace.getAssetPath({ type: 'narration_audio', sequence: 1 })).toBe(path.join(workDir, 'task-1', 'audio', 'scene_001.wav'));
        expect(workspace.getAssetPath({ type: 'scene_image', sequence: 12 })).toBe(path.join(workDir, 'task-1', 'images', 'scene_012.png'));
        expect(workspace.getAssetPath({ type: 'scene_clip', sequence: 3 })).toBe(path.join(workDir, 'task-1', 'clips', 'scene_003.mp4'));
        expect(workspace.getStagingPath({ type: 'composed_scene', sequence: 2 }, 2))
            .toBe(path.join(workDir, 'task-1', 'composed', 'scene_002.mp4.attempt_02.tmp'));
    });

    it('should commit bytes to the final path without leaving staging files', async () => {
        const workspace = new AssetWorkspace(workDir, 'task-1');

        const first = await workspace.commit({ type: 'scene_image', sequence: 1 }, Buffer.from('first'), 1);
        const second = await workspace.commit({ type: 'scene_image', sequence: 1 }, Buffer.from('second'), 2);

        expect(second).toBe(first);
        expect(await readFile(first, 'utf8')).toBe('second');
        expect(await readdir(path.dirname(first))).toEqual([ 'scene_001.png' ]);
    });

    it('should remove the whole task directory', async () => {
        const workspace = new AssetWorkspace(workDir, 'task-1');
        await workspace.commit({ type: 'scene_clip', sequence: 1 }, Buffer.from('clip'), 1);

        await workspace.remove();

        expect(await readdir(workDir)).toEqual([]);
    });
});

describe('readMediaPayload', () => {
    it('should decode inline payloads and fetch remote ones', async () => {
        const fetched: string[] = [];
        const fetcher = {
            fetch: async (url: string) => {
                fetched.push(url);
                return Buffer.from('remote');
            },
        };

        const inline = await readMediaPayload({ kind: 'inline', base64: Buffer.from('inline').toString('base64') }, fetcher);
        const remote = await readMediaPayload({ kind: 'remote', url: 'https://media.example.test/a.mp4' }, fetcher);

        expect(Buffer.from(inline).toString()).toBe('inline');
        expect(Buffer.from(remote).toString()).toBe('remote');
        expect(fetched).toEqual([ 'https://media.example.test/a.mp4' ]);
    });
});
