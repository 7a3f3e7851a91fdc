import path from "path";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import type { MediaFetcher, MediaPayload } from "../types/pipeline.types.js";



export type AssetPathParams =
  | { type: 'narration_audio'; sequence: number; }
  | { type: 'scene_image'; sequence: number; }
  | { type: 'scene_clip'; sequence: number; }
  | { type: 'composed_scene'; sequence: number; };

const pad = (value: number, width: number) => value.toString().padStart(width, '0');

/**
 * Per-task scratch directory for generated media.
 *
 * Assets are written to an attempt-scoped staging file first and renamed into
 * place, so a reader never sees a partially written asset and an abandoned
 * attempt never shadows the accepted one.
 */
export class AssetWorkspace {
  readonly root: string;

  constructor(workDir: string, readonly taskId: string) {
    this.root = path.resolve(workDir, taskId);
  }

  getAssetPath(params: AssetPathParams): string {
    const scene = `scene_${pad(params.sequence, 3)}`;

    switch (params.type) {
      case 'narration_audio':
        return path.join(this.root, 'audio', `${scene}.wav`);

      case 'scene_image':
        return path.join(this.root, 'images', `${scene}.png`);

      case 'scene_clip':
        return path.join(this.root, 'clips', `${scene}.mp4`);

      case 'composed_scene':
        return path.join(this.root, 'composed', `${scene}.mp4`);
    }
  }

  getStagingPath(params: AssetPathParams, attempt: number): string {
    return `${this.getAssetPath(params)}.attempt_${pad(attempt, 2)}.tmp`;
  }

  async ensure(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  /**
   * Writes the bytes produced by `attempt` and promotes them to the asset path.
   * @returns the final asset path.
   */
  async commit(params: AssetPathParams, data: Uint8Array, attempt: number): Promise<string> {
    const finalPath = this.getAssetPath(params);
    const stagingPath = this.getStagingPath(params, attempt);

    await mkdir(path.dirname(finalPath), { recursive: true });
    await writeFile(stagingPath, data);
    await rename(stagingPath, finalPath);
    return finalPath;
  }

  async remove(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }
}

/** Resolves generated media to bytes, fetching remote payloads. */
export async function readMediaPayload(payload: MediaPayload, fetcher: MediaFetcher, signal?: AbortSignal): Promise<Uint8Array> {
  switch (payload.kind) {
    case 'inline':
      return Buffer.from(payload.base64, 'base64');
    case 'remote':
      return fetcher.fetch(payload.url, signal);
  }
}
