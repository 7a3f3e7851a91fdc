//shared/types/pipeline.types.ts
import { z } from "zod";
import type { ExternalOperation, PromptRewriter } from "./supervised-call.types.js";
import type { StageUnit } from "./task.types.js";



// ============================================================================
// STORYBOARD
// ============================================================================

/** Snake-case keys some models answer with, mapped onto the canonical ones. */
const SCENE_KEY_ALIASES: Record<string, string> = {
    scene_number: "sceneNumber",
    scene_description: "description",
    dialogue: "narration",
    scene_type: "sceneType",
};

const normalizeSceneKeys = (value: unknown): unknown => {
    if (!value || typeof value !== "object" || Array.isArray(value)) return value;
    return Object.fromEntries(Object.entries(value).map(([ key, inner ]) => [ SCENE_KEY_ALIASES[ key ] ?? key, inner ]));
};

export const StoryboardScene = z.preprocess(normalizeSceneKeys, z.object({
    sceneNumber: z.coerce.number().int().positive().optional(),
    description: z.string().trim().min(1),
    narration: z.string().trim().default(""),
    duration: z.coerce.number().positive().optional(),
    sceneType: z.string().trim().optional(),
    mood: z.string().trim().optional(),
}));
export type StoryboardScene = z.infer<typeof StoryboardScene>;

export const Storyboard = z.object({
    title: z.string().trim().default("Untitled"),
    summary: z.string().trim().default(""),
    scenes: z.array(StoryboardScene).min(1, "storyboard contains no scenes"),
});
export type Storyboard = z.infer<typeof Storyboard>;

// ============================================================================
// PROVIDER REQUESTS & PAYLOADS
// ============================================================================

export interface BreakdownRequest {
    /** Full instruction sent to a language model. */
    prompt: string;
    /** The source text alone, for providers that do not take instructions. */
    document: string;
    maxScenes: number;
}

/** Raw model output; parsed and validated by the breakdown agent. */
export interface BreakdownPayload {
    content: string;
}

export interface NarrationRequest {
    text: string;
    voice?: string;
    speed?: number;
}

export interface ImageRequest {
    prompt: string;
    width: number;
    height: number;
    style?: string;
    seed?: number;
}

export interface MotionRequest {
    prompt: string;
    imageRef: string;
    durationSec: number;
    seed?: number;
}

/** Generated media is either inline (base64) or fetched from a location. */
export type MediaPayload =
    | { kind: "inline"; base64: string; mimeType?: string; durationSec?: number; }
    | { kind: "remote"; url: string; mimeType?: string; durationSec?: number; };

export interface MediaFetcher {
    fetch(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface GenerationProviders {
    breakdown: ExternalOperation<BreakdownRequest, BreakdownPayload>;
    narration: ExternalOperation<NarrationRequest, MediaPayload>;
    image: ExternalOperation<ImageRequest, MediaPayload>;
    motion: ExternalOperation<MotionRequest, MediaPayload>;
    rewriter: PromptRewriter;
    fetcher: MediaFetcher;
}

// ============================================================================
// COMPOSITION
// ============================================================================

export interface ComposeSceneRequest {
    unit: StageUnit;
    clipPath: string;
    audioPath: string;
    subtitleText: string;
    outputPath: string;
}

export interface MergeRequest {
    scenePaths: string[];
    outputPath: string;
    title: string;
}

/** Audio/video composition. Rendering details live behind this interface. */
export interface MediaComposer {
    composeScene(request: ComposeSceneRequest, signal?: AbortSignal): Promise<string>;
    merge(request: MergeRequest, signal?: AbortSignal): Promise<string>;
}
