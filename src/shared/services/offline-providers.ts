import path from "path";
import { fileURLToPath } from "url";
import { appendFile, mkdir, readFile, writeFile } from "fs/promises";
import type {
    BreakdownPayload, BreakdownRequest, ComposeSceneRequest, GenerationProviders, ImageRequest, MediaComposer,
    MediaFetcher, MediaPayload, MergeRequest, MotionRequest, NarrationRequest
} from "../types/pipeline.types.js";
import type { ExternalOperation, OperationReply, PromptRewriter, ProviderFault } from "../types/supervised-call.types.js";
import { err, ok } from "../utils/result.js";



export interface OfflineProviderOptions {
    /** Terms the image and motion stand-ins reject as a content-policy violation. */
    blockedTerms?: string[];
    /** Status checks a motion clip stays queued before it succeeds. */
    motionQueuedPolls?: number;
    wordsPerMinute?: number;
    /** Queued motion jobs kept before the oldest is forgotten. */
    maxMotionJobs?: number;
}

const DEFAULT_BLOCKED_TERMS = [ "gore", "bloodbath", "explicit" ];
const SAMPLE_RATE = 8000;
const PLACEHOLDER_PNG = "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=";

const firstSentence = (text: string) => (text.match(/^[^.!?]*[.!?]?/)?.[ 0 ] ?? text).trim().slice(0, 200);

const wordCount = (text: string) => text.split(/\s+/).filter(Boolean).length;

/**
 * Silent mono 16-bit PCM of `durationSec`.
 */
export function silentWav(durationSec: number): Buffer {
    const samples = Math.max(1, Math.round(durationSec * SAMPLE_RATE));
    const data = Buffer.alloc(samples * 2);
    const header = Buffer.alloc(44);
    header.write("RIFF", 0);
    header.writeUInt32LE(36 + data.length, 4);
    header.write("WAVE", 8);
    header.write("fmt ", 12);
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20);
    header.writeUInt16LE(1, 22);
    header.writeUInt32LE(SAMPLE_RATE, 24);
    header.writeUInt32LE(SAMPLE_RATE * 2, 28);
    header.writeUInt16LE(2, 32);
    header.writeUInt16LE(16, 34);
    header.write("data", 36);
    header.writeUInt32LE(data.length, 40);
    return Buffer.concat([ header, data ]);
}

/** One scene per paragraph, in document order. A short first line without end punctuation is the title. */
export function offlineStoryboard(document: string, maxScenes: number) {
    const paragraphs = document.split(/\n\s*\n/).map(p => p.replace(/\s+/g, " ").trim()).filter(Boolean);
    const heading = paragraphs[ 0 ] ?? "";
    const hasHeading = paragraphs.length > 1 && heading.length <= 80 && !/[.!?]$/.test(heading);
    const body = hasHeading ? paragraphs.slice(1) : paragraphs;

    return {
        title: hasHeading ? heading.replace(/^#+\s*/, "") : "Untitled",
        summary: firstSentence(body.join(" ")),
        scenes: body.slice(0, maxScenes).map((paragraph, index) => ({
            sceneNumber: index + 1,
            description: firstSentence(paragraph),
            narration: paragraph,
            duration: Math.max(3, Math.round(wordCount(paragraph) / 2.5)),
            sceneType: index === 0 ? "wide" : "close-up",
        })),
    };
}

/**
 * Deterministic stand-ins for the generation providers, for runs without
 * provider credentials and for tests. Image and motion prompts containing a
 * blocked term are refused the way a moderated provider refuses them.
 */
export function createOfflineProviders(options: OfflineProviderOptions = {}): GenerationProviders {
    const blocked = (options.blockedTerms ?? DEFAULT_BLOCKED_TERMS).map(term => term.toLowerCase());
    const wordsPerMinute = options.wordsPerMinute ?? 150;
    const queuedPolls = options.motionQueuedPolls ?? 1;
    const maxMotionJobs = options.maxMotionJobs ?? 256;

    const policyFault = (prompt: string): ProviderFault | null => {
        const term = blocked.find(t => prompt.toLowerCase().includes(t));
        return term ? { kind: "policy", code: "content_policy_violation", message: `prompt contains "${term}"`, status: 400 } : null;
    };

    const breakdown: ExternalOperation<BreakdownRequest, BreakdownPayload> = {
        name: "breakdown",
        async submit(request) {
            const content = JSON.stringify(offlineStoryboard(request.document, request.maxScenes));
            return ok({ state: "succeeded", payload: { content }, usage: { inputTokens: wordCount(request.prompt), outputTokens: wordCount(content) } });
        },
    };

    const narration: ExternalOperation<NarrationRequest, MediaPayload> = {
        name: "narration",
        async submit(request) {
            const durationSec = Math.max(1, Math.round(wordCount(request.text) / wordsPerMinute * 60));
            return ok({
                state: "succeeded",
                payload: { kind: "inline", base64: silentWav(durationSec).toString("base64"), mimeType: "audio/wav", durationSec },
                usage: { units: request.text.length },
            });
        },
    };

    const image: ExternalOperation<ImageRequest, MediaPayload> = {
        name: "image",
        async submit(request) {
            const fault = policyFault(request.prompt);
            if (fault) return err(fault);
            return ok({ state: "succeeded", payload: { kind: "inline", base64: PLACEHOLDER_PNG, mimeType: "image/png" }, usage: { units: 1 } });
        },
    };

    const jobs = new Map<string, { request: MotionRequest; polls: number; }>();
    let nextJob = 1;
    const motion: ExternalOperation<MotionRequest, MediaPayload> = {
        name: "motion",
        async submit(request) {
            const fault = policyFault(request.prompt);
            if (fault) return err(fault);
            const handle = `motion-${nextJob++}`;
            jobs.set(handle, { request, polls: 0 });
            for (const stale of jobs.keys()) {
                if (jobs.size <= maxMotionJobs) break;
                jobs.delete(stale);
            }
            return ok({ state: "queued", handle });
        },
        async poll(handle): Promise<OperationReply<MediaPayload>> {
            const job = jobs.get(handle);
            if (!job) return err({ kind: "invalid", code: "unknown_handle", message: `no motion job ${handle}`, status: 404 });
            job.polls++;
            if (job.polls <= queuedPolls) return ok({ state: "queued", handle });

            jobs.delete(handle);
            const clip = Buffer.from(`offline clip\nsource: ${job.request.imageRef}\nprompt: ${job.request.prompt}\n`);
            return ok({
                state: "succeeded",
                payload: { kind: "inline", base64: clip.toString("base64"), mimeType: "video/mp4", durationSec: job.request.durationSec },
                usage: { units: job.request.durationSec },
            });
        },
    };

    const rewriter: PromptRewriter = {
        async rewrite(context) {
            let content = context.originalContent;
            for (const term of blocked) {
                content = content.replace(new RegExp(term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "gi"), "");
            }
            content = content.replace(/\s+/g, " ").trim();
            if (!content) return err({ kind: "invalid", code: "empty_rewrite", message: "nothing left after removing blocked terms" });
            return ok(content);
        },
    };

    const fetcher: MediaFetcher = {
        async fetch(url) {
            if (!url.startsWith("file:")) {
                throw new Error(`offline fetcher cannot download ${url}`);
            }
            return readFile(fileURLToPath(url));
        },
    };

    return { breakdown, narration, image, motion, rewriter, fetcher };
}

/**
 * Writes placeholder scene files instead of rendering: a composed scene lists
 * its inputs and the merged output concatenates the scenes.
 */
export function createOfflineComposer(): MediaComposer {
    return {
        async composeScene(request: ComposeSceneRequest) {
            await mkdir(path.dirname(request.outputPath), { recursive: true });
            const manifest = [
                `scene ${request.unit.sequence}`,
                `clip: ${request.clipPath}`,
                `audio: ${request.audioPath}`,
                `subtitle: ${request.subtitleText}`,
            ].join("\n");
            await writeFile(request.outputPath, `${manifest}\n`);
            return request.outputPath;
        },
        async merge(request: MergeRequest) {
            await mkdir(path.dirname(request.outputPath), { recursive: true });
            await writeFile(request.outputPath, `title: ${request.title}\n`);
            for (const scenePath of request.scenePaths) {
                await appendFile(request.outputPath, await readFile(scenePath));
            }
            return request.outputPath;
        },
    };
}
