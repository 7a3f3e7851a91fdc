import path from "path";
import { mkdir, readFile, rm } from "fs/promises";
import { DOCUMENT_TO_VIDEO } from "../shared/constants.js";
import type { PipelineConfig, SupervisionConfig } from "../shared/config.js";
import type { GenerationProviders, MediaComposer } from "../shared/types/pipeline.types.js";
import type { StageUnitStore } from "../shared/services/task-store.js";
import { AssetWorkspace } from "../shared/services/asset-workspace.js";
import { BreakdownAgent } from "../shared/agents/breakdown-agent.js";
import { SceneAssetAgent } from "../shared/agents/scene-asset-agent.js";
import type { PipelineDefinition, StageContext } from "./pipeline-runner.js";



export interface DocumentToVideoDeps {
    providers: GenerationProviders;
    composer: MediaComposer;
    units: StageUnitStore;
    supervision: SupervisionConfig;
    pipeline: PipelineConfig;
}

/** Reads the input document as UTF-8 and trims it. */
export async function readDocument(inputRef: string): Promise<string> {
    const text = await readFile(inputRef, "utf8");
    const document = text.trim();
    if (!document) {
        throw new Error(`document ${inputRef} is empty`);
    }
    return document;
}

export const finalOutputPath = (outputDir: string, taskId: string) =>
    path.resolve(outputDir, `${taskId}_final.mp4`);

/**
 * Document in, narrated video out:
 * read -> storyboard breakdown -> per-scene assets -> scene composition -> final merge.
 */
export function createDocumentToVideoPipeline(deps: DocumentToVideoDeps): PipelineDefinition {
    const { providers, composer, units, supervision, pipeline } = deps;

    const workspaceFor = (ctx: StageContext) => new AssetWorkspace(pipeline.workDir, ctx.task.id);
    const agentOptions = (ctx: StageContext) => ({
        taskId: ctx.task.id,
        audit: ctx.audit,
        signal: ctx.signal,
        logger: ctx.logger,
    });

    return {
        kind: DOCUMENT_TO_VIDEO,
        stages: [
            {
                name: "read_document",
                checkpoint: 0.2,
                async run(ctx) {
                    const document = await readDocument(ctx.task.inputRef);
                    ctx.logger.info({ characters: document.length }, "Document loaded");
                    return { statePatch: { documentChars: document.length } };
                },
            },
            {
                name: "breakdown",
                checkpoint: 0.3,
                async run(ctx) {
                    const document = await readDocument(ctx.task.inputRef);
                    const agent = new BreakdownAgent(providers.breakdown, supervision, agentOptions(ctx));
                    const { storyboard, units: scenes } = await agent.breakdown(document, pipeline.maxScenes);
                    ctx.signal.throwIfAborted();
                    await units.replaceUnits(ctx.task.id, scenes);
                    return { statePatch: { title: storyboard.title, summary: storyboard.summary, sceneCount: scenes.length } };
                },
            },
            {
                name: "generate_assets",
                checkpoint: 0.6,
                async run(ctx) {
                    const workspace = workspaceFor(ctx);
                    await workspace.ensure();
                    const agent = new SceneAssetAgent(providers, workspace, supervision, pipeline, agentOptions(ctx));

                    const scenes = await units.listUnits(ctx.task.id);
                    if (scenes.length === 0) throw new Error("no scenes to generate");

                    for (const [ index, unit ] of scenes.entries()) {
                        const patch = await agent.generateAll(unit);
                        ctx.signal.throwIfAborted();
                        await units.updateUnit(ctx.task.id, unit.sequence, patch);
                        await ctx.reportProgress((index + 1) / scenes.length);
                    }
                    return { statePatch: { scenesWithAssets: scenes.length } };
                },
            },
            {
                name: "compose_scenes",
                checkpoint: 0.8,
                async run(ctx) {
                    const workspace = workspaceFor(ctx);
                    const scenes = await units.listUnits(ctx.task.id);

                    for (const [ index, unit ] of scenes.entries()) {
                        if (!unit.clipRef || !unit.audioRef || !unit.imageRef) {
                            throw new Error(`scene ${unit.sequence} is missing generated assets`);
                        }
                        const composedRef = await composer.composeScene({
                            unit,
                            clipPath: unit.clipRef,
                            audioPath: unit.audioRef,
                            subtitleText: unit.narration,
                            outputPath: workspace.getAssetPath({ type: "composed_scene", sequence: unit.sequence }),
                        }, ctx.signal);
                        ctx.signal.throwIfAborted();
                        await units.updateUnit(ctx.task.id, unit.sequence, { composedRef });
                        await ctx.reportProgress((index + 1) / scenes.length);
                    }
                    return { statePatch: { composedScenes: scenes.length } };
                },
            },
            {
                name: "assemble",
                checkpoint: 0.9,
                async run(ctx) {
                    const scenes = await units.listUnits(ctx.task.id);
                    const scenePaths = scenes.map(unit => {
                        if (!unit.composedRef) throw new Error(`scene ${unit.sequence} was not composed`);
                        return unit.composedRef;
                    });

                    await mkdir(path.resolve(pipeline.outputDir), { recursive: true });
                    const title = typeof ctx.task.state.title === "string" ? ctx.task.state.title : ctx.task.id;
                    const outputRef = await composer.merge({
                        scenePaths,
                        outputPath: finalOutputPath(pipeline.outputDir, ctx.task.id),
                        title,
                    }, ctx.signal);

                    await workspaceFor(ctx).remove();
                    ctx.logger.info({ outputRef, scenes: scenePaths.length }, "Final video assembled");
                    return { outputRef };
                },
                async discard(outcome) {
                    if (outcome.outputRef) await rm(outcome.outputRef, { force: true });
                },
            },
        ],
    };
}
