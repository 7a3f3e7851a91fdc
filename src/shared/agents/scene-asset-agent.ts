import type { GenerationProviders, ImageRequest, MediaPayload, MotionRequest } from "../types/pipeline.types.js";
import type { ContentLens, ExternalOperation, PollingPolicy } from "../types/supervised-call.types.js";
import type { StageUnit, StageUnitPatch } from "../types/task.types.js";
import type { PipelineConfig, SupervisionConfig } from "../config.js";
import type { CallAuditSink } from "../services/call-audit-log.js";
import { AssetWorkspace, readMediaPayload } from "../services/asset-workspace.js";
import type { AssetPathParams } from "../services/asset-workspace.js";
import { runSupervisedCall } from "../services/supervised-call.js";
import { SupervisedCallFailedError } from "../utils/errors.js";
import { buildImagePrompt, buildMotionPrompt } from "../prompts/scene-prompts.js";
import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";



export const promptLens = <R extends { prompt: string; }>(): ContentLens<R> => ({
  get: (request) => request.prompt,
  set: (request, prompt) => ({ ...request, prompt }),
});

export interface SceneAssetAgentOptions {
  taskId: string;
  audit?: CallAuditSink;
  signal?: AbortSignal;
  logger?: Logger;
}

// ============================================================================
// SCENE ASSET AGENT
// ============================================================================

/**
 * Generates the narration, still image and motion clip of one scene.
 * Image and motion prompts are rewritten and retried on content-policy
 * rejections; narration is not.
 */
export class SceneAssetAgent {
  private logger: Logger;

  constructor(
    private providers: GenerationProviders,
    private workspace: AssetWorkspace,
    private supervision: SupervisionConfig,
    private pipeline: PipelineConfig,
    private options: SceneAssetAgentOptions
  ) {
    this.logger = options.logger ?? rootLogger;
  }

  async generateNarration(unit: StageUnit): Promise<{ audioRef: string; audioDurationSec: number | null; }> {
    const { path, durationSec } = await this.generate(
      this.providers.narration,
      { text: unit.narration },
      { type: 'narration_audio', sequence: unit.sequence },
      this.supervision.lightPolling
    );
    return { audioRef: path, audioDurationSec: durationSec ?? null };
  }

  async generateImage(unit: StageUnit): Promise<{ imageRef: string; }> {
    const { path } = await this.generate(
      this.providers.image,
      { prompt: buildImagePrompt(unit), width: this.pipeline.imageWidth, height: this.pipeline.imageHeight },
      { type: 'scene_image', sequence: unit.sequence },
      this.supervision.lightPolling,
      promptLens<ImageRequest>()
    );
    return { imageRef: path };
  }

  async generateClip(unit: StageUnit, imageRef: string): Promise<{ clipRef: string; }> {
    const { path } = await this.generate(
      this.providers.motion,
      { prompt: buildMotionPrompt(unit), imageRef, durationSec: unit.durationHint ?? this.pipeline.defaultSceneSeconds },
      { type: 'scene_clip', sequence: unit.sequence },
      this.supervision.heavyPolling,
      promptLens<MotionRequest>()
    );
    return { clipRef: path };
  }

  /** All three assets, in dependency order. The clip animates the generated image. */
  async generateAll(unit: StageUnit): Promise<StageUnitPatch> {
    this.logger.info({ sequence: unit.sequence }, `Generating assets for scene ${unit.sequence}`);
    const narration = await this.generateNarration(unit);
    const image = await this.generateImage(unit);
    const clip = await this.generateClip(unit, image.imageRef);
    return { ...narration, ...image, ...clip };
  }

  /** Without a lens the content cannot be rewritten, so a policy rejection ends the call. */
  private async generate<Req>(
    operation: ExternalOperation<Req, MediaPayload>,
    request: Req,
    asset: AssetPathParams,
    polling: PollingPolicy,
    lens?: ContentLens<Req>
  ): Promise<{ path: string; durationSec?: number; }> {
    const result = await runSupervisedCall(operation, request, {
      taskId: this.options.taskId,
      polling,
      policyRejectionCodes: this.supervision.policyRejectionCodes,
      maxPolicyRetries: lens ? this.supervision.maxPolicyRetries : 0,
      lens,
      rewriter: lens ? this.providers.rewriter : undefined,
      rateLimit: this.supervision.rateLimit,
      audit: this.options.audit,
      signal: this.options.signal,
      logger: this.logger,
    });
    if (!result.ok) throw new SupervisedCallFailedError(result.error);

    const { payload, attempts } = result.value;
    const bytes = await readMediaPayload(payload, this.providers.fetcher, this.options.signal);
    const path = await this.workspace.commit(asset, bytes, attempts);
    this.logger.debug({ path, attempts }, `${operation.name} asset saved`);
    return { path, durationSec: payload.durationSec };
  }
}
