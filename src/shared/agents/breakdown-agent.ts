import { Storyboard } from "../types/pipeline.types.js";
import type { BreakdownPayload, BreakdownRequest } from "../types/pipeline.types.js";
import type { ExternalOperation } from "../types/supervised-call.types.js";
import type { StageUnit } from "../types/task.types.js";
import type { SupervisionConfig } from "../config.js";
import type { CallAuditSink } from "../services/call-audit-log.js";
import { runSupervisedCall } from "../services/supervised-call.js";
import { cleanJsonOutput } from "../utils/utils.js";
import { SupervisedCallFailedError } from "../utils/errors.js";
import { buildBreakdownPrompt } from "../prompts/scene-prompts.js";
import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";



export interface BreakdownResult {
  storyboard: Storyboard;
  units: StageUnit[];
}

/**
 * Turns a document into a storyboard through the breakdown provider and
 * lays the scenes out as dense, 1-based stage units.
 */
export class BreakdownAgent {
  private logger: Logger;

  constructor(
    private provider: ExternalOperation<BreakdownRequest, BreakdownPayload>,
    private supervision: SupervisionConfig,
    private options: { taskId: string; audit?: CallAuditSink; signal?: AbortSignal; logger?: Logger; }
  ) {
    this.logger = options.logger ?? rootLogger;
  }

  async breakdown(document: string, maxScenes: number): Promise<BreakdownResult> {
    const result = await runSupervisedCall(this.provider, { prompt: buildBreakdownPrompt(document, maxScenes), document, maxScenes }, {
      taskId: this.options.taskId,
      polling: this.supervision.lightPolling,
      policyRejectionCodes: this.supervision.policyRejectionCodes,
      maxPolicyRetries: 0,
      rateLimit: this.supervision.rateLimit,
      audit: this.options.audit,
      signal: this.options.signal,
      logger: this.logger,
    });
    if (!result.ok) throw new SupervisedCallFailedError(result.error);

    const storyboard = parseStoryboard(result.value.payload.content);
    if (storyboard.scenes.length > maxScenes) {
      this.logger.warn({ scenes: storyboard.scenes.length, maxScenes }, "Storyboard exceeds scene limit; truncating");
    }
    const scenes = storyboard.scenes.slice(0, maxScenes);
    this.logger.info({ title: storyboard.title, scenes: scenes.length }, "Storyboard generated");

    return {
      storyboard: { ...storyboard, scenes },
      units: toStageUnits(this.options.taskId, scenes),
    };
  }
}

/**
 * Parses the provider's raw answer into a validated storyboard.
 * @throws {Error} when the answer is not JSON or does not match the storyboard shape.
 */
export function parseStoryboard(content: string): Storyboard {
  let raw: unknown;
  try {
    raw = JSON.parse(cleanJsonOutput(content));
  } catch (error) {
    throw new Error(`breakdown response is not valid JSON: ${content.slice(0, 120)}`, { cause: error });
  }

  const parsed = Storyboard.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`invalid storyboard: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/** Orders scenes by their stated number (array order otherwise) and renumbers them densely from 1. */
export function toStageUnits(taskId: string, scenes: Storyboard[ "scenes" ]): StageUnit[] {
  return scenes
    .map((scene, index) => ({ scene, index }))
    .sort((a, b) => (a.scene.sceneNumber ?? a.index + 1) - (b.scene.sceneNumber ?? b.index + 1) || a.index - b.index)
    .map(({ scene }, index) => ({
      taskId,
      sequence: index + 1,
      description: scene.description,
      narration: scene.narration || scene.description,
      sceneType: scene.sceneType ?? null,
      durationHint: scene.duration ?? null,
      audioRef: null,
      audioDurationSec: null,
      imageRef: null,
      clipRef: null,
      composedRef: null,
    }));
}
