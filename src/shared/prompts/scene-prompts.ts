import type { StageUnit } from "../types/task.types.js";

export const buildBreakdownPrompt = (document: string, maxScenes: number) => `As a storyboard writer, break the following document down into a short narrated video.

REQUIREMENTS:
1. Split the content into at most ${maxScenes} scenes, in story order.
2. Every scene has:
   - description: a concrete visual description suitable for image generation
   - narration: the narration or dialogue read aloud over the scene
   - duration: suggested length in seconds (5-30)
   - sceneType: interior / exterior / close-up / wide
   - mood: the atmosphere of the scene
3. Keep narration natural and the whole video between 3 and 5 minutes.

DOCUMENT:
${document}

Respond with JSON only, in this shape:
{
  "title": "document title",
  "summary": "one paragraph summary",
  "scenes": [
    {
      "sceneNumber": 1,
      "description": "...",
      "narration": "...",
      "duration": 15,
      "sceneType": "exterior",
      "mood": "..."
    }
  ]
}`;

export const buildImagePrompt = (unit: StageUnit) =>
  [ unit.description, unit.sceneType ? `Shot type: ${unit.sceneType}.` : "", "Soft natural lighting, high detail, no text or watermarks." ]
    .filter(Boolean)
    .join(" ");

export const buildMotionPrompt = (unit: StageUnit) =>
  `Animate this still: ${unit.description}. Slow, steady camera movement; keep the composition and subjects of the image.`;
