import { GoogleGenAI, Type } from "@google/genai";
import { z } from 'zod';
import { SYSTEM_INSTRUCTION_VISION, VISION_PROMPT } from "../constants";
import type { DetectedLabel, IVisionService } from "../types";
import { errorMessage, stripJsonFence, withTimeout } from "../utils";

export class VisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VisionError';
  }
}

// Bad position or confidence data is dropped; the label itself still counts
export const detectionSchema = z.object({
  text: z.string().trim().min(1),
  confidence: z.number().min(0).max(1).optional().catch(undefined),
  box: z
    .object({
      x: z.number(),
      y: z.number(),
      width: z.number().nonnegative(),
      height: z.number().nonnegative(),
    })
    .optional()
    .catch(undefined),
});

const responseShape = z.union([
  z.object({ detections: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

// Shared Schema for the model
const detectionResponseSchema = {
  type: Type.OBJECT,
  properties: {
    detections: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          text: { type: Type.STRING },
          confidence: { type: Type.NUMBER },
          box: {
            type: Type.OBJECT,
            properties: {
              x: { type: Type.NUMBER },
              y: { type: Type.NUMBER },
              width: { type: Type.NUMBER },
              height: { type: Type.NUMBER }
            },
            required: ["x", "y", "width", "height"]
          }
        },
        required: ["text"]
      }
    }
  },
  required: ["detections"]
};

/**
 * Turn the model's JSON into detections. Items that do not fit the shape are
 * skipped; a reply that is not JSON at all is a VisionError.
 */
export function parseDetections(text: string): DetectedLabel[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stripJsonFence(text) || '{"detections": []}');
  } catch {
    throw new VisionError('Vision response was not valid JSON');
  }

  const shape = responseShape.safeParse(raw);
  if (!shape.success) {
    throw new VisionError('Vision response did not contain a detections list');
  }
  const items = Array.isArray(shape.data) ? shape.data : shape.data.detections;

  const detections: DetectedLabel[] = [];
  items.forEach((item, index) => {
    const parsed = detectionSchema.safeParse(item);
    if (parsed.success) {
      detections.push(parsed.data);
    } else {
      console.warn(`⚠️ Skipping malformed detection #${index}`);
    }
  });
  return detections;
}

interface GeminiVisionOptions {
  model: string;
  timeoutMs: number;
}

/**
 * Vision Layer (Image -> Detections)
 * Uses BLOCKSIGHT_VISION_API_KEY, read per request so a missing key fails the
 * request rather than the server.
 */
export class GeminiVisionService implements IVisionService {
  constructor(
    private readonly options: GeminiVisionOptions,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  private getClient(): GoogleGenAI {
    const key = this.env.BLOCKSIGHT_VISION_API_KEY;
    if (!key) {
      throw new Error('Configuration Error: Missing API Key for VISION layer.');
    }
    return new GoogleGenAI({ apiKey: key });
  }

  async detect(image: string, mimeType: string): Promise<DetectedLabel[]> {
    const ai = this.getClient();

    let text: string;
    try {
      const response = await withTimeout(
        ai.models.generateContent({
          model: this.options.model,
          contents: {
            parts: [
              { inlineData: { data: image, mimeType } },
              { text: VISION_PROMPT }
            ]
          },
          config: {
            systemInstruction: SYSTEM_INSTRUCTION_VISION,
            temperature: 0.1,
            responseMimeType: "application/json",
            responseSchema: detectionResponseSchema
          }
        }),
        this.options.timeoutMs,
        'Vision request',
      );
      text = response.text ?? '';
    } catch (error: unknown) {
      throw new VisionError(`Vision request failed: ${errorMessage(error)}`);
    }

    const detections = parseDetections(text);
    console.log(`👁️ Vision returned ${detections.length} detections`);
    return detections;
  }
}
