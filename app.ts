import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { ALLOWED_IMAGE_TYPES, MAX_UPLOAD_SIZE } from './constants';
import type { BlockPipeline } from './services/blockPipeline';
import { outline } from './services/programSynthesizer';
import type { TutorService } from './services/tutorService';
import { detectionSchema, VisionError } from './services/visionService';
import type { DetectedLabel, IVisionService, PipelineResult } from './types';
import { errorMessage, sleep } from './utils';

export interface AppDependencies {
  pipeline: BlockPipeline;
  vision: IVisionService;
  tutor: TutorService;
  // Pause between streamed characters
  streamDelayMs: number;
}

// --- Request Schemas ---

const recognizeBody = z.object({
  image: z
    .string()
    .min(1, 'image is required')
    // Accept data URLs as well as bare base64
    .transform((image) => image.replace(/^data:[^;,]+;base64,/, '')),
  mimeType: z.enum(ALLOWED_IMAGE_TYPES),
});

// Blank labels are pipeline noise, not a bad request
const generateBody = z.object({
  detections: z.array(detectionSchema.extend({ text: z.string() })),
});

const codeBody = z.object({
  code: z.string().trim().min(1, 'code is required'),
});

const chatBody = z.object({
  message: z.string().trim().min(1, 'message is required'),
  history: z
    .array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() }))
    .max(50)
    .default([]),
  code: z.string().optional(),
});

type Parsed<T> = { ok: true; data: T } | { ok: false; error: string };

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): Parsed<T> {
  const result = schema.safeParse(body);
  if (result.success) return { ok: true, data: result.data };
  const error = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { ok: false, error };
}

function presentResult(result: PipelineResult) {
  return {
    code: result.code,
    blocks: result.blocks.map((block) => block.definition.id),
    dropped: result.dropped,
    program: outline(result.tree),
  };
}

// --- Server-Sent Events ---

function openEventStream(res: Response): void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();
}

function sendEvent(res: Response, data: Record<string, unknown>): void {
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

const CONTROL_WHITESPACE = new Set(['\n', '\r', '\t']);

// Replays generated text one character at a time; resolves with the full text
async function streamCharacters(res: Response, chunks: AsyncIterable<string>, delayMs: number): Promise<string> {
  let text = '';
  for await (const chunk of chunks) {
    text += chunk;
    for (const word of chunk) {
      if (CONTROL_WHITESPACE.has(word)) continue;
      sendEvent(res, { word });
      if (delayMs > 0) await sleep(delayMs);
    }
  }
  return text;
}

function failStream(res: Response, label: string, error: unknown): void {
  console.error(`${label} Error:`, error);
  if (res.headersSent) {
    sendEvent(res, { error: errorMessage(error) });
    res.end();
  } else {
    res.status(500).json({ error: errorMessage(error) });
  }
}

export function createApp({ pipeline, vision, tutor, streamDelayMs }: AppDependencies): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: MAX_UPLOAD_SIZE }));

  // --- Endpoints ---

  // 1. Recognition (Photo -> Detections -> Code)
  app.post('/api/recognize', async (req, res) => {
    const body = parseBody(recognizeBody, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }

    try {
      const detections: DetectedLabel[] = await vision.detect(body.data.image, body.data.mimeType);
      const result = pipeline.run(detections);
      console.log(`🧩 Recognized ${result.blocks.length} blocks (${result.dropped.length} dropped)`);
      res.json(presentResult(result));
    } catch (error: unknown) {
      console.error('Recognition Error:', error);
      res.status(error instanceof VisionError ? 502 : 500).json({ error: errorMessage(error) });
    }
  });

  // 2. Generation (Detections -> Code), for clients that run their own detector
  app.post('/api/generate', (req, res) => {
    const body = parseBody(generateBody, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }

    try {
      res.json(presentResult(pipeline.run(body.data.detections)));
    } catch (error: unknown) {
      console.error('Generation Error:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // 3. Block palette
  app.get('/api/blocks', (_req, res) => {
    res.json({ success: true, categories: pipeline.catalog.categories() });
  });

  // 4. Tutor Layer
  app.post('/api/suggestions', async (req, res) => {
    const body = parseBody(codeBody, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }

    try {
      const suggestions = await tutor.suggest(body.data.code);
      res.json({ success: true, suggestions });
    } catch (error: unknown) {
      console.error('Suggestion Error:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.post('/api/encouragement/stream', async (req, res) => {
    const body = parseBody(codeBody, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }

    try {
      openEventStream(res);
      await streamCharacters(res, tutor.streamEncouragement(body.data.code), streamDelayMs);
      sendEvent(res, { done: true });
      res.end();
    } catch (error: unknown) {
      failStream(res, 'Encouragement', error);
    }
  });

  app.post('/api/idea/stream', async (req, res) => {
    const body = parseBody(codeBody, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }

    try {
      openEventStream(res);
      const idea = await streamCharacters(res, tutor.streamIdea(body.data.code), streamDelayMs);
      sendEvent(res, { done: true, blocks: tutor.blockReferences(idea) });
      res.end();
    } catch (error: unknown) {
      failStream(res, 'Idea', error);
    }
  });

  // 5. Chat Layer (state passed from client)
  app.post('/api/chat', async (req, res) => {
    const body = parseBody(chatBody, req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }

    try {
      openEventStream(res);
      const { message, history, code } = body.data;
      for await (const text of tutor.streamChat(message, history, code)) {
        sendEvent(res, { text });
      }
      sendEvent(res, { done: true });
      res.end();
    } catch (error: unknown) {
      failStream(res, 'Chat', error);
    }
  });

  app.get('/api/cache-stats', (_req, res) => {
    res.json({ success: true, cacheStats: tutor.cacheStats() });
  });

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Malformed or oversized JSON bodies
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status =
      typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : 500;
    console.error('Request Error:', errorMessage(error));
    res.status(status).json({ error: errorMessage(error) });
  });

  return app;
}
