import { z } from 'zod';
import type { PipelineOptions } from './types';

const number = (fallback: number) => z.coerce.number().finite().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),

  // Vision layer
  BLOCKSIGHT_VISION_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  BLOCKSIGHT_VISION_TIMEOUT_MS: number(20000),

  // Tutor layer (LM Studio exposes an OpenAI-compatible API on localhost:1234)
  BLOCKSIGHT_LLM_BASE_URL: z.string().url().default('http://localhost:1234/v1'),
  BLOCKSIGHT_LLM_API_KEY: z.string().min(1).default('lm-studio'),
  BLOCKSIGHT_LLM_MODEL: z.string().min(1).default('meta-llama-3.1-8b-instruct'),
  BLOCKSIGHT_STREAM_DELAY_MS: number(50),
  BLOCKSIGHT_CACHE_SIZE: z.coerce.number().int().positive().default(500),

  // Pipeline
  BLOCKSIGHT_CATALOG_PATH: z.string().min(1).optional(),
  BLOCKSIGHT_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
  BLOCKSIGHT_DEDUP_DISTANCE: number(20),
  BLOCKSIGHT_NEST_INDENT: number(15),
});

export interface AppConfig {
  port: number;
  vision: { model: string; timeoutMs: number };
  tutor: { baseURL: string; apiKey: string; model: string; streamDelayMs: number; cacheSize: number };
  catalogPath?: string;
  pipeline: PipelineOptions;
}

/**
 * Read configuration from the environment. The vision API key is not part of
 * it: it is looked up per request so the server can start without one.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Configuration Error: ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    vision: { model: e.BLOCKSIGHT_VISION_MODEL, timeoutMs: e.BLOCKSIGHT_VISION_TIMEOUT_MS },
    tutor: {
      baseURL: e.BLOCKSIGHT_LLM_BASE_URL,
      apiKey: e.BLOCKSIGHT_LLM_API_KEY,
      model: e.BLOCKSIGHT_LLM_MODEL,
      streamDelayMs: e.BLOCKSIGHT_STREAM_DELAY_MS,
      cacheSize: e.BLOCKSIGHT_CACHE_SIZE,
    },
    catalogPath: e.BLOCKSIGHT_CATALOG_PATH,
    pipeline: {
      matchThreshold: e.BLOCKSIGHT_MATCH_THRESHOLD,
      dedupDistance: e.BLOCKSIGHT_DEDUP_DISTANCE,
      nestIndent: e.BLOCKSIGHT_NEST_INDENT,
    },
  };
}
