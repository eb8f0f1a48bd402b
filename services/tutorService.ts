import OpenAI from 'openai';
import { z } from 'zod';
import {
  FALLBACK_CHAT,
  FALLBACK_ENCOURAGEMENT,
  FALLBACK_IDEA,
  SYSTEM_INSTRUCTION_CHAT,
  SYSTEM_INSTRUCTION_ENCOURAGEMENT,
  SYSTEM_INSTRUCTION_IDEA,
  SYSTEM_INSTRUCTION_SUGGESTION,
} from '../constants';
import type {
  CacheKind,
  CacheStats,
  ChatMessage,
  GenerationOptions,
  IGenerationChunk,
  ILanguageModel,
  Suggestion,
} from '../types';
import { errorMessage, stripJsonFence } from '../utils';
import type { BlockCatalog } from './catalogService';
import { buildTargetedSuggestion, extractBlockReferences } from './codeAnalysis';
import type { LabelNormalizer } from './labelNormalizer';
import type { ResponseCache } from './responseCache';

// --- Language Model (OpenAI-compatible local endpoint) ---

interface LocalModelOptions {
  baseURL: string;
  apiKey: string;
  model: string;
}

function toParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class LocalLanguageModel implements ILanguageModel {
  private readonly client: OpenAI;

  constructor(private readonly options: LocalModelOptions) {
    this.client = new OpenAI({ baseURL: options.baseURL, apiKey: options.apiKey });
  }

  async generate(messages: ChatMessage[], options: GenerationOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: messages.map(toParam),
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
    });
    return response.choices[0]?.message?.content ?? '';
  }

  async *generateStream(messages: ChatMessage[], options: GenerationOptions): AsyncGenerator<IGenerationChunk> {
    const stream = await this.client.chat.completions.create({
      model: this.options.model,
      messages: messages.map(toParam),
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      stream: true,
    });
    for await (const chunk of stream) {
      const text = chunk.choices[0]?.delta?.content;
      if (text) yield { text };
    }
  }
}

// --- Tutor ---

const suggestionSchema = z.object({
  encouragement: z.string().trim().min(1),
  idea: z.string().trim().min(1),
});

const ENCOURAGEMENT_OPTIONS: GenerationOptions = { temperature: 0.7, maxTokens: 100 };
const IDEA_OPTIONS: GenerationOptions = { temperature: 0.8, maxTokens: 120 };
const SUGGESTION_OPTIONS: GenerationOptions = { temperature: 0.7, maxTokens: 300, json: true };
const CHAT_OPTIONS: GenerationOptions = { temperature: 0.7, maxTokens: 300 };

/**
 * TUTOR SERVICE
 * Encouragement, next-step ideas and chat about the student's generated code.
 * The local model may be offline; every operation degrades to a fixed reply.
 */
export class TutorService {
  private readonly blockList: string;

  constructor(
    private readonly model: ILanguageModel,
    private readonly catalog: BlockCatalog,
    private readonly normalizer: LabelNormalizer,
    private readonly cache: ResponseCache,
  ) {
    this.blockList = this.describeBlocks();
  }

  blockReferences(text: string): string[] {
    return extractBlockReferences(text, (label) => this.normalizer.resolve(label));
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  async suggest(code: string): Promise<Suggestion> {
    // 1. Cache
    const cached = this.cache.get('suggestion', code);
    if (cached) return cached;

    // 2. Targeted (rule-based) suggestion for recognized patterns
    const targeted = buildTargetedSuggestion(code, (label) => this.normalizer.resolve(label));
    if (targeted) {
      this.cache.set('suggestion', code, targeted);
      return targeted;
    }

    // 3. Local model
    try {
      const raw = await this.model.generate(this.messages(SYSTEM_INSTRUCTION_SUGGESTION, code), SUGGESTION_OPTIONS);
      const parsed = suggestionSchema.parse(JSON.parse(stripJsonFence(raw)));
      const suggestion: Suggestion = { ...parsed, blocks: this.blockReferences(parsed.idea) };
      this.cache.set('suggestion', code, suggestion);
      return suggestion;
    } catch (error: unknown) {
      console.error('Suggestion Error:', errorMessage(error));
    }

    // 4. Fixed fallback, not cached so the model is tried again next time
    return {
      encouragement: FALLBACK_ENCOURAGEMENT,
      idea: FALLBACK_IDEA,
      blocks: this.blockReferences(FALLBACK_IDEA),
    };
  }

  streamEncouragement(code: string): AsyncGenerator<string> {
    return this.streamCached('encouragement', code, SYSTEM_INSTRUCTION_ENCOURAGEMENT, ENCOURAGEMENT_OPTIONS, FALLBACK_ENCOURAGEMENT);
  }

  streamIdea(code: string): AsyncGenerator<string> {
    return this.streamCached('idea', code, SYSTEM_INSTRUCTION_IDEA, IDEA_OPTIONS, FALLBACK_IDEA);
  }

  async *streamChat(message: string, history: ChatMessage[], code?: string): AsyncGenerator<string> {
    const messages: ChatMessage[] = [{ role: 'system', content: `${SYSTEM_INSTRUCTION_CHAT}\n${this.blockList}` }];
    if (code && code.trim()) {
      messages.push({ role: 'system', content: `The student's current code:\n${code}` });
    }
    // State passed from client; only conversational turns are accepted
    messages.push(...history.filter((turn) => turn.role !== 'system'));
    messages.push({ role: 'user', content: message });

    let streamed = false;
    try {
      for await (const chunk of this.model.generateStream(messages, CHAT_OPTIONS)) {
        streamed = true;
        yield chunk.text;
      }
    } catch (error: unknown) {
      console.error('Chat Error:', errorMessage(error));
      if (!streamed) yield FALLBACK_CHAT;
    }
  }

  private async *streamCached(
    kind: Exclude<CacheKind, 'suggestion'>,
    code: string,
    systemInstruction: string,
    options: GenerationOptions,
    fallback: string,
  ): AsyncGenerator<string> {
    const cached = this.cache.get(kind, code);
    if (cached) {
      yield cached;
      return;
    }

    let text = '';
    try {
      for await (const chunk of this.model.generateStream(this.messages(systemInstruction, code), options)) {
        text += chunk.text;
        yield chunk.text;
      }
    } catch (error: unknown) {
      console.error(`${kind} stream Error:`, errorMessage(error));
      if (!text) yield fallback;
      return;
    }

    if (text.trim()) {
      this.cache.set(kind, code, text.trim());
    } else {
      yield fallback;
    }
  }

  private messages(systemInstruction: string, code: string): ChatMessage[] {
    return [
      { role: 'system', content: `${systemInstruction}\n${this.blockList}` },
      { role: 'user', content: `Here is the student's micro:bit code:\n\n${code}` },
    ];
  }

  // Labels the model may reference, as printed on the blocks
  private describeBlocks(): string {
    const triggers = this.catalog.definitions.filter((d) => d.role === 'container' && (d.category === 'events' || d.category === 'radio'));
    const actions = this.catalog.definitions.filter((d) => d.role === 'leaf');
    const label = (id: string) => id.toUpperCase();
    return [
      'AVAILABLE BLOCK LABELS:',
      `TRIGGER labels (pick exactly ONE): ${triggers.map((d) => label(d.id)).join(', ')}`,
      `ACTION labels: ${actions.map((d) => label(d.id)).join(', ')}`,
    ].join('\n');
  }
}
