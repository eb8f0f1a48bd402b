export const BLOCK_CATEGORIES = [
  'basic',
  'input',
  'music',
  'events',
  'logic',
  'loops',
  'math',
  'led',
  'control',
  'variables',
  'pins',
  'radio',
] as const;

export type BlockCategory = (typeof BLOCK_CATEGORIES)[number];

export type BlockRole = 'container' | 'leaf';

export interface BlockDefinition {
  id: string;
  category: BlockCategory;
  description: string;
  template: string;
  role: BlockRole;
  defaults: Readonly<Record<string, string>>;
  synonyms: readonly string[];
  // Position in the catalog document, used as the last tie-break
  order: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DetectedLabel {
  text: string;
  confidence?: number;
  box?: BoundingBox;
}

export interface CanonicalBlock {
  definition: BlockDefinition;
  label: DetectedLabel;
  // Index of the label in the detector output
  index: number;
}

export interface ProgramNode {
  block: CanonicalBlock;
  children: ProgramNode[];
  // True for the default container the synthesizer adds itself
  implicit: boolean;
}

export interface ProgramTree {
  roots: ProgramNode[];
}

export interface DroppedLabel {
  text: string;
  index: number;
  bestMatch?: string;
  similarity: number;
}

export interface NormalizationResult {
  blocks: CanonicalBlock[];
  dropped: DroppedLabel[];
}

export interface PipelineOptions {
  matchThreshold: number;
  dedupDistance: number;
  nestIndent: number;
}

export interface PipelineResult {
  code: string;
  tree: ProgramTree;
  blocks: CanonicalBlock[];
  dropped: DroppedLabel[];
}

// --- Tutor Types ---

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface IGenerationChunk {
  text: string;
}

export interface GenerationOptions {
  temperature: number;
  maxTokens: number;
  json?: boolean;
}

export interface ILanguageModel {
  generate(messages: ChatMessage[], options: GenerationOptions): Promise<string>;
  generateStream(messages: ChatMessage[], options: GenerationOptions): AsyncGenerator<IGenerationChunk>;
}

export interface IVisionService {
  detect(image: string, mimeType: string): Promise<DetectedLabel[]>;
}

export interface Suggestion {
  encouragement: string;
  idea: string;
  blocks: string[];
}

export type CacheKind = 'suggestion' | 'encouragement' | 'idea';

export interface CacheStats {
  totalEntries: number;
  suggestionEntries: number;
  encouragementEntries: number;
  ideaEntries: number;
  uniquePatterns: number;
}
