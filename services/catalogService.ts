import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { BLOCK_CATEGORIES, type BlockCategory, type BlockDefinition, type BlockRole } from '../types';
import { errorMessage } from '../utils';

export const BODY_SLOT = '{{body}}';
export const SLOT_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/blocks.json', import.meta.url));

// OCR frequently returns Cyrillic glyphs for P, O, A, etc.
const CYRILLIC_LOOKALIKES: Record<string, string> = {
  'а': 'a',
  'в': 'b',
  'е': 'e',
  'к': 'k',
  'м': 'm',
  'н': 'h',
  'о': 'o',
  'р': 'p',
  'с': 'c',
  'т': 't',
  'у': 'y',
  'х': 'x',
};

/**
 * Canonical lookup key for identifiers, synonyms and raw labels:
 * lowercase, Cyrillic lookalikes mapped to Latin, `_` and `-` read as spaces,
 * punctuation other than `+` dropped, whitespace collapsed.
 */
export function normalizeKey(text: string): string {
  return text
    .toLowerCase()
    .replace(/[\u0400-\u04FF]/g, (ch) => CYRILLIC_LOOKALIKES[ch] ?? ch)
    .replace(/[_-]+/g, ' ')
    .replace(/[^\p{L}\p{N}+\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function templateSlots(template: string): string[] {
  return Array.from(template.matchAll(SLOT_PATTERN), (match) => match[1]);
}

export class CatalogError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'CatalogError';
  }
}

const blockSchema = z.object({
  id: z.string().trim().min(1),
  category: z.enum(BLOCK_CATEGORIES),
  role: z.enum(['container', 'leaf']),
  description: z.string(),
  template: z.string(),
  defaults: z.record(z.string()).default({}),
  synonyms: z.array(z.string()).default([]),
});

const catalogDocumentSchema = z.object({
  defaultContainer: z.string().min(1),
  blocks: z.array(blockSchema).min(1),
});

type ParsedBlock = z.output<typeof blockSchema>;

export interface CategoryListing {
  name: BlockCategory;
  blocks: { id: string; role: BlockRole; description: string }[];
}

function templateIssues(block: ParsedBlock): string[] {
  const issues: string[] = [];
  const slots = templateSlots(block.template);
  const bodySlots = slots.filter((slot) => slot === 'body').length;

  if (block.role === 'container') {
    if (bodySlots !== 1) {
      issues.push(`"${block.id}": container template needs exactly one ${BODY_SLOT} (found ${bodySlots})`);
    } else if (!block.template.split('\n').some((line) => line.trim() === BODY_SLOT)) {
      issues.push(`"${block.id}": ${BODY_SLOT} must sit alone on its own line`);
    }
  } else if (bodySlots > 0) {
    issues.push(`"${block.id}": leaf template cannot contain ${BODY_SLOT}`);
  }

  for (const slot of slots) {
    if (slot !== 'body' && block.defaults[slot] === undefined) {
      issues.push(`"${block.id}": no default for argument {{${slot}}}`);
    }
  }
  return issues;
}

/**
 * Immutable block table. Built once at startup and shared by every request,
 * so nothing here may be mutated after construction.
 */
export class BlockCatalog {
  readonly definitions: readonly BlockDefinition[];
  readonly defaultContainer: BlockDefinition;
  private readonly byKey: ReadonlyMap<string, BlockDefinition>;
  private readonly synonymIndex: ReadonlyMap<string, BlockDefinition>;

  constructor(
    definitions: BlockDefinition[],
    defaultContainer: BlockDefinition,
    synonymIndex: Map<string, BlockDefinition>,
  ) {
    this.definitions = Object.freeze(definitions);
    this.defaultContainer = defaultContainer;
    this.byKey = new Map(definitions.map((def) => [normalizeKey(def.id), def]));
    this.synonymIndex = synonymIndex;
    Object.freeze(this);
  }

  get size(): number {
    return this.definitions.length;
  }

  get(id: string): BlockDefinition | undefined {
    return this.byKey.get(normalizeKey(id));
  }

  resolveSynonym(phrase: string): BlockDefinition | undefined {
    return this.synonymIndex.get(normalizeKey(phrase));
  }

  categories(): CategoryListing[] {
    return BLOCK_CATEGORIES.map((name) => ({
      name,
      blocks: this.definitions
        .filter((def) => def.category === name)
        .map((def) => ({ id: def.id, role: def.role, description: def.description })),
    })).filter((listing) => listing.blocks.length > 0);
  }
}

export function createCatalog(document: unknown): BlockCatalog {
  const parsed = catalogDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new CatalogError(
      'Block catalog does not match the expected shape',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const issues: string[] = [];
  const seen = new Map<string, string>();
  const definitions: BlockDefinition[] = [];

  parsed.data.blocks.forEach((block, order) => {
    const key = normalizeKey(block.id);
    const clash = seen.get(key);
    if (clash !== undefined) {
      issues.push(`"${block.id}": duplicate identifier (clashes with "${clash}")`);
      return;
    }
    seen.set(key, block.id);
    issues.push(...templateIssues(block));
    definitions.push(
      Object.freeze({
        id: block.id,
        category: block.category,
        description: block.description,
        template: block.template,
        role: block.role,
        defaults: Object.freeze({ ...block.defaults }),
        synonyms: Object.freeze([...block.synonyms]),
        order,
      }),
    );
  });

  const synonymIndex = new Map<string, BlockDefinition>();
  for (const def of definitions) {
    for (const synonym of def.synonyms) {
      const key = normalizeKey(synonym);
      const owner = seen.get(key);
      if (owner !== undefined && owner !== def.id) {
        issues.push(`"${def.id}": synonym "${synonym}" shadows identifier "${owner}"`);
        continue;
      }
      const existing = synonymIndex.get(key);
      if (existing && existing !== def) {
        issues.push(`"${def.id}": synonym "${synonym}" is already used by "${existing.id}"`);
        continue;
      }
      synonymIndex.set(key, def);
    }
  }

  const defaultContainer = definitions.find(
    (def) => normalizeKey(def.id) === normalizeKey(parsed.data.defaultContainer),
  );
  if (!defaultContainer) {
    issues.push(`defaultContainer "${parsed.data.defaultContainer}" is not in the catalog`);
  } else if (defaultContainer.role !== 'container') {
    issues.push(`defaultContainer "${defaultContainer.id}" must be a container block`);
  }

  if (issues.length > 0 || !defaultContainer) {
    throw new CatalogError('Block catalog is invalid', issues);
  }

  return new BlockCatalog(definitions, defaultContainer, synonymIndex);
}

export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): BlockCatalog {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error: unknown) {
    throw new CatalogError(`Unable to read block catalog at ${path}: ${errorMessage(error)}`);
  }
  const catalog = createCatalog(document);
  console.log(`📚 Block catalog loaded: ${catalog.size} blocks from ${path}`);
  return catalog;
}
