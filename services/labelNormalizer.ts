import type {
  BlockCategory,
  BlockDefinition,
  CanonicalBlock,
  DetectedLabel,
  DroppedLabel,
  NormalizationResult,
} from '../types';
import { type BlockCatalog, normalizeKey } from './catalogService';

export type MatchMethod = 'exact' | 'synonym' | 'fuzzy' | 'none';

export interface LabelMatch {
  method: MatchMethod;
  definition?: BlockDefinition;
  // Best fuzzy candidate, reported even when it falls below the threshold
  candidate?: BlockDefinition;
  similarity: number;
}

export interface NormalizerOptions {
  matchThreshold: number;
}

interface Scored {
  definition: BlockDefinition;
  similarity: number;
  distance: number;
}

// Calculate Levenshtein distance for fuzzy matching
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // substitution
        current[j - 1] + 1,     // insertion
        previous[j] + 1         // deletion
      );
    }
    previous = current;
  }
  return previous[b.length];
}

// Similarity score between two normalized keys (0-1)
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 0;
  return 1 - levenshteinDistance(a, b) / maxLen;
}

/**
 * LABEL NORMALIZER
 * Maps raw detector text to catalog identifiers. Order of precedence:
 * exact identifier, synonym table, then fuzzy similarity at or above the threshold.
 * A label that matches nothing is dropped; it never fails the pipeline.
 */
export class LabelNormalizer {
  private readonly keyed: { definition: BlockDefinition; key: string }[];

  constructor(
    private readonly catalog: BlockCatalog,
    private readonly options: NormalizerOptions,
  ) {
    this.keyed = catalog.definitions.map((definition) => ({ definition, key: normalizeKey(definition.id) }));
  }

  normalize(labels: readonly DetectedLabel[]): NormalizationResult {
    const blocks: CanonicalBlock[] = [];
    const dropped: DroppedLabel[] = [];
    let previousCategory: BlockCategory | undefined;

    labels.forEach((label, index) => {
      const match = this.match(label.text, previousCategory);
      if (match.definition) {
        blocks.push({ definition: match.definition, label, index });
        previousCategory = match.definition.category;
        return;
      }

      console.warn(
        `⚠️ Dropped label "${label.text}" (best: ${match.candidate?.id ?? 'none'}, similarity ${match.similarity.toFixed(2)})`,
      );
      dropped.push({
        text: label.text,
        index,
        bestMatch: match.candidate?.id,
        similarity: match.similarity,
      });
    });

    return { blocks, dropped };
  }

  match(text: string, previousCategory?: BlockCategory): LabelMatch {
    const key = normalizeKey(text);
    if (!key) return { method: 'none', similarity: 0 };

    const exact = this.catalog.get(key);
    if (exact) return { method: 'exact', definition: exact, similarity: 1 };

    const synonym = this.catalog.resolveSynonym(key);
    if (synonym) return { method: 'synonym', definition: synonym, similarity: 1 };

    const best = this.bestFuzzy(key, previousCategory);
    if (!best) return { method: 'none', similarity: 0 };
    // A score equal to the threshold is a match
    if (best.similarity >= this.options.matchThreshold) {
      return { method: 'fuzzy', definition: best.definition, candidate: best.definition, similarity: best.similarity };
    }
    return { method: 'none', candidate: best.definition, similarity: best.similarity };
  }

  resolve(text: string): BlockDefinition | undefined {
    return this.match(text).definition;
  }

  private bestFuzzy(key: string, previousCategory?: BlockCategory): Scored | undefined {
    let best: Scored | undefined;
    for (const entry of this.keyed) {
      const distance = levenshteinDistance(key, entry.key);
      const candidate: Scored = {
        definition: entry.definition,
        distance,
        similarity: 1 - distance / Math.max(key.length, entry.key.length),
      };
      if (!best || this.outranks(candidate, best, previousCategory)) {
        best = candidate;
      }
    }
    return best;
  }

  // Higher similarity, then the previous label's category, then the shorter
  // edit distance, then catalog declaration order
  private outranks(a: Scored, b: Scored, previousCategory?: BlockCategory): boolean {
    if (a.similarity !== b.similarity) return a.similarity > b.similarity;

    const aLocal = previousCategory !== undefined && a.definition.category === previousCategory;
    const bLocal = previousCategory !== undefined && b.definition.category === previousCategory;
    if (aLocal !== bLocal) return aLocal;

    if (a.distance !== b.distance) return a.distance < b.distance;
    return a.definition.order < b.definition.order;
  }
}
