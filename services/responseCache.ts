import type { CacheKind, CacheStats, Suggestion } from '../types';
import { analyzeStudentCode } from './codeAnalysis';

interface CacheValues {
  suggestion: Suggestion;
  encouragement: string;
  idea: string;
}

type Stores = { [K in CacheKind]: Map<string, CacheValues[K]> };

/**
 * Cache key for a program: what it uses, not how it is spelled. Two programs
 * with the same triggers, actions, sensors, pins and length share responses.
 */
export function codeSignature(code: string): string {
  const analysis = analyzeStudentCode(code);
  const words = code.split(/\s+/).filter(Boolean).length;
  return [
    `triggers:${[...analysis.triggers].sort().join(',')}`,
    `actions:${[...analysis.actions].sort().join(',')}`,
    `sensors:${[...analysis.sensors].sort().join(',')}`,
    `pins:${[...analysis.pins].sort().join(',')}`,
    `length:${words}`,
  ].join('|');
}

export class ResponseCache {
  private readonly stores: Stores = {
    suggestion: new Map(),
    encouragement: new Map(),
    idea: new Map(),
  };

  // maxEntries applies to each kind separately
  constructor(private readonly maxEntries: number) {}

  get<K extends CacheKind>(kind: K, code: string): CacheValues[K] | undefined {
    const signature = codeSignature(code);
    const value = this.stores[kind].get(signature);
    if (value === undefined) {
      console.log(`🔍 Cache miss for ${kind}: ${signature}`);
    } else {
      console.log(`🎯 Cache hit for ${kind}: ${signature}`);
    }
    return value;
  }

  set<K extends CacheKind>(kind: K, code: string, value: CacheValues[K]): void {
    const store: Map<string, CacheValues[K]> = this.stores[kind];
    const signature = codeSignature(code);

    // Re-inserting moves the entry to the back of the eviction order
    store.delete(signature);
    store.set(signature, value);

    while (store.size > this.maxEntries) {
      const oldest = store.keys().next();
      if (oldest.done) break;
      store.delete(oldest.value);
    }
  }

  stats(): CacheStats {
    const { suggestion, encouragement, idea } = this.stores;
    const patterns = new Set([...suggestion.keys(), ...encouragement.keys(), ...idea.keys()]);
    return {
      totalEntries: suggestion.size + encouragement.size + idea.size,
      suggestionEntries: suggestion.size,
      encouragementEntries: encouragement.size,
      ideaEntries: idea.size,
      uniquePatterns: patterns.size,
    };
  }
}
