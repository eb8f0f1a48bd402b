import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BoundingBox, CanonicalBlock } from '../types';
import { loadCatalog } from './catalogService';
import { deduplicate, orderBlocks, outline, ProgramSynthesizer } from './programSynthesizer';

const catalog = loadCatalog();

function block(id: string, index: number, box?: BoundingBox, confidence?: number): CanonicalBlock {
  const definition = catalog.get(id);
  if (!definition) throw new Error(`Unknown test block: ${id}`);
  return { definition, label: { text: id, box, confidence }, index };
}

const at = (x: number, y: number): BoundingBox => ({ x, y, width: 100, height: 10 });

describe('deduplicate', () => {
  it('keeps the more confident of two nearby detections', () => {
    const kept = deduplicate([block('show icon', 0, at(0, 20), 0.6), block('show icon', 1, at(5, 22), 0.9)], 20);
    expect(kept.map((b) => b.index)).toEqual([1]);
  });

  it('keeps the earlier detection on equal confidence', () => {
    const kept = deduplicate([block('pause', 0, at(0, 20), 0.8), block('pause', 1, at(0, 25), 0.8)], 20);
    expect(kept.map((b) => b.index)).toEqual([0]);
  });

  it('keeps detections that are far apart or lack a position', () => {
    expect(deduplicate([block('pause', 0, at(0, 20)), block('pause', 1, at(0, 100))], 20)).toHaveLength(2);
    expect(deduplicate([block('pause', 0), block('pause', 1)], 20)).toHaveLength(2);
  });

  it('measures each group from its first detection', () => {
    const kept = deduplicate(
      [block('pause', 0, at(0, 0), 0.5), block('pause', 1, at(0, 18), 0.9), block('pause', 2, at(0, 36), 0.4)],
      20,
    );
    expect(kept.map((b) => b.index)).toEqual([1, 2]);
  });

  it('never merges different blocks', () => {
    expect(deduplicate([block('pause', 0, at(0, 20)), block('show icon', 1, at(0, 20))], 20)).toHaveLength(2);
  });
});

describe('orderBlocks', () => {
  it('sorts top to bottom, then left to right, then by detection order', () => {
    const { ordered, geometric } = orderBlocks([
      block('pause', 0, at(50, 10)),
      block('show icon', 1, at(0, 10)),
      block('clear screen', 2, at(0, 5)),
      block('plot', 3, at(0, 10)),
    ]);
    expect(geometric).toBe(true);
    expect(ordered.map((b) => b.index)).toEqual([2, 1, 3, 0]);
  });

  it('falls back to detection order when any position is missing or not finite', () => {
    const missing = orderBlocks([block('pause', 1, at(0, 0)), block('plot', 0)]);
    expect(missing.geometric).toBe(false);
    expect(missing.ordered.map((b) => b.index)).toEqual([0, 1]);

    const nan = orderBlocks([block('pause', 1, at(0, 0)), block('plot', 0, { x: NaN, y: 0, width: 1, height: 1 })]);
    expect(nan.geometric).toBe(false);
  });
});

describe('ProgramSynthesizer', () => {
  const synthesizer = new ProgramSynthesizer(catalog, { dedupDistance: 20, nestIndent: 15 });

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns an empty tree for no blocks', () => {
    expect(synthesizer.synthesize([])).toEqual({ roots: [] });
  });

  it('places leaves under the container above them in vertical order', () => {
    const tree = synthesizer.synthesize([
      block('on button a pressed', 0, at(0, 10)),
      block('show icon heart', 1, at(0, 20)),
      block('play tone', 2, at(0, 15)),
    ]);
    expect(outline(tree)).toEqual([
      {
        id: 'on button a pressed',
        children: [
          { id: 'play tone', children: [] },
          { id: 'show icon heart', children: [] },
        ],
      },
    ]);
  });

  it('wraps a program without containers in the default container', () => {
    const tree = synthesizer.synthesize([block('show number', 0, at(0, 5)), block('show string', 1, at(0, 1))]);
    expect(outline(tree)).toEqual([
      {
        id: 'on start',
        implicit: true,
        children: [
          { id: 'show string', children: [] },
          { id: 'show number', children: [] },
        ],
      },
    ]);
    expect(tree.roots[0].block.index).toBe(-1);
  });

  it('starts a new top-level scope at each unindented container', () => {
    const tree = synthesizer.synthesize([
      block('on button a pressed', 0, at(0, 0)),
      block('show icon', 1, at(0, 10)),
      block('on button b pressed', 2, at(0, 50)),
      block('pause', 3, at(0, 60)),
    ]);
    expect(outline(tree)).toEqual([
      { id: 'on button a pressed', children: [{ id: 'show icon', children: [] }] },
      { id: 'on button b pressed', children: [{ id: 'pause', children: [] }] },
    ]);
  });

  it('nests indented containers and closes them for outdented blocks', () => {
    const tree = synthesizer.synthesize([
      block('forever', 0, at(0, 0)),
      block('if', 1, at(20, 10)),
      block('show icon', 2, at(40, 20)),
      block('pause', 3, at(0, 30)),
    ]);
    expect(outline(tree)).toEqual([
      {
        id: 'forever',
        children: [
          { id: 'if', children: [{ id: 'show icon', children: [] }] },
          { id: 'pause', children: [] },
        ],
      },
    ]);
  });

  it('puts leaves above the first container into a leading default container', () => {
    const tree = synthesizer.synthesize([
      block('radio set group', 0, at(0, 0)),
      block('on shake', 1, at(0, 10)),
      block('pause', 2, at(0, 20)),
    ]);
    expect(outline(tree)).toEqual([
      { id: 'on start', implicit: true, children: [{ id: 'radio set group', children: [] }] },
      { id: 'on shake', children: [{ id: 'pause', children: [] }] },
    ]);
  });

  it('collapses duplicate detections before building the tree', () => {
    const tree = synthesizer.synthesize([
      block('on button a pressed', 0, at(0, 0)),
      block('show icon', 1, at(0, 20), 0.6),
      block('show icon', 2, at(5, 22), 0.9),
    ]);
    expect(tree.roots[0].children.map((child) => child.block.index)).toEqual([2]);
  });

  it('keeps repeated blocks in a column when only neighbours are close', () => {
    const tree = synthesizer.synthesize([
      block('pause', 0, at(0, 0), 0.5),
      block('pause', 1, at(0, 18), 0.9),
      block('pause', 2, at(0, 36), 0.4),
    ]);
    expect(outline(tree)).toEqual([
      {
        id: 'on start',
        implicit: true,
        children: [
          { id: 'pause', children: [] },
          { id: 'pause', children: [] },
        ],
      },
    ]);
  });

  it('uses detection order when positions are missing', () => {
    const tree = synthesizer.synthesize([block('on button a pressed', 0), block('show icon', 1), block('pause', 2)]);
    expect(outline(tree)).toEqual([
      {
        id: 'on button a pressed',
        children: [
          { id: 'show icon', children: [] },
          { id: 'pause', children: [] },
        ],
      },
    ]);
    expect(console.warn).toHaveBeenCalledWith('⚠️ Incomplete block positions; falling back to detection order');
  });

  it('is deterministic', () => {
    const input = [
      block('on button a pressed', 0, at(0, 10)),
      block('show icon heart', 1, at(0, 20)),
      block('play tone', 2, at(0, 15)),
    ];
    expect(synthesizer.synthesize(input)).toEqual(synthesizer.synthesize(input));
  });
});
