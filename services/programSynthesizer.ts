import type { BoundingBox, CanonicalBlock, ProgramNode, ProgramTree } from '../types';
import type { BlockCatalog } from './catalogService';

export interface SynthesizerOptions {
  // Max distance between box centres for two same-id detections to be one block
  dedupDistance: number;
  // How far right of a container a block must start to sit inside it
  nestIndent: number;
}

export interface ProgramOutline {
  id: string;
  implicit?: boolean;
  children: ProgramOutline[];
}

function hasPosition(block: CanonicalBlock): block is CanonicalBlock & { label: { box: BoundingBox } } {
  const box = block.label.box;
  return (
    box !== undefined &&
    Number.isFinite(box.x) &&
    Number.isFinite(box.y) &&
    Number.isFinite(box.width) &&
    Number.isFinite(box.height)
  );
}

function confidenceOf(block: CanonicalBlock): number {
  const confidence = block.label.confidence;
  return confidence !== undefined && Number.isFinite(confidence) ? confidence : 0;
}

function centreDistance(a: BoundingBox, b: BoundingBox): number {
  const dx = a.x + a.width / 2 - (b.x + b.width / 2);
  const dy = a.y + a.height / 2 - (b.y + b.height / 2);
  return Math.hypot(dx, dy);
}

/**
 * Collapse repeated detections of one block. Same identifier and box centres
 * within `distance` count as one detection and the more confident one is kept;
 * blocks without a usable position are never collapsed.
 *
 * Each cluster is measured from its first detection, so a swap to a more
 * confident twin never moves the cluster along a run of nearby blocks.
 */
export function deduplicate(blocks: readonly CanonicalBlock[], distance: number): CanonicalBlock[] {
  const clusters: { anchor?: BoundingBox; block: CanonicalBlock }[] = [];
  for (const block of blocks) {
    const twin = hasPosition(block)
      ? clusters.find(
          (cluster) =>
            cluster.block.definition.id === block.definition.id &&
            cluster.anchor !== undefined &&
            centreDistance(cluster.anchor, block.label.box) <= distance,
        )
      : undefined;

    if (twin === undefined) {
      clusters.push({ anchor: hasPosition(block) ? block.label.box : undefined, block });
    } else if (confidenceOf(block) > confidenceOf(twin.block)) {
      twin.block = block;
    }
  }
  return clusters.map((cluster) => cluster.block);
}

/**
 * Top-to-bottom, then left-to-right, then detection order. When any block
 * lacks a finite position the whole set falls back to detection order.
 */
export function orderBlocks(blocks: readonly CanonicalBlock[]): { ordered: CanonicalBlock[]; geometric: boolean } {
  const byIndex = (a: CanonicalBlock, b: CanonicalBlock) => a.index - b.index;
  if (!blocks.every(hasPosition)) {
    return { ordered: [...blocks].sort(byIndex), geometric: false };
  }
  const ordered = [...blocks].sort((a, b) => {
    const boxA = a.label.box;
    const boxB = b.label.box;
    if (!boxA || !boxB) return byIndex(a, b);
    return boxA.y - boxB.y || boxA.x - boxB.x || byIndex(a, b);
  });
  return { ordered, geometric: true };
}

/**
 * PROGRAM SYNTHESIZER
 * Builds the nested program from canonical blocks. Nesting uses the
 * "nearest container above" heuristic: scanning top to bottom, a block belongs
 * to the last open container. A container stays open for blocks indented at
 * least `nestIndent` to its right; top-level scopes stay open until the next one.
 * There is no pixel-level containment: detectors do not report it.
 */
export class ProgramSynthesizer {
  constructor(
    private readonly catalog: BlockCatalog,
    private readonly options: SynthesizerOptions,
  ) {}

  synthesize(blocks: readonly CanonicalBlock[]): ProgramTree {
    if (blocks.length === 0) return { roots: [] };

    const unique = deduplicate(blocks, this.options.dedupDistance);
    const { ordered, geometric } = orderBlocks(unique);
    if (!geometric) {
      console.warn('⚠️ Incomplete block positions; falling back to detection order');
    }

    if (!ordered.some((block) => block.definition.role === 'container')) {
      return { roots: [this.implicitContainer(ordered.map(toNode))] };
    }

    const roots: ProgramNode[] = [];
    const preamble: ProgramNode[] = [];
    const open: ProgramNode[] = [];
    const indentedUnder = (block: CanonicalBlock, container: ProgramNode): boolean => {
      const box = block.label.box;
      const parentBox = container.block.label.box;
      return geometric && !!box && !!parentBox && box.x >= parentBox.x + this.options.nestIndent;
    };

    for (const block of ordered) {
      const node = toNode(block);
      if (block.definition.role === 'container') {
        while (open.length > 0 && !indentedUnder(block, open[open.length - 1])) open.pop();
        const parent = open.at(-1);
        if (parent) parent.children.push(node);
        else roots.push(node);
        open.push(node);
        continue;
      }

      // The outermost scope never closes for a leaf
      while (open.length > 1 && !indentedUnder(block, open[open.length - 1])) open.pop();
      const parent = open.at(-1);
      if (parent) parent.children.push(node);
      else preamble.push(node);
    }

    if (preamble.length > 0) roots.unshift(this.implicitContainer(preamble));
    return { roots };
  }

  private implicitContainer(children: ProgramNode[]): ProgramNode {
    const definition = this.catalog.defaultContainer;
    return {
      block: { definition, label: { text: definition.id }, index: -1 },
      children,
      implicit: true,
    };
  }
}

function toNode(block: CanonicalBlock): ProgramNode {
  return { block, children: [], implicit: false };
}

export function outline(tree: ProgramTree): ProgramOutline[] {
  const walk = (node: ProgramNode): ProgramOutline => ({
    id: node.block.definition.id,
    ...(node.implicit ? { implicit: true } : {}),
    children: node.children.map(walk),
  });
  return tree.roots.map(walk);
}
