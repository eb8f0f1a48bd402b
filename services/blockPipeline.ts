import type { DetectedLabel, PipelineOptions, PipelineResult } from '../types';
import type { BlockCatalog } from './catalogService';
import { emitProgram } from './codeEmitter';
import { LabelNormalizer } from './labelNormalizer';
import { ProgramSynthesizer } from './programSynthesizer';

/**
 * Detections -> canonical blocks -> program tree -> MakeCode source.
 * Synchronous and free of I/O; one instance serves concurrent requests since
 * it holds nothing but the read-only catalog and fixed options.
 */
export class BlockPipeline {
  readonly normalizer: LabelNormalizer;
  private readonly synthesizer: ProgramSynthesizer;

  constructor(
    readonly catalog: BlockCatalog,
    options: PipelineOptions,
  ) {
    this.normalizer = new LabelNormalizer(catalog, { matchThreshold: options.matchThreshold });
    this.synthesizer = new ProgramSynthesizer(catalog, {
      dedupDistance: options.dedupDistance,
      nestIndent: options.nestIndent,
    });
  }

  run(labels: readonly DetectedLabel[]): PipelineResult {
    const { blocks, dropped } = this.normalizer.normalize(labels);
    const tree = this.synthesizer.synthesize(blocks);
    return { code: emitProgram(tree), tree, blocks, dropped };
  }
}

export function runPipeline(
  labels: readonly DetectedLabel[],
  catalog: BlockCatalog,
  options: PipelineOptions,
): PipelineResult {
  return new BlockPipeline(catalog, options).run(labels);
}
