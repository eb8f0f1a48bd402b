import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BoundingBox, PipelineOptions } from '../types';
import { BlockPipeline, runPipeline } from './blockPipeline';
import { loadCatalog } from './catalogService';
import { EMPTY_PROGRAM_PLACEHOLDER } from './codeEmitter';

const catalog = loadCatalog();
const options: PipelineOptions = { matchThreshold: 0.75, dedupDistance: 20, nestIndent: 15 };
const at = (x: number, y: number): BoundingBox => ({ x, y, width: 100, height: 10 });

const BUTTON_A_PROGRAM = [
  'input.onButtonPressed(Button.A, function () {',
  '    music.playTone(262, music.beat(BeatFraction.Whole))',
  '    basic.showIcon(IconNames.Heart)',
  '})',
].join('\n');

describe('runPipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('turns a photo of an event handler into code', () => {
    const result = runPipeline(
      [
        { text: 'on button A pressed', box: at(0, 10) },
        { text: 'show icon heart', box: at(0, 20) },
        { text: 'play tone', box: at(0, 15) },
      ],
      catalog,
      options,
    );
    expect(result.code).toBe(BUTTON_A_PROGRAM);
    expect(result.blocks.map((block) => block.definition.id)).toEqual([
      'on button a pressed',
      'show icon heart',
      'play tone',
    ]);
    expect(result.dropped).toEqual([]);
  });

  it('ignores labels that match no block', () => {
    const result = runPipeline(
      [
        { text: 'on button A pressed', box: at(0, 10) },
        { text: 'coffee mug', box: at(0, 12) },
        { text: 'show icon heart', box: at(0, 20) },
        { text: 'play tone', box: at(0, 15) },
      ],
      catalog,
      options,
    );
    expect(result.code).toBe(BUTTON_A_PROGRAM);
    expect(result.dropped.map((label) => label.text)).toEqual(['coffee mug']);
  });

  it('returns the placeholder for an empty photo', () => {
    const result = runPipeline([], catalog, options);
    expect(result).toEqual({ code: EMPTY_PROGRAM_PLACEHOLDER, tree: { roots: [] }, blocks: [], dropped: [] });
  });

  it('returns the placeholder when every label is noise', () => {
    expect(runPipeline([{ text: 'zzzz' }, { text: '' }], catalog, options).code).toBe(EMPTY_PROGRAM_PLACEHOLDER);
  });

  it('orders loose blocks top to bottom at the top level', () => {
    const result = runPipeline(
      [
        { text: 'show number', box: at(0, 5) },
        { text: 'show string', box: at(0, 1) },
      ],
      catalog,
      options,
    );
    expect(result.code).toBe('basic.showString("Hello!")\nbasic.showNumber(0)');
  });

  it('reads common OCR confusions', () => {
    const result = runPipeline(
      [
        { text: 'on button aa', box: at(0, 0) },
        { text: 'turn on \u04200', box: at(20, 10) },
      ],
      catalog,
      options,
    );
    expect(result.code).toBe(
      ['input.onButtonPressed(Button.AB, function () {', '    pins.digitalWritePin(DigitalPin.P0, 1)', '})'].join('\n'),
    );
  });

  it('produces the same code for the same detections', () => {
    const labels = [
      { text: 'forever', box: at(0, 0) },
      { text: 'show nmber', box: at(20, 10) },
    ];
    const first = runPipeline(labels, catalog, options);
    expect(first.code).toBe('basic.forever(function () {\n    basic.showNumber(0)\n})');
    expect(runPipeline(labels, catalog, options).code).toBe(first.code);
  });
});

describe('BlockPipeline', () => {
  it('shares its normalizer and catalog', () => {
    const pipeline = new BlockPipeline(catalog, options);
    expect(pipeline.catalog).toBe(catalog);
    expect(pipeline.normalizer.resolve('wait')?.id).toBe('pause');
  });
});
