import { beforeAll, describe, expect, test } from 'vitest';
import { ModelLoadError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import {
  ECHO_FAMILY,
  EchoCaptionModel,
  NOT_AN_IMAGE,
  makePng,
  registerEchoFamily,
} from '../test-support/fixtures.js';
import type { ModelSource } from '../types.js';
import { Captioner, type CaptionerOptions } from './captioner.js';
import { CaptionModelRegistry } from './model.js';

const logger = createSilentLogger();
const source: ModelSource = { kind: 'hosted', id: 'org/test-captioner' };

function options(overrides: Partial<CaptionerOptions> = {}): CaptionerOptions {
  return {
    family: ECHO_FAMILY,
    source,
    decoding: { beamSize: 3, maxNewTokens: 80 },
    device: 'cpu',
    ...overrides,
  };
}

describe('Captioner', () => {
  beforeAll(() => {
    registerEchoFamily();
  });

  test('lists the built-in families', () => {
    expect(Captioner.listFamilies()).toEqual(['blip', 'echo', 'vision-encoder-decoder', 'vit-gpt2']);
  });

  test('registers architecture names as aliases of one family', () => {
    const blip = CaptionModelRegistry.get('blip');

    expect(blip).toBeDefined();
    expect(CaptionModelRegistry.get('vit-gpt2')).toBe(blip);
    expect(CaptionModelRegistry.get('vision-encoder-decoder')).toBe(blip);
  });

  test('captions a single image with trimmed output', async () => {
    const captioner = await Captioner.load(options(), logger);

    expect(captioner.getModelName()).toBe('echo');
    expect(await captioner.caption(await makePng(4, 3))).toBe('4x3 image, 3 channels, beams 3');
  });

  test('passes decoding parameters to the model', async () => {
    const captioner = await Captioner.load(
      options({ decoding: { beamSize: 5, maxNewTokens: 20 } }),
      logger
    );

    expect(captioner.decoding).toEqual({ beamSize: 5, maxNewTokens: 20 });
    expect(Object.isFrozen(captioner.decoding)).toBe(true);
    expect(await captioner.caption(await makePng(2, 2))).toBe('2x2 image, 3 channels, beams 5');
  });

  test('is deterministic for identical input', async () => {
    const captioner = await Captioner.load(options(), logger);
    const image = await makePng(6, 6);

    const first = await captioner.caption(image);
    const second = await captioner.caption(image);
    expect(second).toBe(first);
  });

  test('rejects undecodable input for a single caption', async () => {
    const captioner = await Captioner.load(options(), logger);
    await expect(captioner.caption(NOT_AN_IMAGE)).rejects.toThrow(/^Payload is not a decodable image/);
  });

  test('returns an empty list for an empty batch', async () => {
    const captioner = await Captioner.load(options(), logger);
    expect(await captioner.captionBatch([])).toEqual([]);
  });

  test('keeps batch results in input order', async () => {
    const captioner = await Captioner.load(options(), logger);
    const images = [await makePng(1, 1), await makePng(2, 2, 4), await makePng(3, 1)];

    expect(await captioner.captionBatch(images)).toEqual([
      { ok: true, index: 0, caption: '1x1 image, 3 channels, beams 3' },
      { ok: true, index: 1, caption: '2x2 image, 4 channels, beams 3' },
      { ok: true, index: 2, caption: '3x1 image, 3 channels, beams 3' },
    ]);
  });

  test('reports undecodable batch items individually', async () => {
    const loaded: EchoCaptionModel[] = [];
    CaptionModelRegistry.register('echo-tracked', async (modelSource, _options, modelLogger) => {
      const model = new EchoCaptionModel(modelSource, modelLogger);
      loaded.push(model);
      return model;
    });
    const captioner = await Captioner.load(options({ family: 'echo-tracked' }), logger);

    const results = await captioner.captionBatch([await makePng(2, 3), NOT_AN_IMAGE, await makePng(5, 4)]);

    expect(results).toHaveLength(3);
    expect(results[0]).toEqual({ ok: true, index: 0, caption: '2x3 image, 3 channels, beams 3' });
    expect(results[1]).toMatchObject({ ok: false, index: 1, error: { code: 'invalid_image' } });
    expect(results[2]).toEqual({ ok: true, index: 2, caption: '5x4 image, 3 channels, beams 3' });
    // decodable images go to the model in one call
    expect(loaded.map(model => model.calls)).toEqual([[2]]);
  });

  test('wraps loader failures in ModelLoadError', async () => {
    const failure = Captioner.load(options({ family: 'missing' }), logger);

    await expect(failure).rejects.toBeInstanceOf(ModelLoadError);
    await expect(failure).rejects.toThrow(
      'Failed to load missing model from hosted model org/test-captioner: Unknown MODEL_FAMILY: missing'
    );
  });
});
