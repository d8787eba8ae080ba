/**
 * Shared test fixtures: model folders, images, a fake model family and
 * an in-memory remote store
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { CaptionModel, CaptionModelRegistry } from '../captioning/model.js';
import type { RemoteModelStore } from '../resolver/remote-store.js';
import type { DecodedImage, DecodingParams, ModelSource, ModelSourceConfig } from '../types.js';

export const ECHO_FAMILY = 'echo';

/**
 * Deterministic stand-in model: describes the image it was given.
 * Output is padded so callers' trimming is exercised.
 */
export class EchoCaptionModel extends CaptionModel {
  calls: number[] = [];

  get name(): string {
    return ECHO_FAMILY;
  }

  get loadedFrom(): ModelSource {
    return this.source;
  }

  async generate(images: DecodedImage[], params: DecodingParams): Promise<string[]> {
    this.calls.push(images.length);
    return images.map(
      image => `  ${image.width}x${image.height} image, ${image.channels} channels, beams ${params.beamSize}  `
    );
  }
}

export function registerEchoFamily(): void {
  CaptionModelRegistry.register(ECHO_FAMILY, async (source, _options, logger) =>
    new EchoCaptionModel(source, logger)
  );
}

export async function makeTempDir(prefix: string = 'caption-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const VALID_MANIFEST = {
  model_type: 'blip',
  architectures: ['BlipForConditionalGeneration'],
};

/**
 * Write a model folder. `manifest` may be an object (serialized), raw
 * text, or null for no config.json at all.
 */
export async function writeModelDir(
  dir: string,
  manifest: Record<string, unknown> | string | null = VALID_MANIFEST
): Promise<string> {
  await fs.mkdir(path.join(dir, 'onnx'), { recursive: true });
  if (manifest !== null) {
    const text = typeof manifest === 'string' ? manifest : JSON.stringify(manifest);
    await fs.writeFile(path.join(dir, 'config.json'), text);
  }
  await fs.writeFile(path.join(dir, 'onnx', 'encoder_model.onnx'), 'weights');
  await fs.writeFile(path.join(dir, 'onnx', 'decoder_model_merged.onnx'), 'weights');
  await fs.writeFile(path.join(dir, 'tokenizer.json'), '{}');
  await fs.writeFile(path.join(dir, 'tokenizer_config.json'), '{}');
  await fs.writeFile(path.join(dir, 'preprocessor_config.json'), '{}');
  return dir;
}

/**
 * Encode a solid-colour PNG
 */
export async function makePng(
  width: number,
  height: number,
  channels: 3 | 4 = 3
): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels,
      background: { r: 40, g: 80, b: 120, alpha: 0.5 },
    },
  })
    .png()
    .toBuffer();
}

export async function makeJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 200, b: 200 } },
  })
    .jpeg()
    .toBuffer();
}

export const NOT_AN_IMAGE = Buffer.from('definitely not an image');

/**
 * Remote store that copies fixed files, or fails
 */
export class FakeRemoteStore implements RemoteModelStore {
  readonly scheme = 'gs';
  downloads: { uri: string; localDir: string }[] = [];
  private files: Record<string, string>;
  private failure: Error | null;

  constructor(files: Record<string, string>, failure: Error | null = null) {
    this.files = files;
    this.failure = failure;
  }

  async download(uri: string, localDir: string): Promise<string[]> {
    this.downloads.push({ uri, localDir });
    if (this.failure) {
      throw this.failure;
    }

    const written: string[] = [];
    for (const [name, content] of Object.entries(this.files)) {
      const target = path.join(localDir, name);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content);
      written.push(target);
    }
    return written.sort();
  }
}

export function modelConfig(overrides: Partial<ModelSourceConfig> = {}): ModelSourceConfig {
  return {
    modelFamily: ECHO_FAMILY,
    localDir: 'models',
    remoteUri: undefined,
    fallbackId: 'Xenova/vit-gpt2-image-captioning',
    allowFallback: false,
    decoding: { beamSize: 3, maxNewTokens: 80 },
    device: 'cpu',
    downloadConcurrency: 2,
    ...overrides,
  };
}
