/**
 * Captioner: the single loaded model shared by every request
 */

import {
  CaptionServiceError,
  InvalidImageError,
  ModelLoadError,
  errorMessage,
} from '../errors.js';
import type {
  BatchItemResult,
  DecodedImage,
  DecodingParams,
  InferenceDevice,
  Logger,
  ModelSource,
} from '../types.js';
import { decodeImage } from './image.js';
import { CaptionModel, CaptionModelRegistry } from './model.js';

// Import families to register them
import './families/index.js';

/**
 * Captioner load options
 */
export interface CaptionerOptions {
  /** Model family name (blip, vit-gpt2, ...) */
  family: string;
  /** Resolved weights location */
  source: ModelSource;
  decoding: DecodingParams;
  device: InferenceDevice;
}

/**
 * Wraps a loaded caption model and its decoding parameters.
 *
 * Built once at startup through `Captioner.load` and never mutated
 * afterwards, so concurrent requests can share it without locking.
 */
export class Captioner {
  private readonly model: CaptionModel;
  private readonly logger: Logger;
  readonly decoding: DecodingParams;
  readonly source: ModelSource;

  private constructor(model: CaptionModel, options: CaptionerOptions, logger: Logger) {
    this.model = model;
    this.decoding = Object.freeze({ ...options.decoding });
    this.source = options.source;
    this.logger = logger;
  }

  /**
   * Load weights and preprocessing once. Any failure is a ModelLoadError.
   */
  static async load(options: CaptionerOptions, logger: Logger): Promise<Captioner> {
    const where = options.source.kind === 'local'
      ? options.source.directory
      : `hosted model ${options.source.id}`;

    logger.info(`Loading ${options.family} captioner from ${where}`, {
      device: options.device,
      beamSize: options.decoding.beamSize,
      maxNewTokens: options.decoding.maxNewTokens,
    });

    let model: CaptionModel;
    try {
      model = await CaptionModelRegistry.load(
        options.family,
        options.source,
        { device: options.device },
        logger
      );
    } catch (error) {
      throw new ModelLoadError(`Failed to load ${options.family} model from ${where}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    logger.info(`Captioner ready (${model.name})`);
    return new Captioner(model, options, logger);
  }

  /**
   * Get the loaded model family name
   */
  getModelName(): string {
    return this.model.name;
  }

  /**
   * List available families
   */
  static listFamilies(): string[] {
    return CaptionModelRegistry.list();
  }

  /**
   * Caption one image. Throws InvalidImageError for undecodable bytes.
   */
  async caption(image: Uint8Array): Promise<string> {
    const decoded = await decodeImage(image);
    const [caption] = await this.run([decoded]);
    if (caption === undefined) {
      throw new CaptionServiceError('inference_error', 'Model returned no caption');
    }
    return caption;
  }

  /**
   * Caption several images as one unit.
   *
   * Each input gets exactly one entry at its own index: a caption, or a
   * failure when that input is not a decodable image. Decodable inputs
   * still get captions when others fail. An error from the model itself
   * rejects the whole call.
   */
  async captionBatch(images: Uint8Array[]): Promise<BatchItemResult[]> {
    if (images.length === 0) {
      return [];
    }

    const decoded = await Promise.allSettled(images.map(image => decodeImage(image)));
    const results = new Array<BatchItemResult>(images.length);
    const pending: { index: number; image: DecodedImage }[] = [];

    decoded.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        pending.push({ index, image: outcome.value });
        return;
      }
      const reason: unknown = outcome.reason;
      const error = reason instanceof InvalidImageError
        ? reason
        : new InvalidImageError(errorMessage(reason), { cause: reason });
      results[index] = { ok: false, index, error: { code: error.code, message: error.message } };
    });

    if (pending.length > 0) {
      const captions = await this.run(pending.map(item => item.image));
      pending.forEach((item, position) => {
        results[item.index] = { ok: true, index: item.index, caption: captions[position] ?? '' };
      });
    }

    const failed = images.length - pending.length;
    if (failed > 0) {
      this.logger.warn(`Batch had ${failed} undecodable image(s)`, { size: images.length });
    }

    return results;
  }

  /**
   * Release the model runtime
   */
  async dispose(): Promise<void> {
    await this.model.dispose();
  }

  private async run(images: DecodedImage[]): Promise<string[]> {
    const started = Date.now();
    const captions = await this.model.generate(images, this.decoding);

    if (captions.length !== images.length) {
      throw new CaptionServiceError(
        'inference_error',
        `Model returned ${captions.length} captions for ${images.length} images`
      );
    }

    this.logger.debug(`Generated ${captions.length} caption(s)`, {
      model: this.model.name,
      durationMs: Date.now() - started,
    });
    return captions.map(caption => caption.trim());
  }
}
