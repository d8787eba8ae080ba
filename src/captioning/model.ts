/**
 * Abstract caption model interface for pluggable model families
 */

import type {
  DecodedImage,
  DecodingParams,
  InferenceDevice,
  Logger,
  ModelSource,
} from '../types.js';

/**
 * Options handed to a family loader
 */
export interface ModelLoadOptions {
  device: InferenceDevice;
}

/**
 * Abstract base class for loaded caption models.
 *
 * Instances are created once by their family loader and then only read:
 * `generate` must not keep state between calls.
 */
export abstract class CaptionModel {
  protected source: ModelSource;
  protected logger: Logger;

  constructor(source: ModelSource, logger: Logger) {
    this.source = source;
    this.logger = logger;
  }

  /**
   * Family name of the loaded model
   */
  abstract get name(): string;

  /**
   * Generate one caption per image, in input order. Decoding must be
   * deterministic for identical images and parameters.
   */
  abstract generate(images: DecodedImage[], params: DecodingParams): Promise<string[]>;

  /**
   * Release runtime resources
   */
  async dispose(): Promise<void> {}
}

/**
 * Loads the weights of one model family
 */
export type CaptionModelLoader = (
  source: ModelSource,
  options: ModelLoadOptions,
  logger: Logger
) => Promise<CaptionModel>;

/**
 * Registry for caption model families
 */
export class CaptionModelRegistry {
  private static loaders = new Map<string, CaptionModelLoader>();

  /**
   * Register a family loader
   */
  static register(name: string, loader: CaptionModelLoader): void {
    this.loaders.set(name.toLowerCase(), loader);
  }

  /**
   * Get a family loader by name
   */
  static get(name: string): CaptionModelLoader | undefined {
    return this.loaders.get(name.toLowerCase());
  }

  static has(name: string): boolean {
    return this.loaders.has(name.toLowerCase());
  }

  /**
   * List registered family names
   */
  static list(): string[] {
    return Array.from(this.loaders.keys()).sort();
  }

  /**
   * Load a model of the given family
   */
  static async load(
    name: string,
    source: ModelSource,
    options: ModelLoadOptions,
    logger: Logger
  ): Promise<CaptionModel> {
    const loader = this.get(name);
    if (!loader) {
      throw new Error(`Unknown MODEL_FAMILY: ${name}. Available: ${this.list().join(', ')}`);
    }
    return loader(source, options, logger);
  }
}
