/**
 * Vision encoder-decoder captioning on transformers.js (ONNX Runtime)
 */

import path from 'path';
import { env, pipeline, RawImage, type ImageToTextPipeline } from '@huggingface/transformers';
import type { DecodedImage, DecodingParams, Logger, ModelSource } from '../../types.js';
import { CaptionModel, type ModelLoadOptions } from '../model.js';

interface GeneratedText {
  generated_text: string;
}

function firstText(entry: GeneratedText | GeneratedText[] | undefined): string {
  const first = Array.isArray(entry) ? entry[0] : entry;
  return first?.generated_text ?? '';
}

/** Registry name of the transformers.js family */
export const TRANSFORMERS_FAMILY = 'blip';

/**
 * BLIP / ViT-GPT2 style captioner: image processor, vision encoder and
 * text decoder loaded from one pretrained folder.
 */
export class TransformersCaptionModel extends CaptionModel {
  private captioner: ImageToTextPipeline;

  private constructor(captioner: ImageToTextPipeline, source: ModelSource, logger: Logger) {
    super(source, logger);
    this.captioner = captioner;
  }

  get name(): string {
    return TRANSFORMERS_FAMILY;
  }

  /**
   * Load the pipeline. Local folders are read strictly offline; hosted
   * identifiers are fetched from the Hugging Face hub.
   */
  static async load(
    source: ModelSource,
    options: ModelLoadOptions,
    logger: Logger
  ): Promise<TransformersCaptionModel> {
    let modelId: string;

    if (source.kind === 'local') {
      // transformers.js resolves local ids relative to env.localModelPath
      env.allowLocalModels = true;
      env.allowRemoteModels = false;
      env.localModelPath = path.dirname(source.directory) + path.sep;
      modelId = path.basename(source.directory);
    } else {
      env.allowRemoteModels = true;
      modelId = source.id;
    }

    logger.debug(`transformers.js loading ${modelId}`, {
      localModelPath: source.kind === 'local' ? env.localModelPath : undefined,
      device: options.device,
    });

    const captioner = await pipeline('image-to-text', modelId, {
      device: options.device,
      local_files_only: source.kind === 'local',
    });

    return new TransformersCaptionModel(captioner, source, logger);
  }

  async generate(images: DecodedImage[], params: DecodingParams): Promise<string[]> {
    const inputs = images.map(image =>
      new RawImage(image.data, image.width, image.height, image.channels).rgb()
    );

    const output = await this.captioner(inputs, {
      num_beams: params.beamSize,
      max_new_tokens: params.maxNewTokens,
      do_sample: false,
    });

    // a batched call yields one list of candidates per image
    return images.map((_, index) => firstText(output[index]));
  }

  async dispose(): Promise<void> {
    await this.captioner.dispose();
  }
}
