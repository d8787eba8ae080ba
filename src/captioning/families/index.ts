/**
 * Built-in model families
 *
 * Import this file to register them. The transformers.js runtime is only
 * imported when a family is actually loaded.
 */

import { CaptionModelRegistry, type CaptionModelLoader } from '../model.js';

/**
 * BLIP-style vision encoder-decoder on transformers.js. Every pretrained
 * image-to-text folder loads through the same pipeline, so the other
 * architecture names are aliases.
 */
const loadTransformers: CaptionModelLoader = async (source, options, logger) => {
  const { TransformersCaptionModel } = await import('./transformers.js');
  return TransformersCaptionModel.load(source, options, logger);
};

CaptionModelRegistry.register('blip', loadTransformers);
CaptionModelRegistry.register('vit-gpt2', loadTransformers); // Alias
CaptionModelRegistry.register('vision-encoder-decoder', loadTransformers); // Alias
