/**
 * Captioning module exports
 */

export { Captioner, type CaptionerOptions } from './captioner.js';
export {
  CaptionModel,
  CaptionModelRegistry,
  type CaptionModelLoader,
  type ModelLoadOptions,
} from './model.js';
export { decodeImage } from './image.js';
