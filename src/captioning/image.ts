/**
 * Image decoding for uploaded payloads
 */

import sharp from 'sharp';
import { InvalidImageError, errorMessage } from '../errors.js';
import type { DecodedImage } from '../types.js';

/**
 * Decode raw image bytes (PNG, JPEG, WebP, TIFF, GIF...) into pixels.
 *
 * EXIF orientation is applied. The channel count is sharp's raw output,
 * not the file's: greyscale with alpha comes back as 4-channel sRGB.
 * Models convert to RGB before inference.
 */
export async function decodeImage(bytes: Uint8Array): Promise<DecodedImage> {
  if (bytes.byteLength === 0) {
    throw new InvalidImageError('Image payload is empty');
  }

  try {
    const { data, info } = await sharp(bytes, { failOn: 'error' })
      .rotate()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
      width: info.width,
      height: info.height,
      channels: info.channels,
    };
  } catch (error) {
    throw new InvalidImageError(`Payload is not a decodable image: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
