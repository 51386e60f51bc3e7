import sharp from 'sharp';
import { PigeonError } from '@pigeonpost/utils';
import type { DecodedImage } from './types.js';

/**
 * Open image bytes, keeping PNG as-is and re-encoding anything else to PNG.
 * Throws IMAGE_INVALID when the bytes are not a readable image.
 */
export async function decodeImage(bytes: Buffer): Promise<DecodedImage> {
  try {
    const image = sharp(bytes);
    const metadata = await image.metadata();
    if (!metadata.width || !metadata.height || !metadata.format) {
      throw new Error('missing dimensions');
    }

    const data = metadata.format === 'png' ? bytes : await image.png().toBuffer();

    return {
      data,
      width: metadata.width,
      height: metadata.height,
      format: metadata.format,
    };
  } catch (error) {
    throw new PigeonError(
      'IMAGE_INVALID',
      `Could not read image (${bytes.length} bytes): ${error instanceof Error ? error.message : String(error)}`,
      { bytes: bytes.length },
      { cause: error }
    );
  }
}
