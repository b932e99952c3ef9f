/**
 * Image decoding for sprite assets
 */

import sharp from 'sharp';

/** Extensions whose images keep their alpha channel */
const ALPHA_EXTENSIONS = new Set(['.png', '.gif', '.webp']);

/**
 * Raw pixels of a decoded image
 */
export interface DecodedImage {
  width: number;
  height: number;
  /** 4 with alpha (RGBA), 3 without (RGB) */
  channels: number;
  hasAlpha: boolean;
  /** Row-major raw pixel bytes */
  data: Buffer;
}

/**
 * Decodes raw asset bytes into pixels
 */
export type ImageDecoder = (
  bytes: Buffer,
  extension: string
) => Promise<DecodedImage>;

/**
 * Whether images with this extension are decoded with alpha
 */
export function keepsAlpha(extension: string): boolean {
  return ALPHA_EXTENSIONS.has(extension.toLowerCase());
}

/**
 * Decode image bytes with sharp
 * Alpha-capable formats decode to RGBA, everything else to RGB
 */
export async function decodeImage(
  bytes: Buffer,
  extension: string
): Promise<DecodedImage> {
  const alpha = keepsAlpha(extension);
  const pipeline = alpha ? sharp(bytes).ensureAlpha() : sharp(bytes).removeAlpha();
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });

  return {
    width: info.width,
    height: info.height,
    channels: info.channels,
    hasAlpha: alpha,
    data,
  };
}
