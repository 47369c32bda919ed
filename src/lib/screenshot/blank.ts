/**
 * Blank capture detection: a page that rendered nothing comes out as a
 * mostly white image.
 */

import sharp from 'sharp';

export const DEFAULT_BLANK_THRESHOLD = 240;

/**
 * Mean of the R, G and B channels over all pixels. Alpha is ignored; a
 * greyscale image reports its one channel three times.
 */
export async function meanRgb(image: Buffer): Promise<[number, number, number]> {
  const { channels, isOpaque } = await sharp(image).stats();
  const colour = channels.length - (isOpaque ? 0 : 1) >= 3;

  if (colour) {
    return [channels[0].mean, channels[1].mean, channels[2].mean];
  }
  return [channels[0].mean, channels[0].mean, channels[0].mean];
}

/**
 * True when every RGB channel mean is above `threshold`. Rejects when the
 * bytes cannot be decoded.
 */
export async function isBlankImage(
  image: Buffer,
  threshold: number = DEFAULT_BLANK_THRESHOLD
): Promise<boolean> {
  const means = await meanRgb(image);
  return means.every((mean) => mean > threshold);
}
