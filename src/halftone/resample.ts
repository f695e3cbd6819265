// Area-weighted resampling (box filter with fractional pixel coverage)

import { createGrayscaleImage, validateImage } from './image.ts';
import type { GrayscaleImage } from './types.ts';

type Contribution = readonly [index: number, weight: number];

/**
 * For each destination index along one axis, the source indices it covers
 * and how much of each.
 */
function axisContributions(srcSize: number, dstSize: number): Contribution[][] {
  const scale = srcSize / dstSize;
  const result: Contribution[][] = [];
  for (let d = 0; d < dstSize; d++) {
    const start = d * scale;
    const end = (d + 1) * scale;
    const taps: Contribution[] = [];
    for (let s = Math.floor(start); s < Math.ceil(end) && s < srcSize; s++) {
      const weight = Math.min(end, s + 1) - Math.max(start, s);
      if (weight > 0) taps.push([s, weight]);
    }
    result.push(taps);
  }
  return result;
}

/**
 * Resample to `width` x `height`, averaging every source pixel a destination
 * pixel covers. Works for both reduction and enlargement.
 */
export function resampleArea(image: GrayscaleImage, width: number, height: number): GrayscaleImage {
  validateImage(image);
  const out = createGrayscaleImage(width, height, 0);
  if (width === image.width && height === image.height) {
    out.data.set(image.data);
    return out;
  }

  const cols = axisContributions(image.width, width);
  const rows = axisContributions(image.height, height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      let total = 0;
      for (const [sy, wy] of rows[y]) {
        const rowOffset = sy * image.width;
        for (const [sx, wx] of cols[x]) {
          const w = wx * wy;
          sum += image.data[rowOffset + sx] * w;
          total += w;
        }
      }
      out.data[y * width + x] = Math.round(sum / total);
    }
  }
  return out;
}
