// Generic error-diffusion dithering engine
// All error-diffusion algorithms share the same per-pixel loop:
// accumulate error -> clamp -> quantize -> write -> distribute.
// Only the distribution kernel differs between algorithms.

import { createBinaryImage, validateImage } from './image.ts';
import { QUANTIZE_MIDPOINT, type BinaryImage, type DiffusionKernel, type GrayscaleImage } from './types.ts';

/** Clamp a value to [0, 255]. */
export function clamp255(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : v;
}

/**
 * Apply error-diffusion dithering using the given kernel.
 *
 * Works on a private floating-point copy of the input; the caller's buffer
 * is never written. Pixels are visited in plain raster order (no
 * serpentine). Accumulated values may leave [0, 255] and are clamped only
 * when the pixel is quantized. Error aimed outside the image is dropped.
 */
export function applyErrorDiffusion(
  image: GrayscaleImage,
  kernel: DiffusionKernel,
  threshold: number = QUANTIZE_MIDPOINT,
): BinaryImage {
  validateImage(image);
  const { width, height } = image;
  const out = createBinaryImage(width, height);
  const work = Float64Array.from(image.data);
  const { offsets, divisor } = kernel;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = y * width + x;
      const value = clamp255(work[idx]);

      let err: number;
      if (value < threshold) {
        out.data[idx] = 1;
        err = value;
      } else {
        err = value - 255;
      }
      if (err === 0) continue;

      // Distribute error to neighbors
      for (let i = 0; i < offsets.length; i++) {
        const [dx, dy, weight] = offsets[i];
        const tx = x + dx;
        const ty = y + dy;
        if (tx < 0 || tx >= width || ty >= height) continue;
        work[ty * width + tx] += (err * weight) / divisor;
      }
    }
  }
  return out;
}
