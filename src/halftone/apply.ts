// Halftone dispatch: single entry point for every dither strategy

import { getLogger } from '../logging.ts';
import { ERROR_MESSAGES, invariant } from './errors.ts';
import { validateImage } from './image.ts';
import { createDitherStrategy, type DitherStrategy } from './strategy.ts';
import type { BinaryImage, DitherOptions, GrayscaleImage } from './types.ts';

const logger = getLogger('Halftone');

function isStrategy(value: DitherOptions | DitherStrategy): value is DitherStrategy {
  return 'dither' in value;
}

/**
 * Convert a grayscale image to a 1-bit raster.
 *
 * Accepts either options (a strategy is built and validated first) or a
 * strategy created earlier with createDitherStrategy(). The input buffer
 * is never modified.
 */
export function ditherImage(image: GrayscaleImage, options: DitherOptions | DitherStrategy): BinaryImage {
  validateImage(image);
  const strategy = isStrategy(options) ? options : createDitherStrategy(options);

  const start = performance.now();
  const result = strategy.dither(image);
  const elapsed = performance.now() - start;

  invariant(
    result.width === image.width && result.height === image.height && result.data.length === image.data.length,
    () => ERROR_MESSAGES.dimensionMismatch(
      strategy.name,
      `${image.width}x${image.height}`,
      `${result.width}x${result.height}`,
    ),
  );

  logger.debug('Dither pass complete', {
    strategy: strategy.name,
    width: image.width,
    height: image.height,
    ms: Math.round(elapsed * 100) / 100,
  });
  return result;
}
