// Yliluoma's ordered dithering (algorithm 1): for every input level, search
// once for the palette pair and mixing ratio whose ordered mix best matches
// it, then let the threshold matrix decide which colour of the pair each
// pixel takes.

import { ConfigurationError } from './errors.ts';
import { createBinaryImage, validateImage } from './image.ts';
import type { BinaryImage, GrayscaleImage, ThresholdMatrix } from './types.ts';

export const BLACK_WHITE_PALETTE: readonly number[] = [0, 255];

// Weight of the pair-distance penalty (discourages mixing far-apart colours).
// Only applies to palettes of three or more entries: with two there is no
// closer pair, and the penalty would flatten light and dark tones to solid.
const PAIR_PENALTY = 0.1;

export interface MixingPlan {
  readonly first: number;  // palette value used where the matrix rank is >= ratio
  readonly second: number; // palette value used where the matrix rank is < ratio
  readonly ratio: number;  // fraction of the tile that takes `second`, 0..1
}

function mixingPenalty(
  target: number,
  mixed: number,
  first: number,
  second: number,
  ratio: number,
  pairWeight: number,
): number {
  const mixError = (target - mixed) * (target - mixed);
  const pairError = (first - second) * (first - second);
  return mixError + pairError * pairWeight * (Math.abs(ratio - 0.5) + 0.5);
}

/**
 * Find the best mixing plan for a single intensity.
 * `steps` is the number of distinct ratios the matrix can express.
 */
export function deviseMixingPlan(level: number, palette: readonly number[], steps: number): MixingPlan {
  let best: MixingPlan = { first: palette[0], second: palette[0], ratio: 0 };
  let leastPenalty = Infinity;
  const pairWeight = palette.length > 2 ? PAIR_PENALTY : 0;

  for (let i = 0; i < palette.length; i++) {
    for (let j = i; j < palette.length; j++) {
      const first = palette[i];
      const second = palette[j];
      let step = 0;
      if (first !== second) {
        step = Math.round(((level - first) * steps) / (second - first));
        step = Math.max(0, Math.min(steps - 1, step));
      }
      const ratio = step / steps;
      const mixed = first + ratio * (second - first);
      const penalty = mixingPenalty(level, mixed, first, second, ratio, pairWeight);
      if (penalty < leastPenalty) {
        leastPenalty = penalty;
        best = { first, second, ratio };
      }
    }
  }
  return best;
}

/**
 * Precompute the plan for all 256 input levels.
 */
export function buildYliluomaPlan(matrix: ThresholdMatrix, palette: readonly number[] = BLACK_WHITE_PALETTE): MixingPlan[] {
  if (palette.length === 0) {
    throw new ConfigurationError('palette must not be empty', 'palette');
  }
  const sorted = [...palette].sort((a, b) => a - b);
  const steps = matrix.size * matrix.size;
  const plans: MixingPlan[] = [];
  for (let level = 0; level < 256; level++) {
    plans.push(deviseMixingPlan(level, sorted, steps));
  }
  return plans;
}

/**
 * Dither with a precomputed plan table (one entry per input level).
 * A pixel is dark when the palette entry its plan resolves to is below
 * mid-gray.
 */
export function applyMixingPlans(
  image: GrayscaleImage,
  matrix: ThresholdMatrix,
  plans: readonly MixingPlan[]
): BinaryImage {
  validateImage(image);
  const { width, height } = image;
  const out = createBinaryImage(width, height);
  const { size, data, mask } = matrix;

  for (let y = 0; y < height; y++) {
    const rowOffset = (y & mask) * size;
    const pixelRow = y * width;
    for (let x = 0; x < width; x++) {
      const plan = plans[image.data[pixelRow + x]];
      const rank = data[rowOffset + (x & mask)] / 256;
      const resolved = rank < plan.ratio ? plan.second : plan.first;
      if (resolved < 128) out.data[pixelRow + x] = 1;
    }
  }
  return out;
}

/**
 * Ordered palette dithering in one call: build the plan, then apply it.
 */
export function applyYliluomaDither(
  image: GrayscaleImage,
  matrix: ThresholdMatrix,
  palette: readonly number[] = BLACK_WHITE_PALETTE
): BinaryImage {
  validateImage(image);
  return applyMixingPlans(image, matrix, buildYliluomaPlan(matrix, palette));
}
