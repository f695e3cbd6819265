// Riemersma dithering: error diffusion along a Hilbert curve
//
// Instead of pushing error to 2-D neighbours, each pixel receives a
// weighted sum of the last few quantization errors made along the curve.
// The curve keeps neighbours in the sequence close in the image, which
// avoids the directional streaks of raster-order diffusion.

import { ConfigurationError, ERROR_MESSAGES, invariant } from './errors.ts';
import { hilbertPath } from './hilbert.ts';
import { createBinaryImage, validateImage } from './image.ts';
import {
  DEFAULT_RIEMERSMA,
  QUANTIZE_MIDPOINT,
  type BinaryImage,
  type GrayscaleImage,
  type RiemersmaOptions,
} from './types.ts';

/**
 * Resolve and validate Riemersma options against the defaults.
 */
export function resolveRiemersmaOptions(options: Partial<RiemersmaOptions> = {}): RiemersmaOptions {
  const historyDepth = options.historyDepth ?? DEFAULT_RIEMERSMA.historyDepth;
  const decayRatio = options.decayRatio ?? DEFAULT_RIEMERSMA.decayRatio;

  if (!Number.isInteger(historyDepth) || historyDepth < 2) {
    throw new ConfigurationError(ERROR_MESSAGES.historyDepth(historyDepth), 'historyDepth');
  }
  if (!Number.isFinite(decayRatio) || decayRatio <= 0 || decayRatio > 1) {
    throw new ConfigurationError(ERROR_MESSAGES.decayRatio(decayRatio), 'decayRatio');
  }
  return { historyDepth, decayRatio };
}

/**
 * weight[i] = ratio^(i / (depth - 1)), normalised to sum to 1.
 * Index 0 weighs the newest error. A depth of 1 gives the single weight 1.
 */
export function buildRiemersmaWeights(depth: number, ratio: number): Float64Array {
  const weights = new Float64Array(depth);
  if (depth === 1) {
    weights[0] = 1;
    return weights;
  }
  let sum = 0;
  for (let i = 0; i < depth; i++) {
    weights[i] = Math.pow(ratio, i / (depth - 1));
    sum += weights[i];
  }
  for (let i = 0; i < depth; i++) {
    weights[i] /= sum;
  }
  return weights;
}

/**
 * Fixed-capacity ring buffer of recent quantization errors, newest first,
 * paired with a read-only weight vector.
 */
export class ErrorHistory {
  private readonly _errors: Float64Array;
  private readonly _weights: Float64Array;
  private _head = 0;

  constructor(depth: number, ratio: number) {
    this._errors = new Float64Array(depth);
    this._weights = buildRiemersmaWeights(depth, ratio);
  }

  get depth(): number {
    return this._errors.length;
  }

  get weights(): ReadonlyArray<number> {
    return Array.from(this._weights);
  }

  /** Push the newest error, evicting the oldest. */
  push(error: number): void {
    const depth = this._errors.length;
    this._head = (this._head + depth - 1) % depth;
    this._errors[this._head] = error;
  }

  /** Error at age `i` (0 = newest). */
  get(i: number): number {
    return this._errors[(this._head + i) % this._errors.length];
  }

  weightedSum(): number {
    let sum = 0;
    for (let i = 0; i < this._errors.length; i++) {
      sum += this.get(i) * this._weights[i];
    }
    return sum;
  }
}

/**
 * Dither along the Hilbert curve with an exponentially decaying error
 * history. Deterministic: depends only on the image and the two options.
 */
export function applyRiemersmaDither(image: GrayscaleImage, options: Partial<RiemersmaOptions> = {}): BinaryImage {
  validateImage(image);
  const { historyDepth, decayRatio } = resolveRiemersmaOptions(options);
  const { width, height } = image;
  const out = createBinaryImage(width, height);
  const history = new ErrorHistory(historyDepth, decayRatio);

  let visited = 0;
  for (const { x, y } of hilbertPath(width, height)) {
    const idx = y * width + x;
    const expected = image.data[idx] + history.weightedSum();
    let err: number;
    if (expected < QUANTIZE_MIDPOINT) {
      out.data[idx] = 1;
      err = expected;
    } else {
      err = expected - 255;
    }
    history.push(err);
    visited++;
  }

  invariant(visited === width * height, () => `hilbert path visited ${visited} of ${width * height} pixels`);
  return out;
}
