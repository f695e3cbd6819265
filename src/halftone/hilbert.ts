// Hilbert curve traversal over a rectangular pixel grid
//
// The rectangle is embedded in the smallest enclosing power-of-two square;
// points of the square curve that fall outside the rectangle are skipped,
// so consecutive emitted points are adjacent except where the curve leaves
// and re-enters the rectangle.

import { ConfigurationError, ERROR_MESSAGES } from './errors.ts';

export interface HilbertPoint {
  x: number;
  y: number;
}

/**
 * Smallest power of two >= max(width, height).
 */
export function hilbertOrder(width: number, height: number): number {
  const maxDim = Math.max(width, height);
  let order = 1;
  while (order < maxDim) order <<= 1;
  return order;
}

/**
 * Map curve index `d` to a point inside an `order` x `order` square.
 * `order` must be a power of two. Writes into `out` to avoid allocation.
 */
export function hilbertD2xy(order: number, d: number, out: HilbertPoint = { x: 0, y: 0 }): HilbertPoint {
  let t = d;
  let x = 0;
  let y = 0;
  for (let s = 1; s < order; s <<= 1) {
    // Plain arithmetic: indices pass 2^32 once the side exceeds 65536
    const rx = Math.floor(t / 2) % 2;
    const ry = (t % 2) ^ rx;
    // Rotate/reflect the quadrant
    if (ry === 0) {
      if (rx === 1) {
        x = s - 1 - x;
        y = s - 1 - y;
      }
      const tmp = x;
      x = y;
      y = tmp;
    }
    x += s * rx;
    y += s * ry;
    t = Math.floor(t / 4);
  }
  out.x = x;
  out.y = y;
  return out;
}

/**
 * Lazily yield every (x, y) with 0 <= x < width, 0 <= y < height exactly
 * once, in Hilbert order. Re-invoke to restart; the sequence is a pure
 * function of the dimensions.
 *
 * Work is O(order^2), up to 4x the pixel count for non-square or
 * non-power-of-two rectangles.
 */
export function* hilbertPath(width: number, height: number): Generator<HilbertPoint, void, undefined> {
  if (!Number.isInteger(width) || width <= 0) {
    throw new ConfigurationError(ERROR_MESSAGES.invalidDimension('width', width), 'width');
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new ConfigurationError(ERROR_MESSAGES.invalidDimension('height', height), 'height');
  }

  const order = hilbertOrder(width, height);
  const total = order * order;
  const p: HilbertPoint = { x: 0, y: 0 };
  for (let d = 0; d < total; d++) {
    hilbertD2xy(order, d, p);
    if (p.x < width && p.y < height) {
      yield { x: p.x, y: p.y };
    }
  }
}
