// Threshold-based (ordered) dithering: flat threshold, Bayer, clustered dot,
// and custom matrices loaded from PNG

import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { decodePng } from '../deps.ts';
import { ConfigurationError, ERROR_MESSAGES } from './errors.ts';
import { createBinaryImage, rgbToGray, validateImage } from './image.ts';
import type { BinaryImage, GrayscaleImage, ThresholdMatrix } from './types.ts';

const MAX_MATRIX_ORDER = 64;

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

function checkOrder(order: number): void {
  if (!isPowerOfTwo(order) || order < 2 || order > MAX_MATRIX_ORDER) {
    throw new ConfigurationError(ERROR_MESSAGES.matrixOrder(order), 'matrixOrder');
  }
}

// Spread ranks 0..n-1 evenly over the 0-255 threshold range
function rankToThreshold(rank: number, count: number): number {
  return Math.floor(((rank + 0.5) * 256) / count);
}

// ============================================
// Matrix Construction
// ============================================

/**
 * Build a ThresholdMatrix from square rows of 0-255 thresholds.
 */
export function createThresholdMatrix(rows: ReadonlyArray<ReadonlyArray<number>>): ThresholdMatrix {
  const size = rows.length;
  if (!isPowerOfTwo(size)) {
    throw new ConfigurationError(`matrix size must be a power of two, got ${size}`, 'matrix');
  }
  const data = new Uint8Array(size * size);
  for (let y = 0; y < size; y++) {
    const row = rows[y];
    if (row.length !== size) {
      throw new ConfigurationError(ERROR_MESSAGES.matrixNotSquare(row.length, size), 'matrix');
    }
    for (let x = 0; x < size; x++) {
      data[y * size + x] = Math.max(0, Math.min(255, Math.round(row[x])));
    }
  }
  return { size, data, mask: size - 1 };
}

/**
 * Single-cell matrix: every pixel compared against the same level.
 */
export function flatMatrix(level: number = 128): ThresholdMatrix {
  return createThresholdMatrix([[level]]);
}

/**
 * Bayer index matrix of the given order (power of two), built by the
 * recursive doubling M(2n) = [[4M, 4M+2], [4M+3, 4M+1]].
 */
export function bayerIndices(order: number): number[][] {
  checkOrder(order);
  let m: number[][] = [[0]];
  for (let n = 1; n < order; n <<= 1) {
    const next: number[][] = [];
    for (let y = 0; y < n * 2; y++) next.push(new Array<number>(n * 2).fill(0));
    for (let y = 0; y < n; y++) {
      for (let x = 0; x < n; x++) {
        const v = m[y][x] * 4;
        next[y][x] = v;
        next[y][x + n] = v + 2;
        next[y + n][x] = v + 3;
        next[y + n][x + n] = v + 1;
      }
    }
    m = next;
  }
  return m;
}

/**
 * Bayer dispersed-dot threshold matrix.
 */
export function bayerMatrix(order: number): ThresholdMatrix {
  const count = order * order;
  return createThresholdMatrix(bayerIndices(order).map(row => row.map(rank => rankToThreshold(rank, count))));
}

const clusterCache = new Map<number, ThresholdMatrix>();

// Cached matrices never leave the cache; callers get their own buffer
function copyMatrix(matrix: ThresholdMatrix): ThresholdMatrix {
  return { ...matrix, data: matrix.data.slice() };
}

/**
 * Clustered-dot threshold matrix: dots grow outward from the tile centre.
 * Cells are ranked by distance from the centre (ties by angle); the centre
 * gets the highest threshold so it is the first cell to print.
 */
export function clusterMatrix(order: number): ThresholdMatrix {
  checkOrder(order);
  const cached = clusterCache.get(order);
  if (cached) return copyMatrix(cached);

  const center = (order - 1) / 2;
  const cells: { x: number; y: number; dist: number; angle: number }[] = [];
  for (let y = 0; y < order; y++) {
    for (let x = 0; x < order; x++) {
      const dx = x - center;
      const dy = y - center;
      cells.push({ x, y, dist: Math.sqrt(dx * dx + dy * dy), angle: Math.atan2(dy, dx) });
    }
  }
  cells.sort((a, b) => (a.dist === b.dist ? a.angle - b.angle : a.dist - b.dist));

  const count = order * order;
  const rows: number[][] = [];
  for (let y = 0; y < order; y++) rows.push(new Array<number>(order).fill(0));
  cells.forEach((cell, rank) => {
    rows[cell.y][cell.x] = rankToThreshold(count - 1 - rank, count);
  });

  const matrix = createThresholdMatrix(rows);
  clusterCache.set(order, matrix);
  return copyMatrix(matrix);
}

// ============================================
// Threshold Matrix Loading
// ============================================

// Cache for loaded threshold matrices
const matrixCache = new Map<string, ThresholdMatrix>();

/**
 * Decode PNG bytes into a ThresholdMatrix and cache it.
 */
function decodePngToMatrix(pngData: Uint8Array, sourcePath: string): ThresholdMatrix {
  const decoded = decodePng(pngData);
  if (decoded.width !== decoded.height) {
    throw new ConfigurationError(ERROR_MESSAGES.matrixNotSquare(decoded.width, decoded.height), 'matrixFile');
  }
  const size = decoded.width;
  if (!isPowerOfTwo(size)) {
    throw new ConfigurationError(`threshold matrix size must be a power of two, got ${size}`, 'matrixFile');
  }
  const channels = decoded.channels;
  const scale = decoded.depth === 16 ? 1 / 257 : 1;
  const data = new Uint8Array(size * size);
  for (let i = 0; i < size * size; i++) {
    if (channels <= 2) {
      data[i] = Math.round(decoded.data[i * channels] * scale);
    } else {
      const idx = i * channels;
      data[i] = rgbToGray(decoded.data[idx] * scale, decoded.data[idx + 1] * scale, decoded.data[idx + 2] * scale);
    }
  }
  const matrix: ThresholdMatrix = { size, data, mask: size - 1 };
  matrixCache.set(sourcePath, matrix);
  return copyMatrix(matrix);
}

/**
 * Load a threshold matrix from a square grayscale PNG file (synchronous).
 * Matrix is cached per path.
 */
export function loadThresholdMatrixFromPngSync(pngPath: string): ThresholdMatrix {
  const cached = matrixCache.get(pngPath);
  if (cached) return copyMatrix(cached);
  return decodePngToMatrix(readFileSync(pngPath), pngPath);
}

/**
 * Load a threshold matrix from a square grayscale PNG file (async).
 * Matrix is cached per path.
 */
export async function loadThresholdMatrixFromPng(pngPath: string): Promise<ThresholdMatrix> {
  const cached = matrixCache.get(pngPath);
  if (cached) return copyMatrix(cached);
  const pngData = await readFile(pngPath);
  return decodePngToMatrix(pngData, pngPath);
}

export function clearThresholdMatrixCache(): void {
  matrixCache.clear();
}

// ============================================
// Dithering
// ============================================

/**
 * Ordered dithering against any threshold matrix. Pixels are independent;
 * the matrix is tiled with bitmasking so indices always wrap.
 */
export function applyThresholdDither(image: GrayscaleImage, matrix: ThresholdMatrix): BinaryImage {
  validateImage(image);
  const { width, height } = image;
  const out = createBinaryImage(width, height);
  const { size, data, mask } = matrix;

  for (let y = 0; y < height; y++) {
    const rowOffset = (y & mask) * size;
    const pixelRow = y * width;
    for (let x = 0; x < width; x++) {
      if (image.data[pixelRow + x] < data[rowOffset + (x & mask)]) {
        out.data[pixelRow + x] = 1;
      }
    }
  }
  return out;
}
