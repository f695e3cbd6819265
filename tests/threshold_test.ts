// Tests for ordered (threshold matrix) dithering

import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { encode } from 'fast-png';
import { ConfigurationError } from '../src/halftone/errors.ts';
import { createGrayscaleImage, grayscaleFromArray } from '../src/halftone/image.ts';
import {
  applyThresholdDither,
  bayerIndices,
  bayerMatrix,
  clearThresholdMatrixCache,
  clusterMatrix,
  createThresholdMatrix,
  flatMatrix,
  loadThresholdMatrixFromPng,
  loadThresholdMatrixFromPngSync,
} from '../src/halftone/threshold.ts';

test('applyThresholdDither - 2x2 matrix on uniform gray gives a checkerboard', () => {
  const matrix = createThresholdMatrix([[64, 192], [192, 64]]);
  const out = applyThresholdDither(createGrayscaleImage(2, 2, 128), matrix);
  assert.deepEqual([...out.data], [0, 1, 1, 0]);
});

test('applyThresholdDither - black and white checkerboard keeps its pattern', () => {
  const matrix = createThresholdMatrix([[64, 192], [192, 64]]);
  const out = applyThresholdDither(grayscaleFromArray(2, 2, [0, 255, 255, 0]), matrix);
  assert.deepEqual([...out.data], [1, 0, 0, 1]);
});

test('applyThresholdDither - matrix indices wrap around the tile', () => {
  const matrix = createThresholdMatrix([[64, 192], [192, 64]]);
  const out = applyThresholdDither(createGrayscaleImage(5, 3, 128), matrix);
  assert.deepEqual([...out.data], [
    0, 1, 0, 1, 0,
    1, 0, 1, 0, 1,
    0, 1, 0, 1, 0,
  ]);
});

test('applyThresholdDither - pure black and white pass through', () => {
  const matrix = bayerMatrix(8);
  const black = applyThresholdDither(createGrayscaleImage(9, 9, 0), matrix);
  const white = applyThresholdDither(createGrayscaleImage(9, 9, 255), matrix);
  assert.ok(black.data.every(v => v === 1));
  assert.ok(white.data.every(v => v === 0));
});

test('applyThresholdDither - running twice gives identical output', () => {
  const values = Array.from({ length: 64 }, (_, i) => (i * 37) % 256);
  const image = grayscaleFromArray(8, 8, values);
  const matrix = clusterMatrix(4);
  assert.deepEqual(applyThresholdDither(image, matrix).data, applyThresholdDither(image, matrix).data);
});

test('applyThresholdDither - does not modify the input', () => {
  const image = grayscaleFromArray(2, 2, [10, 100, 150, 250]);
  applyThresholdDither(image, bayerMatrix(2));
  assert.deepEqual([...image.data], [10, 100, 150, 250]);
});

test('flatMatrix - plain thresholding at 128', () => {
  const image = grayscaleFromArray(4, 1, [0, 127, 128, 255]);
  const out = applyThresholdDither(image, flatMatrix());
  assert.deepEqual([...out.data], [1, 1, 0, 0]);
});

test('bayerIndices - recursive construction', () => {
  assert.deepEqual(bayerIndices(2), [[0, 2], [3, 1]]);
  assert.deepEqual(bayerIndices(4), [
    [0, 8, 2, 10],
    [12, 4, 14, 6],
    [3, 11, 1, 9],
    [15, 7, 13, 5],
  ]);
});

test('bayerMatrix - indices spread evenly over 0-255', () => {
  const m = bayerMatrix(2);
  assert.equal(m.size, 2);
  assert.equal(m.mask, 1);
  // floor((rank + 0.5) * 256 / 4) for ranks 0, 2, 3, 1
  assert.deepEqual([...m.data], [32, 160, 224, 96]);
});

test('bayerMatrix - 8x8 holds 64 distinct thresholds', () => {
  const m = bayerMatrix(8);
  assert.equal(new Set(m.data).size, 64);
  assert.equal(Math.min(...m.data), 2);
  assert.equal(Math.max(...m.data), 254);
});

test('clusterMatrix - centre cells print first', () => {
  const m = clusterMatrix(4);
  const centre = [m.data[5], m.data[6], m.data[9], m.data[10]];
  const corners = [m.data[0], m.data[3], m.data[12], m.data[15]];
  assert.ok(Math.min(...centre) > Math.max(...corners));
  assert.equal(new Set(m.data).size, 16);
});

test('clusterMatrix - writing into a result leaves later calls intact', () => {
  const first = clusterMatrix(4);
  const original = [...first.data];
  first.data.fill(255);
  assert.deepEqual([...clusterMatrix(4).data], original);
  assert.notEqual(clusterMatrix(4).data, clusterMatrix(4).data);
});

test('matrix order must be a power of two between 2 and 64', () => {
  assert.throws(() => bayerMatrix(3), ConfigurationError);
  assert.throws(() => bayerMatrix(1), ConfigurationError);
  assert.throws(() => clusterMatrix(128), ConfigurationError);
  assert.throws(() => createThresholdMatrix([[1, 2, 3], [4, 5, 6], [7, 8, 9]]), ConfigurationError);
  assert.throws(() => createThresholdMatrix([[1, 2], [3]]), ConfigurationError);
});

test('loadThresholdMatrixFromPng - reads a grayscale PNG and caches it', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'halftone-matrix-'));
  try {
    const path = join(dir, 'matrix.png');
    writeFileSync(path, encode({ width: 2, height: 2, data: new Uint8Array([64, 192, 192, 64]), channels: 1, depth: 8 }));

    clearThresholdMatrixCache();
    const sync = loadThresholdMatrixFromPngSync(path);
    assert.equal(sync.size, 2);
    assert.deepEqual([...sync.data], [64, 192, 192, 64]);

    // Served from the cache once the file is gone, and unaffected by writes
    // into an earlier result
    sync.data.fill(0);
    rmSync(path);
    const cached = await loadThresholdMatrixFromPng(path);
    assert.deepEqual([...cached.data], [64, 192, 192, 64]);
    assert.notEqual(cached.data, sync.data);

    const nonSquare = join(dir, 'wide.png');
    writeFileSync(nonSquare, encode({ width: 4, height: 2, data: new Uint8Array(8), channels: 1, depth: 8 }));
    assert.throws(() => loadThresholdMatrixFromPngSync(nonSquare), ConfigurationError);
  } finally {
    clearThresholdMatrixCache();
    rmSync(dir, { recursive: true, force: true });
  }
});
