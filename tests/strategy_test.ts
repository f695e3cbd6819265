// Tests for strategy selection and the ditherImage entry point

import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, before, test } from 'node:test';
import { encode } from 'fast-png';
import { ditherImage } from '../src/halftone/apply.ts';
import { ConfigurationError, InvariantViolation } from '../src/halftone/errors.ts';
import { countDark, createBinaryImage, createGrayscaleImage, grayscaleFromArray } from '../src/halftone/image.ts';
import {
  createDitherStrategy,
  DITHER_STRATEGIES,
  ErrorDiffusionStrategy,
  isDitherStrategyName,
  OrderedDitherStrategy,
  resolveStrategyName,
  RiemersmaStrategy,
  type DitherStrategy,
} from '../src/halftone/strategy.ts';
import { clearThresholdMatrixCache, clusterMatrix } from '../src/halftone/threshold.ts';
import type { DitherOptions } from '../src/halftone/types.ts';

let tempDir = '';
let matrixFile = '';

before(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'halftone-strategy-'));
  matrixFile = join(tempDir, 'checker.png');
  writeFileSync(matrixFile, encode({ width: 2, height: 2, data: new Uint8Array([64, 192, 192, 64]), channels: 1, depth: 8 }));
});

after(() => {
  clearThresholdMatrixCache();
  rmSync(tempDir, { recursive: true, force: true });
});

function optionsFor(strategy: DitherOptions['strategy']): DitherOptions {
  return { strategy, matrixFile };
}

test('isDitherStrategyName / resolveStrategyName', () => {
  assert.equal(isDitherStrategyName('riemersma'), true);
  assert.equal(isDitherStrategyName('Riemersma'), false);
  assert.equal(resolveStrategyName('sierra-2-4a'), 'sierra-2-4a');
  assert.throws(() => resolveStrategyName('blue-noise'), ConfigurationError);
});

test('every strategy keeps white paper white', () => {
  const white = createGrayscaleImage(4, 4, 255);
  for (const name of DITHER_STRATEGIES) {
    const out = ditherImage(white, optionsFor(name));
    assert.equal(out.width, 4, name);
    assert.equal(out.height, 4, name);
    assert.equal(countDark(out), 0, name);
  }
});

test('every strategy returns the input dimensions', () => {
  const values = Array.from({ length: 13 * 7 }, (_, i) => (i * 29) % 256);
  const image = grayscaleFromArray(13, 7, values);
  for (const name of DITHER_STRATEGIES) {
    const out = ditherImage(image, optionsFor(name));
    assert.equal(out.width, 13, name);
    assert.equal(out.height, 7, name);
    assert.equal(out.data.length, 13 * 7, name);
    assert.ok(out.data.every(v => v === 0 || v === 1), name);
  }
  assert.deepEqual([...image.data], values);
});

test('aliases resolve to the same algorithm', () => {
  const image = grayscaleFromArray(5, 3, [10, 60, 110, 160, 210, 20, 70, 120, 170, 220, 30, 80, 130, 180, 230]);
  assert.deepEqual(ditherImage(image, { strategy: 'floyd' }).data, ditherImage(image, { strategy: 'floyd-steinberg' }).data);
  assert.deepEqual(ditherImage(image, { strategy: 'none' }).data, ditherImage(image, { strategy: 'threshold' }).data);
});

test('matrix strategy uses the PNG thresholds', () => {
  const out = ditherImage(createGrayscaleImage(2, 2, 128), optionsFor('matrix'));
  assert.deepEqual([...out.data], [0, 1, 1, 0]);
});

test('createDitherStrategy - invalid options fail before any pixel work', () => {
  assert.throws(() => createDitherStrategy({ strategy: 'matrix' }), ConfigurationError);
  assert.throws(() => createDitherStrategy({ strategy: 'matrix', matrixFile: join(tempDir, 'missing.png') }), ConfigurationError);
  assert.throws(() => createDitherStrategy({ strategy: 'bayer', matrixOrder: 6 }), ConfigurationError);
  assert.throws(() => createDitherStrategy({ strategy: 'riemersma', riemersma: { historyDepth: 1 } }), ConfigurationError);
  assert.throws(() => createDitherStrategy({ strategy: 'ascii', glyph: { ramp: ' ~' } }), ConfigurationError);
  assert.throws(() => createDitherStrategy({ strategy: 'ascii', glyph: { fontFile: join(tempDir, 'missing.psf') } }), ConfigurationError);
});

test('createDitherStrategy - picks the matching implementation', () => {
  assert.ok(createDitherStrategy({ strategy: 'cluster', matrixOrder: 4 }) instanceof OrderedDitherStrategy);
  assert.ok(createDitherStrategy({ strategy: 'stucki' }) instanceof ErrorDiffusionStrategy);
  const riemersma = createDitherStrategy({ strategy: 'riemersma', riemersma: { decayRatio: 0.5 } });
  assert.ok(riemersma instanceof RiemersmaStrategy);
  assert.deepEqual(riemersma.options, { historyDepth: 16, decayRatio: 0.5 });
  assert.equal(createDitherStrategy({ strategy: 'floyd' }).name, 'floyd');
});

test('ditherImage - reuses a prebuilt strategy', () => {
  const strategy = createDitherStrategy({ strategy: 'bayer', matrixOrder: 2 });
  const out = ditherImage(createGrayscaleImage(2, 2, 128), strategy);
  // Bayer 2x2 thresholds 32, 160, 224, 96
  assert.deepEqual([...out.data], [0, 1, 1, 0]);
});

test('ditherImage - cluster output does not depend on earlier matrix writes', () => {
  const image = createGrayscaleImage(4, 4, 128);
  const options: DitherOptions = { strategy: 'cluster', matrixOrder: 4 };
  // Thresholds 16r + 8 for ranks 0..15: the upper eight are above 128
  assert.equal(countDark(ditherImage(image, options)), 8);
  clusterMatrix(4).data.fill(255);
  assert.equal(countDark(ditherImage(image, options)), 8);
});

test('ditherImage - glyph strategy renders the darkest glyph for black', () => {
  const out = ditherImage(createGrayscaleImage(6, 8, 0), {
    strategy: 'ascii',
    glyph: { metrics: { fontSize: 7, dpi: 72 } },
  });
  assert.equal(countDark(out), 21);
});

test('ditherImage - rejects malformed images', () => {
  assert.throws(() => ditherImage({ width: 3, height: 3, data: new Uint8Array(8) }, { strategy: 'bayer' }), ConfigurationError);
});

test('ditherImage - output of the wrong size is an invariant violation', () => {
  const broken: DitherStrategy = {
    name: 'threshold',
    dither: () => createBinaryImage(1, 1),
  };
  assert.throws(() => ditherImage(createGrayscaleImage(2, 2), broken), InvariantViolation);
});
