// Tests for raster helpers, resampling and pre-processing

import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  adjustBrightness,
  adjustContrast,
  fitToCanvas,
  prepareImage,
  rotate90,
} from '../src/halftone/adjust.ts';
import { ConfigurationError } from '../src/halftone/errors.ts';
import {
  binaryToAscii,
  countDark,
  createBinaryImage,
  createGrayscaleImage,
  darkFraction,
  grayscaleFromArray,
  grayscaleFromRgba,
  packBinaryImage,
  rgbToGray,
  validateImage,
} from '../src/halftone/image.ts';
import { resampleArea } from '../src/halftone/resample.ts';

test('validateImage - dimensions and buffer length', () => {
  assert.throws(() => validateImage({ width: 0, height: 1, data: new Uint8Array(0) }), ConfigurationError);
  assert.throws(() => validateImage({ width: 2, height: 2, data: new Uint8Array(3) }), ConfigurationError);
  assert.throws(() => createGrayscaleImage(1.5, 2), ConfigurationError);
  validateImage(createGrayscaleImage(3, 2));
});

test('grayscaleFromArray - rounds and clamps', () => {
  const image = grayscaleFromArray(4, 1, [0.4, 254.6, 300, -5]);
  assert.deepEqual([...image.data], [0, 255, 255, 0]);
});

test('grayscaleFromRgba - luminance with transparency over white', () => {
  const rgba = new Uint8Array([
    255, 0, 0, 255,
    0, 0, 0, 0,
    0, 0, 0, 128,
    255, 255, 255, 255,
  ]);
  const image = grayscaleFromRgba(rgba, 2, 2);
  assert.deepEqual([...image.data], [76, 255, 127, 255]);
  assert.equal(rgbToGray(0, 255, 0), 150);
  assert.throws(() => grayscaleFromRgba(new Uint8Array(4), 2, 2), ConfigurationError);
});

test('packBinaryImage - MSB first, rows padded to whole bytes', () => {
  const image = createBinaryImage(10, 2);
  image.data[0] = 1;
  image.data[7] = 1;
  image.data[8] = 1;
  image.data[10 + 9] = 1;
  assert.deepEqual([...packBinaryImage(image)], [0x81, 0x80, 0x00, 0x40]);
});

test('countDark, darkFraction and binaryToAscii', () => {
  const image = createBinaryImage(3, 2);
  image.data[1] = 1;
  image.data[5] = 1;
  assert.equal(countDark(image), 2);
  assert.equal(darkFraction(image), 2 / 6);
  assert.equal(binaryToAscii(image), '.#.\n..#');
  assert.equal(binaryToAscii(image, 'X', ' '), ' X \n  X');
});

test('resampleArea - averages covered source pixels', () => {
  assert.deepEqual([...resampleArea(grayscaleFromArray(4, 1, [0, 100, 200, 255]), 2, 1).data], [50, 228]);
  // 3 -> 2 covers one and a half pixels each
  assert.deepEqual([...resampleArea(grayscaleFromArray(3, 1, [0, 90, 180]), 2, 1).data], [30, 150]);
  assert.deepEqual([...resampleArea(grayscaleFromArray(2, 1, [10, 20]), 4, 1).data], [10, 10, 20, 20]);
});

test('resampleArea - same size is a copy', () => {
  const image = grayscaleFromArray(2, 2, [1, 2, 3, 4]);
  const out = resampleArea(image, 2, 2);
  assert.notEqual(out.data, image.data);
  assert.deepEqual([...out.data], [1, 2, 3, 4]);
});

test('adjustBrightness - scales and clamps', () => {
  const out = adjustBrightness(grayscaleFromArray(3, 1, [100, 200, 250]), 1.2);
  assert.deepEqual([...out.data], [120, 240, 255]);
  assert.throws(() => adjustBrightness(createGrayscaleImage(1, 1), -1), ConfigurationError);
});

test('adjustContrast - stretches around the mean', () => {
  const image = grayscaleFromArray(3, 1, [0, 100, 200]);
  assert.deepEqual([...adjustContrast(image, 2).data], [0, 100, 255]);
  assert.deepEqual([...adjustContrast(image, 0).data], [100, 100, 100]);
  assert.deepEqual([...adjustContrast(image, 1).data], [0, 100, 200]);
});

test('rotate90 - counter-clockwise quarter turn', () => {
  const out = rotate90(grayscaleFromArray(3, 2, [1, 2, 3, 4, 5, 6]));
  assert.equal(out.width, 2);
  assert.equal(out.height, 3);
  assert.deepEqual([...out.data], [3, 6, 2, 5, 1, 4]);
});

test('fitToCanvas - scales and centres on white', () => {
  const out = fitToCanvas(grayscaleFromArray(2, 1, [0, 0]), 4, 4);
  assert.deepEqual([...out.data], [
    255, 255, 255, 255,
    0, 0, 0, 0,
    0, 0, 0, 0,
    255, 255, 255, 255,
  ]);
});

test('fitToCanvas - turns portrait images onto landscape labels', () => {
  const portrait = grayscaleFromArray(1, 2, [0, 255]);
  assert.deepEqual([...fitToCanvas(portrait, 4, 2).data], [0, 0, 255, 255, 0, 0, 255, 255]);
  assert.deepEqual([...fitToCanvas(portrait, 4, 2, { rotate: false }).data], [255, 0, 255, 255, 255, 255, 255, 255]);
});

test('prepareImage - brightness then contrast, optional fit', () => {
  const image = grayscaleFromArray(2, 1, [100, 50]);
  assert.deepEqual([...prepareImage(image).data], [120, 60]);
  const fitted = prepareImage(image, { brightness: 1, width: 4, height: 2 });
  assert.equal(fitted.width, 4);
  assert.equal(fitted.height, 2);
  assert.deepEqual([...fitted.data], [100, 100, 50, 50, 100, 100, 50, 50]);
  assert.deepEqual([...image.data], [100, 50]);
});
