// Tests for the glyph (ASCII-art) halftone and bitmap fonts

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { getDefaultGlyphFont, parseBitmapFontJson, parsePSF2 } from '../src/halftone/bitmap-font.ts';
import { ConfigurationError } from '../src/halftone/errors.ts';
import {
  applyGlyphHalftone,
  createDefaultGlyphRamp,
  createGlyphRamp,
  glyphScaleFor,
  selectGlyphIndex,
} from '../src/halftone/glyph.ts';
import { binaryToAscii, countDark, createGrayscaleImage, grayscaleFromArray } from '../src/halftone/image.ts';

// One font pixel per dot: 7 pt at 72 dpi is 7 dots, the font height
const UNIT_METRICS = { fontSize: 7, dpi: 72 };

const AT_SIGN = [
  '.###..',
  '#...#.',
  '#.###.',
  '#.#.#.',
  '#.###.',
  '#.....',
  '.####.',
  '......',
].join('\n');

test('selectGlyphIndex - darker input picks a denser glyph', () => {
  assert.equal(selectGlyphIndex(255, 10), 0);
  assert.equal(selectGlyphIndex(0, 10), 9);
  assert.equal(selectGlyphIndex(128, 10), 4);
  let previous = 0;
  for (let v = 255; v >= 0; v--) {
    const index = selectGlyphIndex(v, 10);
    assert.ok(index >= previous);
    previous = index;
  }
});

test('glyphScaleFor - point size at printer resolution', () => {
  const font = getDefaultGlyphFont();
  assert.equal(glyphScaleFor(font, UNIT_METRICS), 1);
  // 8 pt at 203 dpi is 22.6 dots, about 3 font pixels per dot row
  assert.equal(glyphScaleFor(font), 3);
  assert.equal(glyphScaleFor(font, { fontSize: 1, dpi: 72 }), 1);
  assert.throws(() => glyphScaleFor(font, { fontSize: 0 }), ConfigurationError);
});

test('createGlyphRamp - cells leave one pixel of spacing', () => {
  const ramp = createDefaultGlyphRamp(undefined, UNIT_METRICS);
  assert.equal(ramp.cellWidth, 6);
  assert.equal(ramp.cellHeight, 8);
  assert.equal(ramp.glyphs.length, 10);
  assert.equal(ramp.glyphs[0].char, ' ');
  assert.equal(countDark(ramp.glyphs[0].bitmap), 0);
  assert.equal(binaryToAscii(ramp.glyphs[9].bitmap), AT_SIGN);
});

test('createGlyphRamp - scaled glyphs grow in blocks', () => {
  const ramp = createGlyphRamp(getDefaultGlyphFont(), ' -', { fontSize: 14, dpi: 72 });
  assert.equal(ramp.cellWidth, 12);
  assert.equal(ramp.cellHeight, 16);
  // '-' is the full middle row (row 3), drawn as dot rows 6 and 7
  const dash = ramp.glyphs[1].bitmap;
  assert.equal(countDark(dash), 20);
  assert.equal(dash.data[6 * 12], 1);
  assert.equal(dash.data[7 * 12 + 9], 1);
  assert.equal(dash.data[7 * 12 + 10], 0);
});

test('createGlyphRamp - rejects missing glyphs and short ramps', () => {
  const font = getDefaultGlyphFont();
  assert.throws(() => createGlyphRamp(font, ' a'), ConfigurationError);
  assert.throws(() => createGlyphRamp(font, '@'), ConfigurationError);
});

test('applyGlyphHalftone - a black cell renders the darkest glyph', () => {
  const ramp = createDefaultGlyphRamp(undefined, UNIT_METRICS);
  const out = applyGlyphHalftone(createGrayscaleImage(6, 8, 0), ramp);
  assert.equal(binaryToAscii(out), AT_SIGN);
});

test('applyGlyphHalftone - white renders the lightest glyph', () => {
  const ramp = createDefaultGlyphRamp(undefined, UNIT_METRICS);
  const out = applyGlyphHalftone(createGrayscaleImage(12, 16, 255), ramp);
  assert.equal(countDark(out), 0);
});

test('applyGlyphHalftone - margin that fits no whole cell stays light', () => {
  const ramp = createDefaultGlyphRamp(undefined, UNIT_METRICS);
  const out = applyGlyphHalftone(createGrayscaleImage(8, 9, 0), ramp);
  assert.equal(out.width, 8);
  assert.equal(out.height, 9);
  assert.equal(countDark(out), 21);
  for (let y = 0; y < 9; y++) {
    assert.equal(out.data[y * 8 + 6], 0);
    assert.equal(out.data[y * 8 + 7], 0);
  }
});

test('applyGlyphHalftone - target smaller than one cell is all light', () => {
  const ramp = createDefaultGlyphRamp();
  const out = applyGlyphHalftone(createGrayscaleImage(4, 4, 0), ramp);
  assert.equal(countDark(out), 0);
});

test('applyGlyphHalftone - each cell follows its own area of the input', () => {
  const ramp = createDefaultGlyphRamp(undefined, UNIT_METRICS);
  const values: number[] = [];
  for (let y = 0; y < 8; y++) {
    for (let x = 0; x < 12; x++) values.push(x < 6 ? 0 : 255);
  }
  const out = applyGlyphHalftone(grayscaleFromArray(12, 8, values), ramp);
  const rows = binaryToAscii(out).split('\n');
  assert.equal(rows[0], '.###........');
  assert.equal(rows[6], '.####.......');
});

test('applyGlyphHalftone - explicit target size upsamples the input', () => {
  const ramp = createDefaultGlyphRamp(undefined, UNIT_METRICS);
  const out = applyGlyphHalftone(createGrayscaleImage(1, 1, 0), ramp, 6, 8);
  assert.equal(binaryToAscii(out), AT_SIGN);
});

test('parseBitmapFontJson - validates shape', () => {
  const font = parseBitmapFontJson({ width: 1, height: 1, glyphs: { ' ': [0], '#': [1] } });
  assert.deepEqual(font.glyphs['#'], [1]);
  assert.throws(() => parseBitmapFontJson([]), ConfigurationError);
  assert.throws(() => parseBitmapFontJson({ width: 1, height: 2, glyphs: { x: [1] } }), ConfigurationError);
});

test('parsePSF2 - reads glyphs indexed by code point', () => {
  const numGlyphs = 36;
  const height = 2;
  const data = new Uint8Array(32 + numGlyphs * height);
  const view = new DataView(data.buffer);
  view.setUint32(0, 0x864ab572, true); // magic
  view.setUint32(8, 32, true); // header size
  view.setUint32(12, 0, true); // flags: no unicode table
  view.setUint32(16, numGlyphs, true);
  view.setUint32(20, height, true); // bytes per glyph
  view.setUint32(24, height, true);
  view.setUint32(28, 3, true); // width
  // '#' (35): rows 111 and 101, left-aligned in the byte
  data[32 + 35 * height] = 0b11100000;
  data[32 + 35 * height + 1] = 0b10100000;

  const font = parsePSF2(data);
  assert.equal(font.width, 3);
  assert.equal(font.height, 2);
  assert.deepEqual(font.glyphs['#'], [7, 5]);
  assert.deepEqual(font.glyphs[' '], [0, 0]);

  const ramp = createGlyphRamp(font, ' #', { fontSize: 2, dpi: 72 });
  assert.equal(binaryToAscii(ramp.glyphs[1].bitmap), '###.\n#.#.\n....');
});

test('parsePSF2 - rejects other formats', () => {
  assert.throws(() => parsePSF2(new Uint8Array(8)), ConfigurationError);
  assert.throws(() => parsePSF2(new Uint8Array(64)), ConfigurationError);
});
