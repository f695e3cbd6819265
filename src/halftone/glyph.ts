// Glyph halftone: render a brightness grid as a ramp of increasingly dark
// characters, one glyph per cell.

import { getDefaultGlyphFont, type BitmapFont } from './bitmap-font.ts';
import { ConfigurationError, ERROR_MESSAGES } from './errors.ts';
import { createBinaryImage, validateImage } from './image.ts';
import { resampleArea } from './resample.ts';
import {
  DEFAULT_GLYPH_METRICS,
  DEFAULT_GLYPH_RAMP,
  type BinaryImage,
  type GlyphMetrics,
  type GrayscaleImage,
} from './types.ts';

const POINTS_PER_INCH = 72;

export interface Glyph {
  readonly char: string;
  readonly bitmap: BinaryImage; // cellWidth x cellHeight
}

/**
 * Glyphs ordered light -> dark, all rendered to the same cell size.
 */
export interface GlyphRamp {
  readonly cellWidth: number;
  readonly cellHeight: number;
  readonly glyphs: readonly Glyph[];
}

/**
 * Integer pixel scale for a font drawn at `fontSize` points on a printer
 * with the given DPI.
 */
export function glyphScaleFor(font: BitmapFont, metrics: Partial<GlyphMetrics> = {}): number {
  const fontSize = metrics.fontSize ?? DEFAULT_GLYPH_METRICS.fontSize;
  const dpi = metrics.dpi ?? DEFAULT_GLYPH_METRICS.dpi;
  if (!(fontSize > 0)) {
    throw new ConfigurationError(`font size must be positive, got ${fontSize}`, 'fontSize');
  }
  if (!(dpi > 0)) {
    throw new ConfigurationError(`dpi must be positive, got ${dpi}`, 'dpi');
  }
  const pixelHeight = (fontSize * dpi) / POINTS_PER_INCH;
  return Math.max(1, Math.round(pixelHeight / font.height));
}

/**
 * Build a GlyphRamp from a bitmap font. Each cell leaves one font pixel of
 * spacing to the right of and below the glyph.
 */
export function createGlyphRamp(
  font: BitmapFont,
  ramp: string = DEFAULT_GLYPH_RAMP,
  metrics: Partial<GlyphMetrics> = {},
): GlyphRamp {
  const chars = [...ramp];
  if (chars.length < 2) {
    throw new ConfigurationError(ERROR_MESSAGES.shortRamp(chars.length), 'ramp');
  }
  const scale = glyphScaleFor(font, metrics);
  const cellWidth = (font.width + 1) * scale;
  const cellHeight = (font.height + 1) * scale;

  const glyphs = chars.map((char): Glyph => {
    const rows = font.glyphs[char];
    if (!rows) {
      throw new ConfigurationError(ERROR_MESSAGES.missingGlyph(char), 'ramp');
    }
    const bitmap = createBinaryImage(cellWidth, cellHeight);
    for (let gy = 0; gy < font.height; gy++) {
      const bits = rows[gy];
      for (let gx = 0; gx < font.width; gx++) {
        if (!((bits >> (font.width - 1 - gx)) & 1)) continue;
        for (let sy = 0; sy < scale; sy++) {
          const rowOffset = (gy * scale + sy) * cellWidth + gx * scale;
          bitmap.data.fill(1, rowOffset, rowOffset + scale);
        }
      }
    }
    return { char, bitmap };
  });

  return { cellWidth, cellHeight, glyphs };
}

/**
 * Default ramp from the bundled 5x7 font.
 */
export function createDefaultGlyphRamp(ramp?: string, metrics?: Partial<GlyphMetrics>): GlyphRamp {
  return createGlyphRamp(getDefaultGlyphFont(), ramp, metrics);
}

/**
 * Darker input selects a later (denser) glyph. Ties round to nearest.
 */
export function selectGlyphIndex(intensity: number, rampLength: number): number {
  return Math.round(((255 - intensity) / 255) * (rampLength - 1));
}

/**
 * Render `image` as glyphs on a `targetWidth` x `targetHeight` canvas.
 * Any remainder that does not fit a whole cell stays light.
 */
export function applyGlyphHalftone(
  image: GrayscaleImage,
  ramp: GlyphRamp,
  targetWidth: number = image.width,
  targetHeight: number = image.height,
): BinaryImage {
  validateImage(image);
  const out = createBinaryImage(targetWidth, targetHeight);
  const { cellWidth, cellHeight, glyphs } = ramp;
  const cols = Math.floor(targetWidth / cellWidth);
  const rows = Math.floor(targetHeight / cellHeight);
  if (cols === 0 || rows === 0) return out;

  const grid = resampleArea(image, cols, rows);

  for (let cy = 0; cy < rows; cy++) {
    for (let cx = 0; cx < cols; cx++) {
      const glyph = glyphs[selectGlyphIndex(grid.data[cy * cols + cx], glyphs.length)];
      const originX = cx * cellWidth;
      const originY = cy * cellHeight;
      for (let gy = 0; gy < cellHeight; gy++) {
        const src = glyph.bitmap.data.subarray(gy * cellWidth, (gy + 1) * cellWidth);
        out.data.set(src, (originY + gy) * targetWidth + originX);
      }
    }
  }
  return out;
}
