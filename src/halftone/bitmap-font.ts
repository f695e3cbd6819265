// Bitmap font definitions for the glyph halftone
// Each glyph is an array of row bitmasks (MSB = leftmost pixel).
//
// PSF2 fonts can be loaded with parsePSF2() or loadBitmapFontFile().

import { readFileSync } from 'node:fs';
import { ConfigurationError } from './errors.ts';

export interface BitmapFont {
  readonly width: number;     // Pixels per glyph (horizontal)
  readonly height: number;    // Pixels per glyph (vertical)
  readonly glyphs: Record<string, number[]>;
}

const PSF2_MAGIC = 0x864ab572;
const PSF2_HAS_UNICODE_TABLE = 0x01;
const PSF2_SEPARATOR = 0xff;
const PSF2_START_SEQ = 0xfe;

/**
 * Parse a PSF2 (PC Screen Font v2) binary into a BitmapFont.
 */
export function parsePSF2(data: Uint8Array): BitmapFont {
  if (data.byteLength < 32) {
    throw new ConfigurationError('Not a PSF2 font (truncated header)', 'fontFile');
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const magic = view.getUint32(0, true);
  if (magic !== PSF2_MAGIC) {
    throw new ConfigurationError('Not a PSF2 font (bad magic)', 'fontFile');
  }

  const headerSize = view.getUint32(8, true);
  const flags = view.getUint32(12, true);
  const numGlyphs = view.getUint32(16, true);
  const height = view.getUint32(24, true);
  const width = view.getUint32(28, true);

  const bytesPerRow = Math.ceil(width / 8);
  const shift = bytesPerRow * 8 - width;

  // Read glyph bitmaps
  const glyphBitmaps: number[][] = [];
  let offset = headerSize;
  for (let g = 0; g < numGlyphs; g++) {
    const rows: number[] = [];
    for (let r = 0; r < height; r++) {
      let val = 0;
      for (let b = 0; b < bytesPerRow; b++) {
        val = (val << 8) | data[offset++];
      }
      rows.push(val >>> shift);
    }
    glyphBitmaps.push(rows);
  }

  const glyphs: Record<string, number[]> = {};

  if (flags & PSF2_HAS_UNICODE_TABLE) {
    const decoder = new TextDecoder();
    for (let g = 0; g < numGlyphs; g++) {
      // Each entry: UTF-8 characters terminated by 0xFF.
      // 0xFE starts combining sequences, which are skipped.
      while (offset < data.length) {
        const byte = data[offset];
        if (byte === PSF2_SEPARATOR) {
          offset++;
          break;
        }
        if (byte === PSF2_START_SEQ) {
          offset++;
          while (offset < data.length && data[offset] !== PSF2_SEPARATOR) offset++;
          if (offset < data.length) offset++;
          break;
        }
        let charLen = 1;
        if (byte >= 0xc0 && byte < 0xe0) charLen = 2;
        else if (byte >= 0xe0 && byte < 0xf0) charLen = 3;
        else if (byte >= 0xf0) charLen = 4;
        const char = decoder.decode(data.subarray(offset, offset + charLen));
        offset += charLen;
        glyphs[char] = glyphBitmaps[g];
      }
    }
  } else {
    // No unicode table: glyph index is the codepoint
    for (let g = 32; g < numGlyphs; g++) {
      glyphs[String.fromCodePoint(g)] = glyphBitmaps[g];
    }
  }

  return { width, height, glyphs };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isRowList(value: unknown, height: number): value is number[] {
  return Array.isArray(value) && value.length === height && value.every(row => Number.isInteger(row) && row >= 0);
}

/**
 * Validate a font read from JSON: `{ width, height, glyphs: { char: rows[] } }`.
 */
export function parseBitmapFontJson(value: unknown): BitmapFont {
  if (!isRecord(value)) {
    throw new ConfigurationError('font JSON must be an object', 'fontFile');
  }
  const { width, height, glyphs } = value;
  if (typeof width !== 'number' || typeof height !== 'number' || width <= 0 || height <= 0) {
    throw new ConfigurationError('font JSON needs positive numeric width and height', 'fontFile');
  }
  if (!isRecord(glyphs)) {
    throw new ConfigurationError('font JSON needs a glyphs object', 'fontFile');
  }
  const parsed: Record<string, number[]> = {};
  for (const [char, rows] of Object.entries(glyphs)) {
    if (!isRowList(rows, height)) {
      throw new ConfigurationError(`glyph "${char}" must list ${height} row bitmasks`, 'fontFile');
    }
    parsed[char] = rows;
  }
  return { width, height, glyphs: parsed };
}

/**
 * Load a font from disk: `.json` files use the bundled JSON layout,
 * anything else is read as PSF2.
 */
export function loadBitmapFontFile(path: string): BitmapFont {
  const bytes = readFileSync(path);
  if (path.toLowerCase().endsWith('.json')) {
    return parseBitmapFontJson(JSON.parse(bytes.toString('utf8')));
  }
  return parsePSF2(bytes);
}

// Bundled 5x7 ramp font, read once on first use
let _defaultFont: BitmapFont | null = null;

export function getDefaultGlyphFont(): BitmapFont {
  if (!_defaultFont) {
    const url = new URL('../../assets/glyph-ramp-5x7.json', import.meta.url);
    _defaultFont = parseBitmapFontJson(JSON.parse(readFileSync(url, 'utf8')));
  }
  return _defaultFont;
}
