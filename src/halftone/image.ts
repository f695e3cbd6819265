// Grayscale and 1-bit raster helpers

import { ConfigurationError, ERROR_MESSAGES } from './errors.ts';
import type { BinaryImage, GrayscaleImage } from './types.ts';

function checkDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(ERROR_MESSAGES.invalidDimension(name, value), name);
  }
}

/**
 * Check dimensions and buffer length of a caller-supplied image.
 */
export function validateImage(image: GrayscaleImage | BinaryImage): void {
  checkDimension('width', image.width);
  checkDimension('height', image.height);
  const expected = image.width * image.height;
  if (image.data.length !== expected) {
    throw new ConfigurationError(ERROR_MESSAGES.bufferLength(expected, image.data.length), 'data');
  }
}

/**
 * Create a grayscale image filled with a single intensity (white by default).
 */
export function createGrayscaleImage(width: number, height: number, fill: number = 255): GrayscaleImage {
  checkDimension('width', width);
  checkDimension('height', height);
  const data = new Uint8Array(width * height);
  data.fill(fill);
  return { width, height, data };
}

/**
 * Wrap a row-major list of intensities. Values are rounded and clamped to 0-255.
 */
export function grayscaleFromArray(width: number, height: number, values: ArrayLike<number>): GrayscaleImage {
  const image = { width, height, data: Uint8Array.from(values, v => Math.max(0, Math.min(255, Math.round(v)))) };
  validateImage(image);
  return image;
}

/**
 * Convert RGB to grayscale using luminance formula
 */
export function rgbToGray(r: number, g: number, b: number): number {
  return Math.round(0.299 * r + 0.587 * g + 0.114 * b);
}

/**
 * Convert RGBA bytes to grayscale. Transparent pixels are composited over
 * white, the colour of label stock.
 */
export function grayscaleFromRgba(rgba: Uint8Array, width: number, height: number): GrayscaleImage {
  checkDimension('width', width);
  checkDimension('height', height);
  if (rgba.length !== width * height * 4) {
    throw new ConfigurationError(ERROR_MESSAGES.bufferLength(width * height * 4, rgba.length), 'data');
  }
  const data = new Uint8Array(width * height);
  for (let i = 0; i < data.length; i++) {
    const idx = i * 4;
    const alpha = rgba[idx + 3] / 255;
    const gray = rgbToGray(rgba[idx], rgba[idx + 1], rgba[idx + 2]);
    data[i] = Math.round(gray * alpha + 255 * (1 - alpha));
  }
  return { width, height, data };
}

export function createBinaryImage(width: number, height: number): BinaryImage {
  checkDimension('width', width);
  checkDimension('height', height);
  return { width, height, data: new Uint8Array(width * height) };
}

export function countDark(image: BinaryImage): number {
  let dark = 0;
  for (let i = 0; i < image.data.length; i++) {
    if (image.data[i]) dark++;
  }
  return dark;
}

export function darkFraction(image: BinaryImage): number {
  return countDark(image) / (image.width * image.height);
}

/**
 * Serialize to the packed 1-bit raster printers take: each row padded to a
 * whole number of bytes, MSB = leftmost pixel, bit set = dark.
 */
export function packBinaryImage(image: BinaryImage): Uint8Array {
  const bytesPerRow = Math.ceil(image.width / 8);
  const packed = new Uint8Array(bytesPerRow * image.height);
  for (let y = 0; y < image.height; y++) {
    const rowOffset = y * image.width;
    const outOffset = y * bytesPerRow;
    for (let x = 0; x < image.width; x++) {
      if (image.data[rowOffset + x]) {
        packed[outOffset + (x >> 3)] |= 0x80 >> (x & 7);
      }
    }
  }
  return packed;
}

/**
 * Render as text, one line per row. Handy in logs and test failures.
 */
export function binaryToAscii(image: BinaryImage, dark: string = '#', light: string = '.'): string {
  const lines: string[] = [];
  for (let y = 0; y < image.height; y++) {
    let line = '';
    for (let x = 0; x < image.width; x++) {
      line += image.data[y * image.width + x] ? dark : light;
    }
    lines.push(line);
  }
  return lines.join('\n');
}
