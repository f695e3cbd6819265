// Pre-processing applied before halftoning: brightness, contrast,
// orientation and fitting onto the printable area.

import { ConfigurationError } from './errors.ts';
import { createGrayscaleImage, validateImage } from './image.ts';
import { resampleArea } from './resample.ts';
import type { GrayscaleImage } from './types.ts';

export const DEFAULT_BRIGHTNESS = 1.2;
export const DEFAULT_CONTRAST = 1.0;

function checkFactor(name: string, factor: number): void {
  if (!Number.isFinite(factor) || factor < 0) {
    throw new ConfigurationError(`must be a finite number >= 0, got ${factor}`, name);
  }
}

function mapPixels(image: GrayscaleImage, fn: (v: number) => number): GrayscaleImage {
  const data = new Uint8Array(image.data.length);
  for (let i = 0; i < data.length; i++) {
    data[i] = Math.max(0, Math.min(255, Math.round(fn(image.data[i]))));
  }
  return { width: image.width, height: image.height, data };
}

/**
 * Scale every intensity by `factor` (1 = unchanged, >1 lighter).
 */
export function adjustBrightness(image: GrayscaleImage, factor: number): GrayscaleImage {
  validateImage(image);
  checkFactor('brightness', factor);
  return mapPixels(image, v => v * factor);
}

/**
 * Stretch intensities away from (factor > 1) or towards (factor < 1) the
 * rounded image mean.
 */
export function adjustContrast(image: GrayscaleImage, factor: number): GrayscaleImage {
  validateImage(image);
  checkFactor('contrast', factor);
  let sum = 0;
  for (let i = 0; i < image.data.length; i++) sum += image.data[i];
  const mean = Math.round(sum / image.data.length);
  return mapPixels(image, v => mean + (v - mean) * factor);
}

/**
 * Quarter turn counter-clockwise. The result is `height` wide and `width` tall.
 */
export function rotate90(image: GrayscaleImage): GrayscaleImage {
  validateImage(image);
  const { width, height } = image;
  const data = new Uint8Array(width * height);
  // Old (x, y) lands at new (y, width - 1 - x); new rows are `height` wide
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data[(width - 1 - x) * height + y] = image.data[y * width + x];
    }
  }
  return { width: height, height: width, data };
}

export interface FitOptions {
  /** Turn the image when its orientation differs from the canvas. Default true. */
  rotate?: boolean;
}

/**
 * Fit onto a `width` x `height` white canvas: optionally rotate to match
 * orientation, scale preserving aspect ratio, centre.
 */
export function fitToCanvas(
  image: GrayscaleImage,
  width: number,
  height: number,
  options: FitOptions = {},
): GrayscaleImage {
  validateImage(image);
  const canvas = createGrayscaleImage(width, height, 255);

  let source = image;
  const rotate = options.rotate ?? true;
  if (rotate && (image.height > image.width) !== (height > width)) {
    source = rotate90(image);
  }

  const scale = Math.min(width / source.width, height / source.height);
  const fitWidth = Math.min(width, Math.max(1, Math.round(source.width * scale)));
  const fitHeight = Math.min(height, Math.max(1, Math.round(source.height * scale)));
  const scaled = resampleArea(source, fitWidth, fitHeight);

  const offsetX = Math.floor((width - fitWidth) / 2);
  const offsetY = Math.floor((height - fitHeight) / 2);
  for (let y = 0; y < fitHeight; y++) {
    const row = scaled.data.subarray(y * fitWidth, (y + 1) * fitWidth);
    canvas.data.set(row, (offsetY + y) * width + offsetX);
  }
  return canvas;
}

export interface PrepareOptions extends FitOptions {
  /** Printable area; the image keeps its size when omitted. */
  width?: number;
  height?: number;
  brightness?: number;
  contrast?: number;
}

/**
 * Brightness, then contrast, then fit to the printable area.
 */
export function prepareImage(image: GrayscaleImage, options: PrepareOptions = {}): GrayscaleImage {
  let result = adjustBrightness(image, options.brightness ?? DEFAULT_BRIGHTNESS);
  result = adjustContrast(result, options.contrast ?? DEFAULT_CONTRAST);
  if (options.width !== undefined || options.height !== undefined) {
    result = fitToCanvas(result, options.width ?? result.width, options.height ?? result.height, options);
  }
  return result;
}
