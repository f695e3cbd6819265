// Halftoning types and constants

/**
 * 8-bit grayscale raster, row-major. 0 = black, 255 = white.
 */
export interface GrayscaleImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/**
 * 1-bit raster, row-major, one byte per pixel. 1 = dark (printed), 0 = light.
 */
export interface BinaryImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

// Threshold matrix for ordered dithering
// Values are thresholds in the 0-255 range; a pixel is dark when its
// intensity is below the threshold at its tile position.
export interface ThresholdMatrix {
  readonly size: number;     // Matrix dimension (square, power of 2)
  readonly data: Uint8Array; // Row-major threshold values (0-255)
  readonly mask: number;     // Bitmask for tiling (size - 1)
}

/**
 * Error distribution kernel for an error-diffusion dithering algorithm.
 * Each offset defines where to spread a fraction of the quantization error.
 */
export interface DiffusionKernel {
  readonly name: DiffusionKernelName;
  /** [dx, dy, weight] tuples relative to the current pixel; weight is over `divisor`. */
  readonly offsets: ReadonlyArray<readonly [dx: number, dy: number, weight: number]>;
  readonly divisor: number;
}

export type DiffusionKernelName =
  | 'floyd-steinberg'
  | 'atkinson'
  | 'jarvis-judice-ninke'
  | 'stucki'
  | 'burkes'
  | 'sierra3'
  | 'sierra2'
  | 'sierra-2-4a';

export type OrderedStrategyName = 'threshold' | 'bayer' | 'cluster' | 'yliluoma' | 'matrix';

export type DitherStrategyName =
  | OrderedStrategyName
  | DiffusionKernelName
  | 'ascii'
  | 'riemersma'
  | 'none'
  | 'floyd';

export interface RiemersmaOptions {
  historyDepth: number;
  decayRatio: number;
}

export interface GlyphMetrics {
  fontSize: number; // points
  dpi: number;      // printer resolution
}

/**
 * Everything a caller may set to select and tune a strategy.
 * Only the fields relevant to the chosen strategy are read.
 */
export interface DitherOptions {
  strategy: DitherStrategyName;
  matrixOrder?: number;
  matrixFile?: string;
  riemersma?: Partial<RiemersmaOptions>;
  glyph?: {
    ramp?: string;
    metrics?: Partial<GlyphMetrics>;
    fontFile?: string;
  };
}

export const DEFAULT_MATRIX_ORDER = 8;
export const DEFAULT_RIEMERSMA: Readonly<RiemersmaOptions> = { historyDepth: 16, decayRatio: 0.1 };
export const DEFAULT_GLYPH_METRICS: Readonly<GlyphMetrics> = { fontSize: 8, dpi: 203 };
export const DEFAULT_GLYPH_RAMP = ' .:-=+*#%@';

// Midpoint between black and white used by every binary quantizer
export const QUANTIZE_MIDPOINT = 127.5;
