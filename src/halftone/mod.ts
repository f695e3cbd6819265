// Halftoning for thermal label printers
// Re-exports all halftone functionality

// Types and constants
export type {
  BinaryImage,
  DiffusionKernel,
  DiffusionKernelName,
  DitherOptions,
  DitherStrategyName,
  GlyphMetrics,
  GrayscaleImage,
  OrderedStrategyName,
  RiemersmaOptions,
  ThresholdMatrix,
} from './types.ts';
export {
  DEFAULT_GLYPH_METRICS,
  DEFAULT_GLYPH_RAMP,
  DEFAULT_MATRIX_ORDER,
  DEFAULT_RIEMERSMA,
  QUANTIZE_MIDPOINT,
} from './types.ts';

// Errors
export { ConfigurationError, ERROR_MESSAGES, InvariantViolation, invariant } from './errors.ts';

// Images and the packed 1-bit raster
export {
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
} from './image.ts';

// Pre-processing
export {
  adjustBrightness,
  adjustContrast,
  DEFAULT_BRIGHTNESS,
  DEFAULT_CONTRAST,
  fitToCanvas,
  prepareImage,
  rotate90,
} from './adjust.ts';
export type { FitOptions, PrepareOptions } from './adjust.ts';
export { resampleArea } from './resample.ts';

// Hilbert curve
export { hilbertD2xy, hilbertOrder, hilbertPath } from './hilbert.ts';
export type { HilbertPoint } from './hilbert.ts';

// Ordered dithering (flat, Bayer, clustered dot, custom matrices)
export {
  applyThresholdDither,
  bayerIndices,
  bayerMatrix,
  clearThresholdMatrixCache,
  clusterMatrix,
  createThresholdMatrix,
  flatMatrix,
  loadThresholdMatrixFromPng,
  loadThresholdMatrixFromPngSync,
} from './threshold.ts';
export {
  applyMixingPlans,
  applyYliluomaDither,
  BLACK_WHITE_PALETTE,
  buildYliluomaPlan,
  deviseMixingPlan,
} from './yliluoma.ts';
export type { MixingPlan } from './yliluoma.ts';

// Error diffusion
export { applyErrorDiffusion, clamp255 } from './error-diffusion.ts';
export {
  DIFFUSION_KERNEL_NAMES,
  DIFFUSION_KERNELS,
  getDiffusionKernel,
  isDiffusionKernelName,
  validateKernel,
} from './kernels.ts';

// Riemersma
export {
  applyRiemersmaDither,
  buildRiemersmaWeights,
  ErrorHistory,
  resolveRiemersmaOptions,
} from './riemersma.ts';

// Glyph halftone
export {
  applyGlyphHalftone,
  createDefaultGlyphRamp,
  createGlyphRamp,
  glyphScaleFor,
  selectGlyphIndex,
} from './glyph.ts';
export type { Glyph, GlyphRamp } from './glyph.ts';
export { getDefaultGlyphFont, loadBitmapFontFile, parseBitmapFontJson, parsePSF2 } from './bitmap-font.ts';
export type { BitmapFont } from './bitmap-font.ts';

// Strategy selection and dispatch
export {
  createDitherStrategy,
  DITHER_STRATEGIES,
  ErrorDiffusionStrategy,
  GlyphHalftoneStrategy,
  isDitherStrategyName,
  OrderedDitherStrategy,
  resolveStrategyName,
  RiemersmaStrategy,
  YliluomaDitherStrategy,
} from './strategy.ts';
export type { DitherStrategy } from './strategy.ts';
export { ditherImage } from './apply.ts';
