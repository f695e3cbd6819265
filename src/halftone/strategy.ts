// Dither strategies: a closed set of named algorithms behind one interface.
// Options are resolved and validated when a strategy is created, so a
// strategy that exists can always run.

import { getDefaultGlyphFont, loadBitmapFontFile } from './bitmap-font.ts';
import { errorMessage } from '../utils/error.ts';
import { ConfigurationError, ERROR_MESSAGES } from './errors.ts';
import { applyErrorDiffusion } from './error-diffusion.ts';
import { applyGlyphHalftone, createGlyphRamp, type GlyphRamp } from './glyph.ts';
import { getDiffusionKernel, isDiffusionKernelName, validateKernel } from './kernels.ts';
import { applyRiemersmaDither, resolveRiemersmaOptions } from './riemersma.ts';
import {
  applyThresholdDither,
  bayerMatrix,
  clusterMatrix,
  flatMatrix,
  loadThresholdMatrixFromPngSync,
} from './threshold.ts';
import {
  DEFAULT_MATRIX_ORDER,
  type BinaryImage,
  type DiffusionKernel,
  type DitherOptions,
  type DitherStrategyName,
  type GrayscaleImage,
  type RiemersmaOptions,
  type ThresholdMatrix,
} from './types.ts';
import { applyMixingPlans, buildYliluomaPlan, type MixingPlan } from './yliluoma.ts';

export interface DitherStrategy {
  readonly name: DitherStrategyName;
  dither(image: GrayscaleImage): BinaryImage;
}

export const DITHER_STRATEGIES: readonly DitherStrategyName[] = [
  'threshold',
  'bayer',
  'cluster',
  'yliluoma',
  'matrix',
  'floyd-steinberg',
  'atkinson',
  'jarvis-judice-ninke',
  'stucki',
  'burkes',
  'sierra3',
  'sierra2',
  'sierra-2-4a',
  'ascii',
  'riemersma',
  'none',
  'floyd',
];

export function isDitherStrategyName(value: string): value is DitherStrategyName {
  return DITHER_STRATEGIES.some(name => name === value);
}

/**
 * Validate a strategy name from untrusted input (config file, CLI, env).
 */
export function resolveStrategyName(value: string): DitherStrategyName {
  if (!isDitherStrategyName(value)) {
    throw new ConfigurationError(ERROR_MESSAGES.unknownStrategy(value, DITHER_STRATEGIES), 'strategy');
  }
  return value;
}

export class OrderedDitherStrategy implements DitherStrategy {
  constructor(
    readonly name: DitherStrategyName,
    readonly matrix: ThresholdMatrix,
  ) {}

  dither(image: GrayscaleImage): BinaryImage {
    return applyThresholdDither(image, this.matrix);
  }
}

export class YliluomaDitherStrategy implements DitherStrategy {
  readonly name = 'yliluoma';
  private readonly _plans: MixingPlan[];

  constructor(readonly matrix: ThresholdMatrix) {
    this._plans = buildYliluomaPlan(matrix);
  }

  dither(image: GrayscaleImage): BinaryImage {
    return applyMixingPlans(image, this.matrix, this._plans);
  }
}

export class ErrorDiffusionStrategy implements DitherStrategy {
  constructor(
    readonly name: DitherStrategyName,
    readonly kernel: DiffusionKernel,
  ) {
    validateKernel(kernel);
  }

  dither(image: GrayscaleImage): BinaryImage {
    return applyErrorDiffusion(image, this.kernel);
  }
}

export class RiemersmaStrategy implements DitherStrategy {
  readonly name = 'riemersma';
  readonly options: RiemersmaOptions;

  constructor(options: Partial<RiemersmaOptions> = {}) {
    this.options = resolveRiemersmaOptions(options);
  }

  dither(image: GrayscaleImage): BinaryImage {
    return applyRiemersmaDither(image, this.options);
  }
}

export class GlyphHalftoneStrategy implements DitherStrategy {
  readonly name = 'ascii';

  constructor(readonly ramp: GlyphRamp) {}

  dither(image: GrayscaleImage): BinaryImage {
    return applyGlyphHalftone(image, this.ramp);
  }
}

// File loaders report I/O and decode failures as configuration errors
function loadOption<T>(option: string, load: () => T): T {
  try {
    return load();
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(errorMessage(error), option);
  }
}

function resolveMatrixOrder(options: DitherOptions): number {
  return options.matrixOrder ?? DEFAULT_MATRIX_ORDER;
}

/**
 * Build a reusable strategy from options. Every option is checked here:
 * unknown names, bad matrix orders, missing files and invalid Riemersma
 * or glyph settings all throw ConfigurationError.
 */
export function createDitherStrategy(options: DitherOptions): DitherStrategy {
  const name = resolveStrategyName(options.strategy);

  switch (name) {
    case 'threshold':
    case 'none':
      return new OrderedDitherStrategy(name, flatMatrix());
    case 'bayer':
      return new OrderedDitherStrategy(name, bayerMatrix(resolveMatrixOrder(options)));
    case 'cluster':
      return new OrderedDitherStrategy(name, clusterMatrix(resolveMatrixOrder(options)));
    case 'matrix': {
      if (!options.matrixFile) {
        throw new ConfigurationError('the matrix strategy needs a threshold matrix PNG', 'matrixFile');
      }
      const file = options.matrixFile;
      return new OrderedDitherStrategy(name, loadOption('matrixFile', () => loadThresholdMatrixFromPngSync(file)));
    }
    case 'yliluoma':
      return new YliluomaDitherStrategy(bayerMatrix(resolveMatrixOrder(options)));
    case 'floyd':
      return new ErrorDiffusionStrategy(name, getDiffusionKernel('floyd-steinberg'));
    case 'riemersma':
      return new RiemersmaStrategy(options.riemersma);
    case 'ascii': {
      const glyph = options.glyph ?? {};
      const fontFile = glyph.fontFile;
      const font = fontFile ? loadOption('fontFile', () => loadBitmapFontFile(fontFile)) : getDefaultGlyphFont();
      return new GlyphHalftoneStrategy(createGlyphRamp(font, glyph.ramp, glyph.metrics));
    }
    default:
      if (isDiffusionKernelName(name)) {
        return new ErrorDiffusionStrategy(name, getDiffusionKernel(name));
      }
      throw new ConfigurationError(ERROR_MESSAGES.unknownStrategy(name, DITHER_STRATEGIES), 'strategy');
  }
}
