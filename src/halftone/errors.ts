// Error types for the halftoning engine

/**
 * Invalid caller input or configuration. Always raised before any pixel is
 * processed.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly option?: string
  ) {
    super(option !== undefined ? `${option}: ${message}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Internal consistency failure. Unreachable in a correct build; never
 * recoverable.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export function invariant(condition: boolean, message: string | (() => string)): asserts condition {
  if (!condition) {
    throw new InvariantViolation(typeof message === 'function' ? message() : message);
  }
}

export const ERROR_MESSAGES = {
  invalidDimension: (name: string, value: number) =>
    `${name} must be a positive integer, got ${value}`,

  bufferLength: (expected: number, actual: number) =>
    `pixel buffer holds ${actual} values, expected ${expected}`,

  unknownStrategy: (name: string, known: readonly string[]) =>
    `unknown dither strategy "${name}" (expected one of: ${known.join(', ')})`,

  unknownKernel: (name: string, known: readonly string[]) =>
    `unknown diffusion kernel "${name}" (expected one of: ${known.join(', ')})`,

  historyDepth: (value: number) =>
    `history depth must be an integer >= 2, got ${value}`,

  decayRatio: (value: number) =>
    `decay ratio must be in (0, 1], got ${value}`,

  matrixOrder: (value: number) =>
    `matrix order must be a power of two between 2 and 64, got ${value}`,

  matrixNotSquare: (width: number, height: number) =>
    `threshold matrix must be square, got ${width}x${height}`,

  missingGlyph: (char: string) =>
    `glyph "${char}" is not present in the font`,

  shortRamp: (length: number) =>
    `glyph ramp needs at least 2 glyphs, got ${length}`,

  dimensionMismatch: (strategy: string, expected: string, actual: string) =>
    `strategy "${strategy}" produced ${actual} output for ${expected} input`,
};
