// Named error-diffusion kernels
//
// Each table lists [dx, dy, weight] with weights over `divisor`. Offsets
// only reach pixels that raster order has not visited yet.

import { ConfigurationError, ERROR_MESSAGES, invariant } from './errors.ts';
import type { DiffusionKernel, DiffusionKernelName } from './types.ts';

/**
 *       *  7
 *    3  5  1      (1/16)
 */
const FLOYD_STEINBERG: DiffusionKernel = {
  name: 'floyd-steinberg',
  divisor: 16,
  offsets: [
    [1, 0, 7],
    [-1, 1, 3], [0, 1, 5], [1, 1, 1],
  ],
};

/**
 *       *  1  1
 *    1  1  1
 *       1         (1/8, only 6/8 of the error is kept)
 */
const ATKINSON: DiffusionKernel = {
  name: 'atkinson',
  divisor: 8,
  offsets: [
    [1, 0, 1], [2, 0, 1],
    [-1, 1, 1], [0, 1, 1], [1, 1, 1],
    [0, 2, 1],
  ],
};

const JARVIS_JUDICE_NINKE: DiffusionKernel = {
  name: 'jarvis-judice-ninke',
  divisor: 48,
  offsets: [
    [1, 0, 7], [2, 0, 5],
    [-2, 1, 3], [-1, 1, 5], [0, 1, 7], [1, 1, 5], [2, 1, 3],
    [-2, 2, 1], [-1, 2, 3], [0, 2, 5], [1, 2, 3], [2, 2, 1],
  ],
};

const STUCKI: DiffusionKernel = {
  name: 'stucki',
  divisor: 42,
  offsets: [
    [1, 0, 8], [2, 0, 4],
    [-2, 1, 2], [-1, 1, 4], [0, 1, 8], [1, 1, 4], [2, 1, 2],
    [-2, 2, 1], [-1, 2, 2], [0, 2, 4], [1, 2, 2], [2, 2, 1],
  ],
};

const BURKES: DiffusionKernel = {
  name: 'burkes',
  divisor: 32,
  offsets: [
    [1, 0, 8], [2, 0, 4],
    [-2, 1, 2], [-1, 1, 4], [0, 1, 8], [1, 1, 4], [2, 1, 2],
  ],
};

const SIERRA3: DiffusionKernel = {
  name: 'sierra3',
  divisor: 32,
  offsets: [
    [1, 0, 5], [2, 0, 3],
    [-2, 1, 2], [-1, 1, 4], [0, 1, 5], [1, 1, 4], [2, 1, 2],
    [-1, 2, 2], [0, 2, 3], [1, 2, 2],
  ],
};

const SIERRA2: DiffusionKernel = {
  name: 'sierra2',
  divisor: 16,
  offsets: [
    [1, 0, 4], [2, 0, 3],
    [-2, 1, 1], [-1, 1, 2], [0, 1, 3], [1, 1, 2], [2, 1, 1],
  ],
};

// "Sierra Lite"
const SIERRA_2_4A: DiffusionKernel = {
  name: 'sierra-2-4a',
  divisor: 4,
  offsets: [
    [1, 0, 2],
    [-1, 1, 1], [0, 1, 1],
  ],
};

export const DIFFUSION_KERNELS: Readonly<Record<DiffusionKernelName, DiffusionKernel>> = {
  'floyd-steinberg': FLOYD_STEINBERG,
  'atkinson': ATKINSON,
  'jarvis-judice-ninke': JARVIS_JUDICE_NINKE,
  'stucki': STUCKI,
  'burkes': BURKES,
  'sierra3': SIERRA3,
  'sierra2': SIERRA2,
  'sierra-2-4a': SIERRA_2_4A,
};

export const DIFFUSION_KERNEL_NAMES = Object.keys(DIFFUSION_KERNELS).filter(isDiffusionKernelName);

export function isDiffusionKernelName(name: string): name is DiffusionKernelName {
  return Object.prototype.hasOwnProperty.call(DIFFUSION_KERNELS, name);
}

/**
 * Look up a kernel by name. Unknown names are rejected before any pixel
 * work starts.
 */
export function getDiffusionKernel(name: string): DiffusionKernel {
  if (!isDiffusionKernelName(name)) {
    throw new ConfigurationError(ERROR_MESSAGES.unknownKernel(name, DIFFUSION_KERNEL_NAMES), 'kernel');
  }
  return DIFFUSION_KERNELS[name];
}

/**
 * Assert that every offset targets a pixel raster order has not reached yet,
 * and that the kernel never spreads more error than it takes.
 */
export function validateKernel(kernel: DiffusionKernel): void {
  invariant(kernel.divisor > 0, () => `kernel ${kernel.name}: divisor must be positive`);
  let total = 0;
  for (const [dx, dy, weight] of kernel.offsets) {
    invariant(
      dy > 0 || (dy === 0 && dx > 0),
      () => `kernel ${kernel.name}: offset (${dx}, ${dy}) points at an already visited pixel`
    );
    total += weight;
  }
  invariant(total <= kernel.divisor, () => `kernel ${kernel.name}: weights sum to ${total}/${kernel.divisor}`);
}
