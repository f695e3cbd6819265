// Centralized external dependencies
// All third-party imports go here to avoid scattered external imports

// Image decoding (threshold matrices stored as grayscale PNG)
export { decode as decodePng } from 'fast-png';
