// Error utility functions

/**
 * Message text of a caught value, whatever was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
