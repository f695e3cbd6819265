/**
 * Environment variable access.
 * Reads process.env fresh on every call so tests and late callers can
 * change variables after the module has loaded.
 *
 * Use Env.get() instead of process.env throughout the codebase.
 */

export class Env {
  /**
   * Get env var value (fresh value each call).
   * Returns undefined if the var is unset.
   */
  static get(name: string): string | undefined {
    return process.env[name];
  }

  /**
   * Get names of all set env vars, optionally filtered by prefix.
   */
  static keys(prefix = ''): string[] {
    return Object.keys(process.env)
      .filter(name => name.startsWith(prefix) && process.env[name] !== undefined)
      .sort();
  }
}
