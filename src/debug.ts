import type { ParseOptions } from './types/index.js';

/**
 * Debug logging is on when requested explicitly, or through
 * CONDEXPR_DEBUG=true (or 1) when the caller says nothing.
 */
export function isDebugEnabled(options?: ParseOptions): boolean {
  if (options?.debug !== undefined) {
    return options.debug;
  }
  const env = process.env.CONDEXPR_DEBUG;
  return env === 'true' || env === '1';
}

/**
 * Log a message if debug is enabled
 */
export function debugLog(enabled: boolean, message: string): void {
  if (enabled) {
    console.log(`[condexpr] ${message}`);
  }
}
