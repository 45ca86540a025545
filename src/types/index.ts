export type { Expression, TokenSource } from '../expression/types.js';

/**
 * Options for parseExpression and compile
 */
export interface ParseOptions {
  /**
   * Enable debug logging.
   * Falls back to the CONDEXPR_DEBUG environment variable when unset.
   */
  debug?: boolean;
}
