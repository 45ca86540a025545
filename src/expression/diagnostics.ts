import { TokenType, Token } from './types.js';

/**
 * Ordered, append-only list of parse errors.
 * One instance is shared by everything taking part in a single parse.
 */
export class Diagnostics {
  private readonly messages: string[] = [];

  /**
   * Record that a token cannot start an expression
   */
  noPrefixParseFn(type: TokenType): void {
    this.messages.push(`no prefix parse function for ${type} found`);
  }

  /**
   * Record that a required token was missing
   */
  unexpectedToken(expected: TokenType, actual: Token): void {
    this.messages.push(
      `expected next token to be ${expected}, got ${actual.type} instead`
    );
  }

  get count(): number {
    return this.messages.length;
  }

  list(): readonly string[] {
    return [...this.messages];
  }
}
