import { TokenType, Token, TokenSource } from './types.js';

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['not', TokenType.NOT],
  ['between', TokenType.BETWEEN],
]);

const IDENT_CHAR = /[\p{L}\p{M}\p{N}_#:.\[\]-]/u;

/**
 * Lexer for condition expressions.
 * Tokenizes the whole input up front and hands tokens out one at a time.
 */
export class Lexer implements TokenSource {
  private readonly source: string;
  private position: number = 0;
  private tokens: Token[] = [];
  private current: number = 0;

  constructor(source: string) {
    this.source = source;
    this.tokenize();
  }

  /**
   * Consume and return the current token.
   * Keeps returning EOF once the input is exhausted.
   */
  nextToken(): Token {
    const token = this.tokens[this.current];
    if (token.type !== TokenType.EOF) {
      this.current++;
    }
    return token;
  }

  /**
   * Tokenize the entire source string
   */
  private tokenize(): void {
    while (this.position < this.source.length) {
      this.skipWhitespace();
      if (this.position >= this.source.length) break;

      const char = this.charAt(this.position);
      const next = this.source[this.position + char.length];

      switch (char) {
        case '(':
          this.addSymbol(TokenType.LPAREN, char);
          break;
        case ')':
          this.addSymbol(TokenType.RPAREN, char);
          break;
        case ',':
          this.addSymbol(TokenType.COMMA, char);
          break;
        case '=':
          this.addSymbol(TokenType.EQ, char);
          break;
        case '<':
          if (next === '>') {
            this.addSymbol(TokenType.NOT_EQ, '<>');
          } else if (next === '=') {
            this.addSymbol(TokenType.LTE, '<=');
          } else {
            this.addSymbol(TokenType.LT, char);
          }
          break;
        case '>':
          if (next === '=') {
            this.addSymbol(TokenType.GTE, '>=');
          } else {
            this.addSymbol(TokenType.GT, char);
          }
          break;
        case '"':
        case "'":
          this.scanString(char);
          break;
        default:
          if (IDENT_CHAR.test(char)) {
            this.scanIdentifierOrKeyword();
          } else {
            this.addSymbol(TokenType.ILLEGAL, char);
          }
      }
    }

    this.tokens.push({
      type: TokenType.EOF,
      literal: '',
      position: this.source.length,
    });
  }

  /**
   * Skip whitespace characters
   */
  private skipWhitespace(): void {
    while (
      this.position < this.source.length &&
      /\s/.test(this.source[this.position])
    ) {
      this.position++;
    }
  }

  /**
   * Scan a quoted string. The literal is the text between the quotes.
   */
  private scanString(quote: string): void {
    const start = this.position;
    const end = this.source.indexOf(quote, start + 1);

    if (end === -1) {
      this.tokens.push({
        type: TokenType.ILLEGAL,
        literal: this.source.slice(start),
        position: start,
      });
      this.position = this.source.length;
      return;
    }

    this.tokens.push({
      type: TokenType.IDENT,
      literal: this.source.slice(start + 1, end),
      position: start,
    });
    this.position = end + 1;
  }

  /**
   * Scan an identifier or keyword token
   */
  private scanIdentifierOrKeyword(): void {
    const start = this.position;

    while (this.position < this.source.length) {
      const char = this.charAt(this.position);
      if (!IDENT_CHAR.test(char)) break;
      this.position += char.length;
    }

    const literal = this.source.slice(start, this.position);

    // Keywords are case-insensitive
    const type = KEYWORDS.get(literal.toLowerCase()) ?? TokenType.IDENT;

    this.tokens.push({ type, literal, position: start });
  }

  /**
   * The whole code point at `position`, so surrogate pairs stay together
   */
  private charAt(position: number): string {
    const codePoint = this.source.codePointAt(position);
    return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
  }

  /**
   * Add a fixed-spelling token and move past it
   */
  private addSymbol(type: TokenType, literal: string): void {
    this.tokens.push({
      type,
      literal,
      position: this.position,
    });
    this.position += literal.length;
  }

  /**
   * Get all tokens (for debugging)
   */
  getTokens(): Token[] {
    return [...this.tokens];
  }
}
