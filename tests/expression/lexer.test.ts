import { describe, it, expect } from 'vitest';
import { Lexer } from '../../src/expression/lexer';
import { TokenType, Token } from '../../src/expression/types';

// Drain a lexer up to and including the first EOF
function tokenize(source: string): Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  let token: Token;
  do {
    token = lexer.nextToken();
    tokens.push(token);
  } while (token.type !== TokenType.EOF);
  return tokens;
}

const types = (source: string): TokenType[] => tokenize(source).map((t) => t.type);

describe('Lexer', () => {
  describe('basic tokenization', () => {
    it('should tokenize empty input', () => {
      expect(tokenize('')).toEqual([
        { type: TokenType.EOF, literal: '', position: 0 },
      ]);
    });

    it('should tokenize whitespace-only input', () => {
      expect(types('   \t\n  ')).toEqual([TokenType.EOF]);
    });

    it('should tokenize single identifier', () => {
      expect(tokenize('status')).toEqual([
        { type: TokenType.IDENT, literal: 'status', position: 0 },
        { type: TokenType.EOF, literal: '', position: 6 },
      ]);
    });

    it('should keep returning EOF once exhausted', () => {
      const lexer = new Lexer('a');
      expect(lexer.nextToken().type).toBe(TokenType.IDENT);
      expect(lexer.nextToken().type).toBe(TokenType.EOF);
      expect(lexer.nextToken().type).toBe(TokenType.EOF);
      expect(lexer.nextToken().type).toBe(TokenType.EOF);
    });
  });

  describe('identifiers', () => {
    it('should tokenize attribute name placeholders', () => {
      expect(tokenize('#name')[0]).toEqual({
        type: TokenType.IDENT,
        literal: '#name',
        position: 0,
      });
    });

    it('should tokenize value placeholders', () => {
      expect(tokenize(':val')[0].literal).toBe(':val');
    });

    it('should tokenize document paths as one identifier', () => {
      expect(tokenize('info.tags[0].name')[0]).toEqual({
        type: TokenType.IDENT,
        literal: 'info.tags[0].name',
        position: 0,
      });
    });

    it('should tokenize non-ASCII attribute names', () => {
      expect(tokenize('café = :v')).toEqual([
        { type: TokenType.IDENT, literal: 'café', position: 0 },
        { type: TokenType.EQ, literal: '=', position: 5 },
        { type: TokenType.IDENT, literal: ':v', position: 7 },
        { type: TokenType.EOF, literal: '', position: 9 },
      ]);
    });

    it('should tokenize names in non-Latin scripts', () => {
      expect(tokenize('名前.番号')[0]).toEqual({
        type: TokenType.IDENT,
        literal: '名前.番号',
        position: 0,
      });
    });

    it('should tokenize numbers as identifiers', () => {
      expect(tokenize('-12.5')[0]).toEqual({
        type: TokenType.IDENT,
        literal: '-12.5',
        position: 0,
      });
    });

    it('should tokenize double-quoted strings without the quotes', () => {
      expect(tokenize('"hello world"')[0]).toEqual({
        type: TokenType.IDENT,
        literal: 'hello world',
        position: 0,
      });
    });

    it('should tokenize single-quoted strings without the quotes', () => {
      expect(tokenize("'x'")[0].literal).toBe('x');
    });

    it('should mark unterminated strings as illegal', () => {
      expect(tokenize('a = "oops')).toEqual([
        { type: TokenType.IDENT, literal: 'a', position: 0 },
        { type: TokenType.EQ, literal: '=', position: 2 },
        { type: TokenType.ILLEGAL, literal: '"oops', position: 4 },
        { type: TokenType.EOF, literal: '', position: 9 },
      ]);
    });
  });

  describe('keyword tokenization', () => {
    it('should tokenize all keywords', () => {
      expect(types('AND OR NOT BETWEEN')).toEqual([
        TokenType.AND,
        TokenType.OR,
        TokenType.NOT,
        TokenType.BETWEEN,
        TokenType.EOF,
      ]);
    });

    it('should match keywords case-insensitively', () => {
      expect(types('and Or nOt between')).toEqual([
        TokenType.AND,
        TokenType.OR,
        TokenType.NOT,
        TokenType.BETWEEN,
        TokenType.EOF,
      ]);
    });

    it('should preserve original keyword spelling in literal', () => {
      expect(tokenize('Between')[0]).toEqual({
        type: TokenType.BETWEEN,
        literal: 'Between',
        position: 0,
      });
    });

    it('should not treat keyword prefixes as keywords', () => {
      expect(tokenize('android')[0].type).toBe(TokenType.IDENT);
      expect(tokenize('order')[0].type).toBe(TokenType.IDENT);
      expect(tokenize('constructor')[0].type).toBe(TokenType.IDENT);
    });
  });

  describe('operators', () => {
    it('should tokenize comparison operators', () => {
      expect(types('= <> < <= > >=')).toEqual([
        TokenType.EQ,
        TokenType.NOT_EQ,
        TokenType.LT,
        TokenType.LTE,
        TokenType.GT,
        TokenType.GTE,
        TokenType.EOF,
      ]);
    });

    it('should tokenize operators without surrounding whitespace', () => {
      expect(tokenize('a<=b')).toEqual([
        { type: TokenType.IDENT, literal: 'a', position: 0 },
        { type: TokenType.LTE, literal: '<=', position: 1 },
        { type: TokenType.IDENT, literal: 'b', position: 3 },
        { type: TokenType.EOF, literal: '', position: 4 },
      ]);
    });

    it('should tokenize parentheses and commas', () => {
      expect(types('f(a, b)')).toEqual([
        TokenType.IDENT,
        TokenType.LPAREN,
        TokenType.IDENT,
        TokenType.COMMA,
        TokenType.IDENT,
        TokenType.RPAREN,
        TokenType.EOF,
      ]);
    });

    it('should keep characters outside the BMP in one illegal token', () => {
      expect(tokenize('a 😀')).toEqual([
        { type: TokenType.IDENT, literal: 'a', position: 0 },
        { type: TokenType.ILLEGAL, literal: '😀', position: 2 },
        { type: TokenType.EOF, literal: '', position: 4 },
      ]);
    });

    it('should mark unknown characters as illegal', () => {
      expect(tokenize('a ! b')[1]).toEqual({
        type: TokenType.ILLEGAL,
        literal: '!',
        position: 2,
      });
    });
  });

  describe('complex expressions', () => {
    it('should tokenize a BETWEEN condition', () => {
      expect(types('#p BETWEEN :lo AND :hi')).toEqual([
        TokenType.IDENT,
        TokenType.BETWEEN,
        TokenType.IDENT,
        TokenType.AND,
        TokenType.IDENT,
        TokenType.EOF,
      ]);
    });

    it('should track token positions', () => {
      const positions = tokenize('NOT (a <> :b)').map((t) => t.position);
      expect(positions).toEqual([0, 4, 5, 7, 10, 12, 13]);
    });
  });

  describe('getTokens', () => {
    it('should return a copy of all tokens', () => {
      const lexer = new Lexer('a = b');
      const tokens = lexer.getTokens();
      tokens.pop();
      expect(lexer.getTokens()).toHaveLength(4);
    });
  });
});
