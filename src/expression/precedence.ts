import { TokenType } from './types.js';

/**
 * Binding power of operators, lowest to highest.
 * A higher value binds tighter.
 */
export enum Precedence {
  LOWEST = 1,
  OR, // OR
  AND, // AND
  NOT, // NOT
  EQUALS, // = <>
  BETWEEN, // BETWEEN
  COMPARE, // < <= > >=
  CALL, // fn(x)
}

const PRECEDENCES: ReadonlyMap<TokenType, Precedence> = new Map([
  [TokenType.EQ, Precedence.EQUALS],
  [TokenType.NOT_EQ, Precedence.EQUALS],
  [TokenType.BETWEEN, Precedence.BETWEEN],
  [TokenType.LT, Precedence.COMPARE],
  [TokenType.GT, Precedence.COMPARE],
  [TokenType.LTE, Precedence.COMPARE],
  [TokenType.GTE, Precedence.COMPARE],
  [TokenType.AND, Precedence.AND],
  [TokenType.OR, Precedence.OR],
  [TokenType.LPAREN, Precedence.CALL],
]);

/**
 * Look up the infix binding power of a token type.
 * Types that never continue an expression get LOWEST.
 */
export function precedenceOf(type: TokenType): Precedence {
  return PRECEDENCES.get(type) ?? Precedence.LOWEST;
}
