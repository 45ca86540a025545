// Main entry point for condexpr

export {
  parseExpression,
  compile,
  format,
  formatExpression,
  Lexer,
  Parser,
  Diagnostics,
  Precedence,
  precedenceOf,
  ParseError,
  TokenType,
} from './expression/index.js';
export type {
  ParseResult,
  Token,
  TokenSource,
  ExpressionNode,
  IdentifierNode,
  PrefixExpressionNode,
  InfixExpressionNode,
  BetweenExpressionNode,
  CallExpressionNode,
  ExpressionStatement,
  DynamoExpression,
  PrefixOperator,
  InfixOperator,
  Expression,
} from './expression/index.js';

export type { ParseOptions } from './types/index.js';
