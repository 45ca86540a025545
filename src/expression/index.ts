export { TokenType, ParseError } from './types.js';
export type {
  Token,
  TokenSource,
  ASTNode,
  IdentifierNode,
  PrefixExpressionNode,
  InfixExpressionNode,
  BetweenExpressionNode,
  CallExpressionNode,
  ExpressionNode,
  ExpressionStatement,
  DynamoExpression,
  PrefixOperator,
  InfixOperator,
  Expression,
} from './types.js';

export { Lexer } from './lexer.js';
export { Parser } from './parser.js';
export { Diagnostics } from './diagnostics.js';
export { Precedence, precedenceOf } from './precedence.js';
export { format, formatExpression } from './printer.js';
export { parseExpression, compile } from './compile.js';
export type { ParseResult } from './compile.js';
