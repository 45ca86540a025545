import { DynamoExpression, Expression, ExpressionNode, ParseError, TokenSource } from './types.js';
import type { ParseOptions } from '../types/index.js';
import { Lexer } from './lexer.js';
import { Parser } from './parser.js';
import { format } from './printer.js';
import { debugLog, isDebugEnabled } from '../debug.js';

/**
 * Outcome of a parse. `ast` may contain absent subtrees when `errors`
 * is non-empty and must not be evaluated in that case.
 */
export interface ParseResult {
  readonly ast: DynamoExpression;
  readonly errors: readonly string[];
}

/**
 * Parse a source string or token stream. Never throws; problems are
 * reported through `errors`.
 */
export function parseExpression(
  input: string | TokenSource,
  options?: ParseOptions
): ParseResult {
  const debug = isDebugEnabled(options);
  let tokens: TokenSource;

  if (typeof input === 'string') {
    const lexer = new Lexer(input);
    debugLog(debug, `Tokens: ${lexer.getTokens().map((t) => t.type).join(' ')}`);
    tokens = lexer;
  } else {
    tokens = input;
  }

  const parser = new Parser(tokens);
  const ast = parser.parseDynamoExpression();
  const errors = parser.errors();

  for (const error of errors) {
    debugLog(debug, `Parse error: ${error}`);
  }
  if (errors.length === 0) {
    debugLog(debug, `Parsed: ${format(ast)}`);
  }

  return { ast, errors };
}

/**
 * A compiled expression implementation
 */
class CompiledExpression implements Expression {
  readonly source: string;
  readonly ast: DynamoExpression;
  readonly root: ExpressionNode | null;

  constructor(source: string, ast: DynamoExpression) {
    this.source = source;
    this.ast = ast;
    this.root = ast.statement?.expression ?? null;
  }

  toString(): string {
    return format(this.ast);
  }
}

/**
 * Compile a source string into an Expression object.
 *
 * @param source - The expression source string
 * @returns A compiled Expression whose AST is complete
 * @throws ParseError listing every recorded error if the expression is invalid
 *
 * @example
 * ```ts
 * const expr = compile('size(tags) > :n AND NOT #s = :archived');
 * expr.toString(); // '((size(tags) > :n) AND (NOT (#s = :archived)))'
 * ```
 */
export function compile(source: string, options?: ParseOptions): Expression {
  const trimmed = source.trim();
  const { ast, errors } = parseExpression(trimmed, options);

  if (errors.length > 0) {
    throw new ParseError(errors, trimmed);
  }

  return new CompiledExpression(trimmed, ast);
}
