export { Lexer } from './lexer/lexer';
export { Token, TokenType, KEYWORDS } from './lexer/tokens';
export {
  Parser,
  ParseError,
  Precedence,
  PrefixParseFn,
  InfixParseFn,
  formatParseError,
  precedenceOf,
  MAX_NESTING_DEPTH,
} from './parser/parser';
export * as AST from './parser/ast';
export {
  Evaluator,
  EvaluatorOptions,
  InitializationError,
  ProgramResult,
  DEFAULT_MAX_DEPTH,
} from './runtime/evaluator';
export { Environment } from './runtime/environment';
export {
  Value,
  PlainValue,
  IntegerValue,
  BooleanValue,
  StringValue,
  FunctionValue,
  NoneValue,
  ReturnSignal,
  ErrorValue,
  TRUE,
  FALSE,
  NONE,
  integer,
  string,
  booleanValue,
  functionValue,
  returnSignal,
  error,
  isError,
  isReturn,
  isAbrupt,
  isTrue,
  isFalse,
  valueToString,
  describeValue,
  valuesEqual,
} from './runtime/values';
export { TernConfig, loadConfig, loadConfigForScript } from './runtime/config';

import { Lexer } from './lexer/lexer';
import { Parser, ParseError } from './parser/parser';
import * as AST from './parser/ast';
import { Evaluator, EvaluatorOptions, ProgramResult } from './runtime/evaluator';
import { Environment } from './runtime/environment';

/**
 * Parse a Tern source string into an AST. The tree must not be evaluated
 * when `errors` is non-empty.
 */
export function parse(source: string): { program: AST.Program; errors: readonly ParseError[] } {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser();
  const program = parser.parse(tokens);
  return { program, errors: parser.errors };
}

/**
 * Execute a Tern source string. Throws InitializationError if it does not
 * parse; runtime failures come back as an Error value.
 */
export function execute(
  source: string,
  env: Environment = new Environment(),
  options: EvaluatorOptions = {},
): ProgramResult {
  return Evaluator.fromSource(source, options).run(env);
}
