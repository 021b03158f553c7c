import * as AST from '../parser/ast';
import { Lexer } from '../lexer/lexer';
import { Parser, formatParseError } from '../parser/parser';
import { Environment } from './environment';
import {
  Value,
  PlainValue,
  ErrorValue,
  IntegerValue,
  BooleanValue,
  NONE,
  integer,
  string,
  booleanValue,
  functionValue,
  returnSignal,
  error,
  isAbrupt,
  isTrue,
  valuesEqual,
  valueToString,
  describeValue,
} from './values';

export const DEFAULT_MAX_DEPTH = 200;

/** What a whole program evaluates to: return signals are unwrapped at the top. */
export type ProgramResult = PlainValue | ErrorValue;

export interface EvaluatorOptions {
  trace?: boolean;
  /** Deepest allowed function call nesting. Defaults to DEFAULT_MAX_DEPTH. */
  maxDepth?: number;
  /** Node evaluations allowed per run. Unlimited when absent. */
  maxSteps?: number;
}

/**
 * Raised when an evaluator cannot be built: the source did not parse or no
 * tree was supplied. Distinct from runtime errors, which are Error values.
 */
export class InitializationError extends Error {
  constructor(public readonly errors: string[]) {
    super(errors.join('\n'));
    this.name = 'InitializationError';
  }
}

export class Evaluator {
  private readonly program: AST.Program;
  private readonly traceEnabled: boolean;
  private readonly maxDepth: number;
  private readonly maxSteps?: number;
  private depth = 0;
  private steps = 0;

  private constructor(program: AST.Program, options: EvaluatorOptions) {
    this.program = program;
    this.traceEnabled = options.trace ?? false;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxSteps = options.maxSteps;
  }

  static fromSource(source: string, options: EvaluatorOptions = {}): Evaluator {
    const parser = new Parser();
    const program = parser.parse(new Lexer(source).tokenize());
    if (parser.hasErrors()) {
      throw new InitializationError(parser.errors.map(formatParseError));
    }
    return new Evaluator(program, options);
  }

  static fromProgram(program: AST.Program | null | undefined, options: EvaluatorOptions = {}): Evaluator {
    if (!program) {
      throw new InitializationError(['Submitted an empty AST']);
    }
    return new Evaluator(program, options);
  }

  /**
   * Evaluate the program against `env`. Pass the same environment to
   * several runs to keep bindings between them.
   *
   * Nesting that outgrows the host stack before `maxDepth` is reached ends
   * the run with an Error value.
   */
  run(env: Environment = new Environment()): ProgramResult {
    this.depth = 0;
    this.steps = 0;
    try {
      return this.evalProgram(this.program, env);
    } catch (e) {
      if (e instanceof RangeError) {
        return error('maximum evaluation depth exceeded');
      }
      throw e;
    }
  }

  private evaluate(node: AST.Node, env: Environment): Value {
    if (this.maxSteps !== undefined && ++this.steps > this.maxSteps) {
      return error(`step budget of ${this.maxSteps} exhausted`);
    }

    switch (node.type) {
      case 'Program':
        return this.evalProgram(node, env);

      // Statements
      case 'ExpressionStatement':
        return this.evaluate(node.expression, env);
      case 'VarStatement':
        return this.evalVarStatement(node, env);
      case 'ReturnStatement':
        return this.evalReturnStatement(node, env);
      case 'FunctionStatement': {
        const fn = functionValue(node.params.map(p => p.name), node.body, env, node.name.name);
        return env.set(node.name.name, fn);
      }
      case 'BlockStatement':
        return this.evalBlockStatement(node, env);

      // Expressions
      case 'Identifier': {
        const value = env.get(node.name);
        return value ?? error(`cannot resolve identifier: ${node.name}`);
      }
      case 'IntegerLiteral':
        return integer(node.value);
      case 'StringLiteral':
        return string(node.value);
      case 'BooleanLiteral':
        return booleanValue(node.value);
      case 'PrefixExpression':
        return this.evalPrefixExpression(node, env);
      case 'InfixExpression':
        return this.evalInfixExpression(node, env);
      case 'IfExpression':
        return this.evalIfExpression(node, env);
      case 'ForLoop':
        return this.evalForLoop(node, env);
      case 'FunctionCall':
        return this.evalFunctionCall(node, env);
      case 'AnonymousFunction':
        return functionValue(node.params.map(p => p.name), node.body, env);
    }
  }

  // ─── Statements ────────────────────────────────────────

  private evalProgram(program: AST.Program, env: Environment): ProgramResult {
    let result: PlainValue = NONE;
    for (const stmt of program.body) {
      const value = this.evaluate(stmt, env);
      if (value.kind === 'return') return value.value;
      if (value.kind === 'error') return value;
      result = value;
    }
    return result;
  }

  private evalBlockStatement(block: AST.BlockStatement, env: Environment): Value {
    let result: Value = NONE;
    for (const stmt of block.body) {
      result = this.evaluate(stmt, env);
      if (isAbrupt(result)) return result;
    }
    return result;
  }

  private evalVarStatement(node: AST.VarStatement, env: Environment): Value {
    const value = this.evaluate(node.value, env);
    if (isAbrupt(value)) return value;
    this.trace(`var ${node.name.name} = ${valueToString(value)}`);
    return env.set(node.name.name, value);
  }

  private evalReturnStatement(node: AST.ReturnStatement, env: Environment): Value {
    if (!node.value) return returnSignal(NONE);
    const value = this.evaluate(node.value, env);
    if (isAbrupt(value)) return value;
    return returnSignal(value);
  }

  // ─── Operators ─────────────────────────────────────────

  private evalPrefixExpression(node: AST.PrefixExpression, env: Environment): Value {
    const right = this.evaluate(node.right, env);
    if (isAbrupt(right)) return right;

    switch (node.operator) {
      case '!':
        if (right.kind !== 'boolean') {
          return error(`expected boolean operand for '!', got ${describeValue(right)}`);
        }
        return booleanValue(!right.value);
      case '-':
        if (right.kind !== 'integer') {
          return error(`expected integer operand for '-', got ${describeValue(right)}`);
        }
        return integer(-right.value);
      default:
        return error(`unsupported prefix operator: ${node.operator}`);
    }
  }

  private evalInfixExpression(node: AST.InfixExpression, env: Environment): Value {
    const left = this.evaluate(node.left, env);
    if (isAbrupt(left)) return left;

    // The left operand's kind decides which operators are legal
    switch (left.kind) {
      case 'integer':
        return this.evalIntegerInfix(node, left, env);
      case 'boolean':
        return this.evalBooleanInfix(node, left, env);
      default:
        return error(`unsupported left operand for '${node.operator}': ${describeValue(left)}`);
    }
  }

  private evalIntegerInfix(node: AST.InfixExpression, left: IntegerValue, env: Environment): Value {
    const right = this.evaluate(node.right, env);
    if (isAbrupt(right)) return right;
    if (right.kind !== 'integer') {
      return error(`expected integer right operand for '${node.operator}', got ${describeValue(right)}`);
    }

    const a = left.value;
    const b = right.value;
    switch (node.operator) {
      case '+': return integer(a + b);
      case '-': return integer(a - b);
      case '*': return integer(a * b);
      case '/':
        if (b === 0n) return error('division by zero');
        return integer(a / b);
      case '<': return booleanValue(a < b);
      case '>': return booleanValue(a > b);
      case '==': return booleanValue(a === b);
      case '!=': return booleanValue(a !== b);
      default:
        return error(`unsupported operator for integers: ${node.operator}`);
    }
  }

  private evalBooleanInfix(node: AST.InfixExpression, left: BooleanValue, env: Environment): Value {
    const right = this.evaluate(node.right, env);
    if (isAbrupt(right)) return right;
    if (right.kind !== 'boolean') {
      return error(`expected boolean right operand for '${node.operator}', got ${describeValue(right)}`);
    }

    switch (node.operator) {
      case '==': return booleanValue(valuesEqual(left, right));
      case '!=': return booleanValue(!valuesEqual(left, right));
      default:
        return error(`unsupported operator for booleans: ${node.operator}`);
    }
  }

  // ─── Control Flow ──────────────────────────────────────

  private evalIfExpression(node: AST.IfExpression, env: Environment): Value {
    const condition = this.evaluate(node.condition, env);
    if (isAbrupt(condition)) return condition;
    if (condition.kind !== 'boolean') {
      return error(`expected boolean condition for 'if', got ${describeValue(condition)}`);
    }

    if (isTrue(condition)) {
      return this.evalBlockStatement(node.consequence, env);
    }
    if (node.alternative) {
      return this.evalBlockStatement(node.alternative, env);
    }
    return NONE;
  }

  private evalForLoop(node: AST.ForLoop, env: Environment): Value {
    let result: PlainValue = NONE;
    for (;;) {
      const condition = this.evaluate(node.condition, env);
      if (isAbrupt(condition)) return condition;
      if (condition.kind !== 'boolean') {
        return error(`expected boolean condition for 'for', got ${describeValue(condition)}`);
      }
      if (!isTrue(condition)) return result;

      const value = this.evalBlockStatement(node.body, env);
      if (isAbrupt(value)) return value;
      result = value;
    }
  }

  // ─── Functions ─────────────────────────────────────────

  private evalFunctionCall(node: AST.FunctionCall, env: Environment): Value {
    const callee = this.resolveCallee(node.callee, env);
    if (callee.kind !== 'function') return callee;

    if (node.args.length !== callee.params.length) {
      return error(
        `wrong number of arguments for ${AST.formatNode(node.callee)}: ` +
        `expected ${callee.params.length}, got ${node.args.length}`,
      );
    }

    // Arguments are evaluated in the caller's scope, left to right
    const args: PlainValue[] = [];
    for (const arg of node.args) {
      const value = this.evaluate(arg, env);
      if (isAbrupt(value)) return value;
      args.push(value);
    }

    if (this.depth >= this.maxDepth) {
      return error(`maximum call depth of ${this.maxDepth} exceeded`);
    }

    // The new scope hangs off the declaration-time scope, not the caller's
    const local = callee.closure.child();
    callee.params.forEach((param, i) => local.set(param, args[i]));

    this.trace(`call ${callee.name ?? '<anonymous>'}(${args.map(valueToString).join(', ')})`);
    this.depth++;
    const result = this.evalBlockStatement(callee.body, local);
    this.depth--;

    if (result.kind === 'return') {
      this.trace(`return ${valueToString(result.value)}`);
      return result.value;
    }
    return result;
  }

  private resolveCallee(callee: AST.Expression, env: Environment): Value {
    // An unresolved name is reported as a missing function
    if (callee.type === 'Identifier' && !env.has(callee.name)) {
      return error(`function not found: ${callee.name}`);
    }
    const value = this.evaluate(callee, env);
    if (value.kind === 'function' || isAbrupt(value)) return value;
    return error(`function not found: ${AST.formatNode(callee)}`);
  }

  // ─── Trace ─────────────────────────────────────────────

  private trace(message: string): void {
    if (this.traceEnabled) {
      console.log(`  [trace] ${message}`);
    }
  }
}
