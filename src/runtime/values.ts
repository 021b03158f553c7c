/**
 * Runtime value types for the Tern language.
 * Every evaluation step produces a Value.
 */

import type * as AST from '../parser/ast';
import type { Environment } from './environment';

/** Values that can be bound to names and passed around. */
export type PlainValue =
  | IntegerValue
  | BooleanValue
  | StringValue
  | FunctionValue
  | NoneValue;

/**
 * Anything an evaluation step can produce. Return signals and errors only
 * ever appear as the outermost value and are never bound or embedded.
 */
export type Value = PlainValue | ReturnSignal | ErrorValue;

export interface IntegerValue {
  readonly kind: 'integer';
  /** Always within the signed 64-bit range. */
  readonly value: bigint;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface FunctionValue {
  readonly kind: 'function';
  readonly name?: string;
  readonly params: readonly string[];
  readonly body: AST.BlockStatement;
  /** Declaration-time scope, shared by reference. */
  readonly closure: Environment;
}

/** Result of a conditional whose branch did not run. */
export interface NoneValue {
  readonly kind: 'none';
}

export interface ReturnSignal {
  readonly kind: 'return';
  readonly value: PlainValue;
}

export interface ErrorValue {
  readonly kind: 'error';
  readonly message: string;
}

// ─── Constants ───────────────────────────────────────

export const TRUE: BooleanValue = Object.freeze({ kind: 'boolean', value: true });
export const FALSE: BooleanValue = Object.freeze({ kind: 'boolean', value: false });
export const NONE: NoneValue = Object.freeze({ kind: 'none' });

// ─── Constructors ────────────────────────────────────

export function integer(value: bigint): IntegerValue {
  return { kind: 'integer', value: BigInt.asIntN(64, value) };
}

export function string(value: string): StringValue {
  return { kind: 'string', value };
}

export function booleanValue(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

export function functionValue(
  params: readonly string[],
  body: AST.BlockStatement,
  closure: Environment,
  name?: string,
): FunctionValue {
  return { kind: 'function', name, params, body, closure };
}

export function returnSignal(value: PlainValue): ReturnSignal {
  return { kind: 'return', value };
}

export function error(message: string): ErrorValue {
  return { kind: 'error', message };
}

// ─── Predicates ──────────────────────────────────────

export function isError(value: Value): value is ErrorValue {
  return value.kind === 'error';
}

export function isReturn(value: Value): value is ReturnSignal {
  return value.kind === 'return';
}

/** True for the values that must stop the enclosing evaluation. */
export function isAbrupt(value: Value): value is ReturnSignal | ErrorValue {
  return value.kind === 'return' || value.kind === 'error';
}

export function isTrue(value: Value): boolean {
  return value.kind === 'boolean' && value.value;
}

export function isFalse(value: Value): boolean {
  return value.kind === 'boolean' && !value.value;
}

// ─── Utilities ───────────────────────────────────────

export function valueToString(value: Value): string {
  switch (value.kind) {
    case 'integer': return value.value.toString();
    case 'boolean': return String(value.value);
    case 'string': return value.value;
    case 'function': return `<fn${value.name ? ' ' + value.name : ''}(${value.params.join(', ')})>`;
    case 'none': return 'none';
    case 'return': return valueToString(value.value);
    case 'error': return `ERROR: ${value.message}`;
  }
}

/** Kind and rendering, as used in error messages: `integer 5`, `string "hi"`. */
export function describeValue(value: Value): string {
  switch (value.kind) {
    case 'string': return `string ${JSON.stringify(value.value)}`;
    case 'none': return 'none';
    default: return `${value.kind} ${valueToString(value)}`;
  }
}

export function valuesEqual(a: PlainValue, b: PlainValue): boolean {
  switch (a.kind) {
    case 'integer': return b.kind === 'integer' && a.value === b.value;
    case 'boolean': return b.kind === 'boolean' && a.value === b.value;
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'none': return b.kind === 'none';
    case 'function': return a === b;
  }
}
