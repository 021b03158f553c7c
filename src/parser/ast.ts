export type Node = Program | Statement | Expression;

export type Statement =
  | ExpressionStatement
  | VarStatement
  | ReturnStatement
  | FunctionStatement
  | BlockStatement;

export type Expression =
  | Identifier
  | IntegerLiteral
  | StringLiteral
  | BooleanLiteral
  | PrefixExpression
  | InfixExpression
  | IfExpression
  | ForLoop
  | FunctionCall
  | AnonymousFunction;

export interface Position {
  line: number;
  column: number;
}

export interface BaseNode {
  readonly position: Position;
}

export interface Program extends BaseNode {
  readonly type: 'Program';
  readonly body: readonly Statement[];
}

// ─── Statements ──────────────────────────────────────

export interface ExpressionStatement extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: Expression;
}

export interface VarStatement extends BaseNode {
  readonly type: 'VarStatement';
  readonly name: Identifier;
  readonly value: Expression;
}

export interface ReturnStatement extends BaseNode {
  readonly type: 'ReturnStatement';
  /** Absent for a bare `return`. */
  readonly value?: Expression;
}

export interface FunctionStatement extends BaseNode {
  readonly type: 'FunctionStatement';
  readonly name: Identifier;
  readonly params: readonly Identifier[];
  readonly body: BlockStatement;
}

export interface BlockStatement extends BaseNode {
  readonly type: 'BlockStatement';
  readonly body: readonly Statement[];
}

// ─── Expressions ─────────────────────────────────────

export interface Identifier extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface IntegerLiteral extends BaseNode {
  readonly type: 'IntegerLiteral';
  readonly value: bigint;
}

export interface StringLiteral extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BooleanLiteral extends BaseNode {
  readonly type: 'BooleanLiteral';
  readonly value: boolean;
}

export interface PrefixExpression extends BaseNode {
  readonly type: 'PrefixExpression';
  readonly operator: string;
  readonly right: Expression;
}

export interface InfixExpression extends BaseNode {
  readonly type: 'InfixExpression';
  readonly operator: string;
  readonly left: Expression;
  readonly right: Expression;
}

export interface IfExpression extends BaseNode {
  readonly type: 'IfExpression';
  readonly condition: Expression;
  readonly consequence: BlockStatement;
  readonly alternative?: BlockStatement;
}

export interface ForLoop extends BaseNode {
  readonly type: 'ForLoop';
  readonly condition: Expression;
  readonly body: BlockStatement;
}

export interface FunctionCall extends BaseNode {
  readonly type: 'FunctionCall';
  readonly callee: Expression;
  readonly args: readonly Expression[];
}

export interface AnonymousFunction extends BaseNode {
  readonly type: 'AnonymousFunction';
  readonly params: readonly Identifier[];
  readonly body: BlockStatement;
}

// ─── Rendering ───────────────────────────────────────

/**
 * Canonical single-line rendering of a node. Operator expressions are fully
 * parenthesized so the rendering shows how the parser grouped them.
 */
export function formatNode(node: Node): string {
  switch (node.type) {
    case 'Program':
      return node.body.map(formatNode).join('\n');
    case 'ExpressionStatement':
      return formatNode(node.expression);
    case 'VarStatement':
      return `var ${node.name.name} = ${formatNode(node.value)};`;
    case 'ReturnStatement':
      return node.value ? `return ${formatNode(node.value)};` : 'return;';
    case 'FunctionStatement':
      return `fn ${node.name.name}(${formatParams(node.params)}) ${formatNode(node.body)}`;
    case 'BlockStatement':
      return node.body.length === 0 ? '{ }' : `{ ${node.body.map(formatNode).join(' ')} }`;
    case 'Identifier':
      return node.name;
    case 'IntegerLiteral':
      return node.value.toString();
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'BooleanLiteral':
      return String(node.value);
    case 'PrefixExpression':
      return `(${node.operator}${formatNode(node.right)})`;
    case 'InfixExpression':
      return `(${formatNode(node.left)} ${node.operator} ${formatNode(node.right)})`;
    case 'IfExpression': {
      const head = `if ${formatNode(node.condition)} ${formatNode(node.consequence)}`;
      return node.alternative ? `${head} else ${formatNode(node.alternative)}` : head;
    }
    case 'ForLoop':
      return `for ${formatNode(node.condition)} ${formatNode(node.body)}`;
    case 'FunctionCall':
      return `${formatNode(node.callee)}(${node.args.map(formatNode).join(', ')})`;
    case 'AnonymousFunction':
      return `fn(${formatParams(node.params)}) ${formatNode(node.body)}`;
  }
}

function formatParams(params: readonly Identifier[]): string {
  return params.map(p => p.name).join(', ');
}
