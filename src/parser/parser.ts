import { Token, TokenType } from '../lexer/tokens';
import * as AST from './ast';

export enum Precedence {
  LOWEST,
  EQUALS,   // == !=
  COMPARE,  // < >
  SUM,      // + -
  PRODUCT,  // * /
  PREFIX,   // -x !x
  CALL,     // f(x)
}

const PRECEDENCES: Partial<Record<TokenType, Precedence>> = {
  [TokenType.EQ]: Precedence.EQUALS,
  [TokenType.NEQ]: Precedence.EQUALS,
  [TokenType.LT]: Precedence.COMPARE,
  [TokenType.GT]: Precedence.COMPARE,
  [TokenType.PLUS]: Precedence.SUM,
  [TokenType.MINUS]: Precedence.SUM,
  [TokenType.STAR]: Precedence.PRODUCT,
  [TokenType.SLASH]: Precedence.PRODUCT,
  [TokenType.LPAREN]: Precedence.CALL,
};

const INT64_MAX = 9223372036854775807n;

/** Deepest expression nesting the parser descends into. */
export const MAX_NESTING_DEPTH = 256;

/** Builds an expression starting at `token`, which has already been consumed. */
export type PrefixParseFn = (token: Token) => AST.Expression | null;

/** Extends `left` with the operator `token`, which has already been consumed. */
export type InfixParseFn = (left: AST.Expression, token: Token) => AST.Expression | null;

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

export function formatParseError(error: ParseError): string {
  return `Parse error at line ${error.line}, column ${error.column}: ${error.message}`;
}

export function precedenceOf(type: TokenType): Precedence {
  return PRECEDENCES[type] ?? Precedence.LOWEST;
}

/**
 * Precedence-climbing parser. Syntax errors never abort the parse: they are
 * collected in `errors` and the parser resumes at the next statement.
 */
export class Parser {
  private tokens: Token[] = [];
  private pos = 0;
  private nesting = 0;
  private parseErrors: ParseError[] = [];
  private prefixParseFns = new Map<TokenType, PrefixParseFn>();
  private infixParseFns = new Map<TokenType, InfixParseFn>();

  constructor() {
    this.registerPrefix(TokenType.IDENTIFIER, tok => this.parseIdentifier(tok));
    this.registerPrefix(TokenType.INTEGER, tok => this.parseIntegerLiteral(tok));
    this.registerPrefix(TokenType.STRING, tok => this.parseStringLiteral(tok));
    this.registerPrefix(TokenType.TRUE, tok => this.parseBooleanLiteral(tok));
    this.registerPrefix(TokenType.FALSE, tok => this.parseBooleanLiteral(tok));
    this.registerPrefix(TokenType.LPAREN, () => this.parseGroupedExpression());
    this.registerPrefix(TokenType.BANG, tok => this.parsePrefixExpression(tok));
    this.registerPrefix(TokenType.MINUS, tok => this.parsePrefixExpression(tok));
    this.registerPrefix(TokenType.IF, tok => this.parseIfExpression(tok));
    this.registerPrefix(TokenType.FUNCTION, tok => this.parseAnonymousFunction(tok));
    this.registerPrefix(TokenType.FOR, tok => this.parseForLoop(tok));

    for (const type of [
      TokenType.PLUS, TokenType.MINUS, TokenType.STAR, TokenType.SLASH,
      TokenType.LT, TokenType.GT, TokenType.EQ, TokenType.NEQ,
    ]) {
      this.registerInfix(type, (left, tok) => this.parseInfixExpression(left, tok));
    }
    this.registerInfix(TokenType.LPAREN, (left, tok) => this.parseCallExpression(left, tok));
  }

  get errors(): readonly ParseError[] {
    return this.parseErrors;
  }

  hasErrors(): boolean {
    return this.parseErrors.length > 0;
  }

  registerPrefix(type: TokenType, fn: PrefixParseFn): void {
    this.prefixParseFns.set(type, fn);
  }

  registerInfix(type: TokenType, fn: InfixParseFn): void {
    this.infixParseFns.set(type, fn);
  }

  parse(tokens: Token[]): AST.Program {
    this.tokens = tokens;
    this.pos = 0;
    this.nesting = 0;
    this.parseErrors = [];

    const position = this.position();
    const body: AST.Statement[] = [];

    while (!this.check(TokenType.EOF)) {
      const stmt = this.parseStatementWithRecovery(false);
      if (stmt) body.push(stmt);
    }

    return { type: 'Program', body, position };
  }

  // ─── Statements ────────────────────────────────────────

  private parseStatementWithRecovery(inBlock: boolean): AST.Statement | null {
    const start = this.pos;
    const errorCount = this.parseErrors.length;
    const stmt = this.parseStatement();
    if (this.parseErrors.length > errorCount) {
      this.synchronize(start, inBlock);
      return null;
    }
    return stmt;
  }

  private parseStatement(): AST.Statement | null {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.VAR:
        return this.parseVarStatement();
      case TokenType.RETURN:
        return this.parseReturnStatement();
      case TokenType.FUNCTION:
        // `fn name(...)` declares; `fn(...)` is an anonymous function expression
        if (this.peekAhead(1)?.type === TokenType.IDENTIFIER) {
          return this.parseFunctionStatement();
        }
        return this.parseExpressionStatement();
      case TokenType.LINEBREAK:
      case TokenType.SEMICOLON:
        this.advance();
        return null;
      default:
        return this.parseExpressionStatement();
    }
  }

  private parseVarStatement(): AST.VarStatement | null {
    const position = this.position();
    this.expect(TokenType.VAR);
    const nameTok = this.expect(TokenType.IDENTIFIER);
    if (!nameTok) return null;
    if (!this.expect(TokenType.ASSIGN)) return null;
    const value = this.parseExpression(Precedence.LOWEST);
    if (!value || !this.endStatement()) return null;
    return { type: 'VarStatement', name: this.identifierFrom(nameTok), value, position };
  }

  private parseReturnStatement(): AST.ReturnStatement | null {
    const position = this.position();
    this.expect(TokenType.RETURN);
    if (this.atStatementEnd()) {
      this.match(TokenType.SEMICOLON);
      return { type: 'ReturnStatement', position };
    }
    const value = this.parseExpression(Precedence.LOWEST);
    if (!value || !this.endStatement()) return null;
    return { type: 'ReturnStatement', value, position };
  }

  private parseFunctionStatement(): AST.FunctionStatement | null {
    const position = this.position();
    this.expect(TokenType.FUNCTION);
    const nameTok = this.expect(TokenType.IDENTIFIER);
    if (!nameTok) return null;
    const params = this.parseParams();
    if (!params) return null;
    const body = this.parseBlockStatement();
    if (!body) return null;
    return { type: 'FunctionStatement', name: this.identifierFrom(nameTok), params, body, position };
  }

  private parseExpressionStatement(): AST.ExpressionStatement | null {
    const position = this.position();
    const expression = this.parseExpression(Precedence.LOWEST);
    if (!expression || !this.endStatement()) return null;
    return { type: 'ExpressionStatement', expression, position };
  }

  private parseBlockStatement(): AST.BlockStatement | null {
    const position = this.position();
    if (!this.expect(TokenType.LBRACE)) return null;

    const body: AST.Statement[] = [];
    while (!this.check(TokenType.RBRACE) && !this.check(TokenType.EOF)) {
      const stmt = this.parseStatementWithRecovery(true);
      if (stmt) body.push(stmt);
    }

    if (!this.expect(TokenType.RBRACE)) return null;
    return { type: 'BlockStatement', body, position };
  }

  private parseParams(): AST.Identifier[] | null {
    if (!this.expect(TokenType.LPAREN)) return null;
    const params: AST.Identifier[] = [];
    if (this.match(TokenType.RPAREN)) return params;

    do {
      const tok = this.expect(TokenType.IDENTIFIER);
      if (!tok) return null;
      params.push(this.identifierFrom(tok));
    } while (this.match(TokenType.COMMA));

    if (!this.expect(TokenType.RPAREN)) return null;
    return params;
  }

  // ─── Expressions ───────────────────────────────────────

  parseExpression(precedence: Precedence): AST.Expression | null {
    if (this.nesting >= MAX_NESTING_DEPTH) {
      this.error(`Expression nested too deeply (limit ${MAX_NESTING_DEPTH})`);
      return null;
    }
    this.nesting++;
    try {
      return this.parseExpressionFrom(precedence);
    } finally {
      this.nesting--;
    }
  }

  private parseExpressionFrom(precedence: Precedence): AST.Expression | null {
    const tok = this.peek();
    const prefix = this.prefixParseFns.get(tok.type);
    if (!prefix) {
      this.error(`No prefix parse function for ${tok.type} '${tok.value}'`);
      return null;
    }
    this.advance();

    let left = prefix(tok);
    if (!left) return null;

    while (!this.check(TokenType.SEMICOLON) && precedence < precedenceOf(this.peek().type)) {
      const infix = this.infixParseFns.get(this.peek().type);
      if (!infix) return left;
      const operator = this.advance();
      left = infix(left, operator);
      if (!left) return null;
    }

    return left;
  }

  private parseIdentifier(tok: Token): AST.Identifier {
    return this.identifierFrom(tok);
  }

  private parseIntegerLiteral(tok: Token): AST.IntegerLiteral | null {
    const value = BigInt(tok.value);
    if (value > INT64_MAX) {
      this.errorAt(tok, `Integer literal out of range: ${tok.value}`);
      return null;
    }
    return { type: 'IntegerLiteral', value, position: this.positionOf(tok) };
  }

  private parseStringLiteral(tok: Token): AST.StringLiteral {
    return { type: 'StringLiteral', value: tok.value, position: this.positionOf(tok) };
  }

  private parseBooleanLiteral(tok: Token): AST.BooleanLiteral {
    return { type: 'BooleanLiteral', value: tok.type === TokenType.TRUE, position: this.positionOf(tok) };
  }

  private parseGroupedExpression(): AST.Expression | null {
    const inner = this.parseExpression(Precedence.LOWEST);
    if (!inner) return null;
    if (!this.expect(TokenType.RPAREN)) return null;
    return inner;
  }

  private parsePrefixExpression(tok: Token): AST.PrefixExpression | null {
    const right = this.parseExpression(Precedence.PREFIX);
    if (!right) return null;
    return { type: 'PrefixExpression', operator: tok.value, right, position: this.positionOf(tok) };
  }

  private parseInfixExpression(left: AST.Expression, tok: Token): AST.InfixExpression | null {
    // Re-entering at the operator's own precedence makes it left-associative
    const right = this.parseExpression(precedenceOf(tok.type));
    if (!right) return null;
    return { type: 'InfixExpression', operator: tok.value, left, right, position: left.position };
  }

  private parseCallExpression(callee: AST.Expression, tok: Token): AST.FunctionCall | null {
    const args: AST.Expression[] = [];
    if (!this.match(TokenType.RPAREN)) {
      do {
        const arg = this.parseExpression(Precedence.LOWEST);
        if (!arg) return null;
        args.push(arg);
      } while (this.match(TokenType.COMMA));
      if (!this.expect(TokenType.RPAREN)) return null;
    }
    return { type: 'FunctionCall', callee, args, position: this.positionOf(tok) };
  }

  private parseIfExpression(tok: Token): AST.IfExpression | null {
    const condition = this.parseCondition();
    if (!condition) return null;
    const consequence = this.parseBlockStatement();
    if (!consequence) return null;

    if (!this.checkPastLinebreaks(TokenType.ELSE)) {
      return { type: 'IfExpression', condition, consequence, position: this.positionOf(tok) };
    }
    this.skipLinebreaks();
    this.advance(); // else

    let alternative: AST.BlockStatement | null;
    if (this.check(TokenType.IF)) {
      // else if: wrap the nested conditional in a block of its own
      const position = this.position();
      const nested = this.parseIfExpression(this.advance());
      if (!nested) return null;
      alternative = {
        type: 'BlockStatement',
        body: [{ type: 'ExpressionStatement', expression: nested, position }],
        position,
      };
    } else {
      alternative = this.parseBlockStatement();
    }
    if (!alternative) return null;

    return { type: 'IfExpression', condition, consequence, alternative, position: this.positionOf(tok) };
  }

  private parseForLoop(tok: Token): AST.ForLoop | null {
    const condition = this.parseCondition();
    if (!condition) return null;
    const body = this.parseBlockStatement();
    if (!body) return null;
    return { type: 'ForLoop', condition, body, position: this.positionOf(tok) };
  }

  private parseCondition(): AST.Expression | null {
    if (!this.expect(TokenType.LPAREN)) return null;
    const condition = this.parseExpression(Precedence.LOWEST);
    if (!condition) return null;
    if (!this.expect(TokenType.RPAREN)) return null;
    return condition;
  }

  private parseAnonymousFunction(tok: Token): AST.AnonymousFunction | null {
    const params = this.parseParams();
    if (!params) return null;
    const body = this.parseBlockStatement();
    if (!body) return null;
    return { type: 'AnonymousFunction', params, body, position: this.positionOf(tok) };
  }

  // ─── Recovery ──────────────────────────────────────────

  /**
   * Skip the rest of a statement that failed to parse. Stops after the next
   * terminator, or before the `}` closing the enclosing block.
   */
  private synchronize(start: number, inBlock: boolean): void {
    if (this.pos === start && !this.check(TokenType.EOF)) {
      this.advance();
    }
    let depth = 0;
    while (!this.check(TokenType.EOF)) {
      const type = this.peek().type;
      if (depth === 0 && (type === TokenType.SEMICOLON || type === TokenType.LINEBREAK)) {
        this.advance();
        return;
      }
      if (type === TokenType.LBRACE) {
        depth++;
      } else if (type === TokenType.RBRACE) {
        if (depth === 0 && inBlock) return;
        depth = Math.max(0, depth - 1);
      }
      this.advance();
    }
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] ?? this.eofToken();
  }

  private peekAhead(offset: number): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private advance(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length) this.pos++;
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType): Token | null {
    const tok = this.peek();
    if (tok.type !== type) {
      this.error(`Expected ${type} but got ${tok.type} '${tok.value}'`);
      return null;
    }
    return this.advance();
  }

  /**
   * Consume the end of a statement: `;`, or a line break, `}` or end of input
   * left in place. A statement that closed a block needs no terminator.
   */
  private endStatement(): boolean {
    if (this.match(TokenType.SEMICOLON) || this.atStatementEnd()) return true;
    if (this.tokens[this.pos - 1]?.type === TokenType.RBRACE) return true;
    const tok = this.peek();
    this.error(`Expected end of statement but got ${tok.type} '${tok.value}'`);
    return false;
  }

  private atStatementEnd(): boolean {
    return this.check(TokenType.SEMICOLON)
      || this.check(TokenType.LINEBREAK)
      || this.check(TokenType.RBRACE)
      || this.check(TokenType.EOF);
  }

  private checkPastLinebreaks(type: TokenType): boolean {
    let offset = 0;
    while (this.peekAhead(offset)?.type === TokenType.LINEBREAK) offset++;
    return this.peekAhead(offset)?.type === type;
  }

  private skipLinebreaks(): void {
    while (this.check(TokenType.LINEBREAK)) {
      this.advance();
    }
  }

  private identifierFrom(tok: Token): AST.Identifier {
    return { type: 'Identifier', name: tok.value, position: this.positionOf(tok) };
  }

  private position(): AST.Position {
    return this.positionOf(this.peek());
  }

  private positionOf(tok: Token): AST.Position {
    return { line: tok.line, column: tok.column };
  }

  private eofToken(): Token {
    const last = this.tokens[this.tokens.length - 1];
    return { type: TokenType.EOF, value: '', line: last?.line ?? 1, column: last?.column ?? 1 };
  }

  private error(message: string): void {
    this.errorAt(this.peek(), message);
  }

  private errorAt(tok: Token, message: string): void {
    this.parseErrors.push({ message, line: tok.line, column: tok.column });
  }
}
