import { Token, TokenType, KEYWORDS } from './tokens';

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '+': TokenType.PLUS,
  '-': TokenType.MINUS,
  '*': TokenType.STAR,
  '/': TokenType.SLASH,
  '<': TokenType.LT,
  '>': TokenType.GT,
  ',': TokenType.COMMA,
  ';': TokenType.SEMICOLON,
};

export class Lexer {
  private source: string;
  private tokens: Token[] = [];
  private pos = 0;
  private line = 1;
  private column = 1;
  // Open '(' and '{' in source order
  private groups: string[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;
    this.groups = [];

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.handleNewline();
        continue;
      }

      // Comments
      if (ch === '#') {
        this.skipComment();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (this.isDigit(ch)) {
        this.readInteger();
        continue;
      }

      if (this.isAlpha(ch)) {
        this.readIdentifier();
        continue;
      }

      this.readOperator();
    }

    this.addToken(TokenType.EOF, '');
    return this.tokens;
  }

  private handleNewline(): void {
    this.advance(); // consume \n

    // Line breaks are not significant inside parentheses, but a block
    // opened within them restores them until it closes
    if (this.groups.length === 0 || this.groups[this.groups.length - 1] === '{') {
      const last = this.tokens[this.tokens.length - 1];
      if (last !== undefined && last.type !== TokenType.LINEBREAK) {
        this.addTokenAt(TokenType.LINEBREAK, '\\n', this.line, this.column - 1);
      }
    }
    this.line++;
    this.column = 1;
  }

  private skipComment(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
      this.advance();
    }
  }

  private readString(): void {
    const startLine = this.line;
    const startCol = this.column;
    const start = this.pos;
    this.advance(); // skip opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      const ch = this.source[this.pos];
      if (ch === '\n') break;
      if (ch === '\\') {
        this.advance();
        if (this.pos < this.source.length) {
          const escaped = this.source[this.pos];
          switch (escaped) {
            case 'n': text += '\n'; break;
            case 't': text += '\t'; break;
            case '\\': text += '\\'; break;
            case '"': text += '"'; break;
            default: text += '\\' + escaped;
          }
          this.advance();
        }
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length || this.source[this.pos] !== '"') {
      this.addTokenAt(TokenType.ILLEGAL, this.source.slice(start, this.pos), startLine, startCol);
      return;
    }
    this.advance(); // skip closing quote
    this.addTokenAt(TokenType.STRING, text, startLine, startCol);
  }

  private readInteger(): void {
    const startCol = this.column;
    let num = '';
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      num += this.source[this.pos];
      this.advance();
    }
    this.addTokenAt(TokenType.INTEGER, num, this.line, startCol);
  }

  private readIdentifier(): void {
    const startCol = this.column;
    let id = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      id += this.source[this.pos];
      this.advance();
    }

    if (Object.prototype.hasOwnProperty.call(KEYWORDS, id)) {
      this.addTokenAt(KEYWORDS[id], id, this.line, startCol);
    } else {
      this.addTokenAt(TokenType.IDENTIFIER, id, this.line, startCol);
    }
  }

  private readOperator(): void {
    const ch = this.source[this.pos];
    const next = this.pos + 1 < this.source.length ? this.source[this.pos + 1] : '';
    const startCol = this.column;

    switch (ch) {
      case '=':
        if (next === '=') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.EQ, '==', this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.ASSIGN, '=', this.line, startCol);
        }
        break;
      case '!':
        if (next === '=') {
          this.advance(); this.advance();
          this.addTokenAt(TokenType.NEQ, '!=', this.line, startCol);
        } else {
          this.advance();
          this.addTokenAt(TokenType.BANG, '!', this.line, startCol);
        }
        break;
      case '(':
      case '{':
        this.advance();
        this.groups.push(ch);
        this.addTokenAt(ch === '(' ? TokenType.LPAREN : TokenType.LBRACE, ch, this.line, startCol);
        break;
      case ')':
        this.advance();
        this.closeGroup('(');
        this.addTokenAt(TokenType.RPAREN, ')', this.line, startCol);
        break;
      case '}':
        this.advance();
        this.closeGroup('{');
        this.addTokenAt(TokenType.RBRACE, '}', this.line, startCol);
        break;
      default: {
        this.advance();
        const type = Object.prototype.hasOwnProperty.call(SINGLE_CHAR_TOKENS, ch)
          ? SINGLE_CHAR_TOKENS[ch]
          : TokenType.ILLEGAL;
        this.addTokenAt(type, ch, this.line, startCol);
      }
    }
  }

  /** Unbalanced closers are left for the parser to report. */
  private closeGroup(opener: string): void {
    if (this.groups[this.groups.length - 1] === opener) {
      this.groups.pop();
    }
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private addToken(type: TokenType, value: string): void {
    this.tokens.push({ type, value, line: this.line, column: this.column });
  }

  private addTokenAt(type: TokenType, value: string, line: number, column: number): void {
    this.tokens.push({ type, value, line, column });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }
}
