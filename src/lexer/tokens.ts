export enum TokenType {
  // Literals
  IDENTIFIER = 'IDENTIFIER',
  INTEGER = 'INTEGER',
  STRING = 'STRING',

  // Operators
  ASSIGN = 'ASSIGN',           // =
  PLUS = 'PLUS',               // +
  MINUS = 'MINUS',             // -
  STAR = 'STAR',               // *
  SLASH = 'SLASH',             // /
  BANG = 'BANG',               // !

  // Comparison
  LT = 'LT',                   // <
  GT = 'GT',                   // >
  EQ = 'EQ',                   // ==
  NEQ = 'NEQ',                 // !=

  // Delimiters
  COMMA = 'COMMA',             // ,
  SEMICOLON = 'SEMICOLON',     // ;
  LPAREN = 'LPAREN',           // (
  RPAREN = 'RPAREN',           // )
  LBRACE = 'LBRACE',           // {
  RBRACE = 'RBRACE',           // }

  // Keywords
  VAR = 'VAR',
  RETURN = 'RETURN',
  FUNCTION = 'FUNCTION',
  IF = 'IF',
  ELSE = 'ELSE',
  FOR = 'FOR',
  TRUE = 'TRUE',
  FALSE = 'FALSE',

  // Structure
  LINEBREAK = 'LINEBREAK',
  EOF = 'EOF',

  // Anything the lexer could not make sense of
  ILLEGAL = 'ILLEGAL',
}

export const KEYWORDS: Record<string, TokenType> = {
  'var': TokenType.VAR,
  'return': TokenType.RETURN,
  'fn': TokenType.FUNCTION,
  'if': TokenType.IF,
  'else': TokenType.ELSE,
  'for': TokenType.FOR,
  'true': TokenType.TRUE,
  'false': TokenType.FALSE,
};

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}
