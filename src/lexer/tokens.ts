export enum TokenKind {
  // Single-character punctuation
  LeftParen = "LEFT_PAREN",
  RightParen = "RIGHT_PAREN",
  LeftBrace = "LEFT_BRACE",
  RightBrace = "RIGHT_BRACE",
  Comma = "COMMA",
  Dot = "DOT",
  Minus = "MINUS",
  Plus = "PLUS",
  Semicolon = "SEMICOLON",
  Slash = "SLASH",
  Star = "STAR",

  // One- or two-character operators
  Bang = "BANG",
  BangEqual = "BANG_EQUAL",
  Equal = "EQUAL",
  EqualEqual = "EQUAL_EQUAL",
  Greater = "GREATER",
  GreaterEqual = "GREATER_EQUAL",
  Less = "LESS",
  LessEqual = "LESS_EQUAL",

  // Literals
  Identifier = "IDENTIFIER",
  String = "STRING",
  Number = "NUMBER",

  // Keywords
  And = "AND",
  Class = "CLASS",
  Else = "ELSE",
  False = "FALSE",
  Fun = "FUN",
  For = "FOR",
  If = "IF",
  Nil = "NIL",
  Or = "OR",
  Print = "PRINT",
  Return = "RETURN",
  Super = "SUPER",
  This = "THIS",
  True = "TRUE",
  Var = "VAR",
  While = "WHILE",

  // Special
  EOF = "EOF",
}

/** Decoded value carried by STRING and NUMBER tokens; `null` for everything else. */
export type Literal = string | number | null;

/** Half-open range of source offsets, `end` exclusive. */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export class Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly literal: Literal;
  readonly line: number;
  readonly span: Span;

  constructor(kind: TokenKind, lexeme: string, literal: Literal, line: number, span: Span) {
    this.kind = kind;
    this.lexeme = lexeme;
    this.literal = literal;
    this.line = line;
    this.span = Object.freeze({ start: span.start, end: span.end });
    Object.freeze(this);
  }

  toString(): string {
    return `${this.kind} ${this.lexeme} ${this.literal ?? ""}`;
  }

  toJSON(): { kind: TokenKind; lexeme: string; literal: Literal; line: number } {
    return { kind: this.kind, lexeme: this.lexeme, literal: this.literal, line: this.line };
  }
}
