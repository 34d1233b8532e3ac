import { TokenKind, Token, type Literal } from "./tokens.js";
import { KEYWORDS } from "./keywords.js";
import type { DiagnosticSink } from "../errors/diagnostic.js";

/** Returned by `peek`/`peekNext` past the end of input. */
const END = "\0";

const SINGLE_CHAR: ReadonlyMap<string, TokenKind> = new Map([
  ["(", TokenKind.LeftParen],
  [")", TokenKind.RightParen],
  ["{", TokenKind.LeftBrace],
  ["}", TokenKind.RightBrace],
  [",", TokenKind.Comma],
  [".", TokenKind.Dot],
  ["-", TokenKind.Minus],
  ["+", TokenKind.Plus],
  [";", TokenKind.Semicolon],
  ["*", TokenKind.Star],
]);

// Lead character -> [kind when followed by "=", kind otherwise]
const WITH_EQUAL: ReadonlyMap<string, readonly [TokenKind, TokenKind]> = new Map([
  ["!", [TokenKind.BangEqual, TokenKind.Bang]],
  ["=", [TokenKind.EqualEqual, TokenKind.Equal]],
  ["<", [TokenKind.LessEqual, TokenKind.Less]],
  [">", [TokenKind.GreaterEqual, TokenKind.Greater]],
]);

/**
 * Single-pass scanner. One instance scans one source; lexical faults go to
 * the sink and the pass carries on with the next unread character.
 */
export class Scanner {
  private readonly source: string;
  private readonly sink: DiagnosticSink;
  private readonly tokens: Token[] = [];
  private start: number = 0;
  private current: number = 0;
  private line: number = 1;
  private startLine: number = 1;
  private done: boolean = false;

  constructor(source: string, sink: DiagnosticSink) {
    this.source = source;
    this.sink = sink;
  }

  scanTokens(): readonly Token[] {
    if (this.done) return this.tokens;

    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.scanToken();
    }

    const end = this.source.length;
    this.tokens.push(new Token(TokenKind.EOF, "", null, this.line, { start: end, end }));
    this.done = true;
    Object.freeze(this.tokens);
    return this.tokens;
  }

  private scanToken(): void {
    const ch = this.advance();

    const single = SINGLE_CHAR.get(ch);
    if (single !== undefined) {
      this.addToken(single);
      return;
    }

    const pair = WITH_EQUAL.get(ch);
    if (pair !== undefined) {
      this.addToken(this.match("=") ? pair[0] : pair[1]);
      return;
    }

    switch (ch) {
      case "/":
        if (this.peek() === "/") {
          while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
        } else if (this.peek() === "*") {
          this.advance(); // skip '*'
          this.skipBlockComment();
        } else {
          this.addToken(TokenKind.Slash);
        }
        return;

      case " ":
      case "\r":
      case "\t":
        return;

      case "\n":
        this.line++;
        return;

      case '"':
        this.readString();
        return;
    }

    if (this.isDigit(ch)) {
      this.readNumber();
    } else if (this.isAlpha(ch)) {
      this.readIdentOrKeyword();
    } else {
      // A character outside the BMP arrives as a surrogate pair; report it once
      if (this.isHighSurrogate(ch) && this.isLowSurrogate(this.peek())) this.advance();
      this.sink.report(this.line, "Unexpected character.");
    }
  }

  private readString(): void {
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.peek() === "\n") this.line++;
      this.advance();
    }

    if (this.isAtEnd()) {
      this.sink.report(this.line, "Unterminated string.");
      return;
    }

    this.advance(); // closing "
    this.addToken(TokenKind.String, this.source.slice(this.start + 1, this.current - 1));
  }

  private readNumber(): void {
    while (this.isDigit(this.peek())) this.advance();

    // A '.' only belongs to the number when a digit follows it
    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      this.advance(); // skip '.'
      while (this.isDigit(this.peek())) this.advance();
    }

    this.addToken(TokenKind.Number, Number(this.source.slice(this.start, this.current)));
  }

  private readIdentOrKeyword(): void {
    while (this.isAlphaNum(this.peek())) this.advance();

    const text = this.source.slice(this.start, this.current);
    this.addToken(KEYWORDS.get(text) ?? TokenKind.Identifier);
  }

  // Entered with the opening "/*" consumed. Comments do not nest.
  private skipBlockComment(): void {
    while (!this.isAtEnd()) {
      if (this.peek() === "*" && this.peekNext() === "/") {
        this.advance();
        this.advance();
        return;
      }
      if (this.peek() === "\n") this.line++;
      this.advance();
    }

    this.sink.report(this.line, "Unterminated multiline comment.");
  }

  private addToken(kind: TokenKind, literal: Literal = null): void {
    const lexeme = this.source.slice(this.start, this.current);
    this.tokens.push(
      new Token(kind, lexeme, literal, this.startLine, { start: this.start, end: this.current }),
    );
  }

  private advance(): string {
    const ch = this.peek();
    if (!this.isAtEnd()) this.current++;
    return ch;
  }

  private match(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.current++;
    return true;
  }

  private peek(): string {
    return this.current < this.source.length ? this.source[this.current] : END;
  }

  private peekNext(): string {
    return this.current + 1 < this.source.length ? this.source[this.current + 1] : END;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isAlphaNum(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private isHighSurrogate(ch: string): boolean {
    return ch >= "\uD800" && ch <= "\uDBFF";
  }

  private isLowSurrogate(ch: string): boolean {
    return ch >= "\uDC00" && ch <= "\uDFFF";
  }
}
