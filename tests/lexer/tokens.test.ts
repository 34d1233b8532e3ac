import { describe, it, expect } from "vitest";
import { Token, TokenKind } from "../../src/lexer/tokens.js";
import { KEYWORDS } from "../../src/lexer/keywords.js";

describe("Token", () => {
  it("renders kind, lexeme and literal", () => {
    expect(new Token(TokenKind.Number, "1.5", 1.5, 1, { start: 0, end: 3 }).toString()).toBe("NUMBER 1.5 1.5");
    expect(new Token(TokenKind.String, '"hi"', "hi", 1, { start: 0, end: 4 }).toString()).toBe('STRING "hi" hi');
  });

  it("leaves the literal slot empty when there is none", () => {
    expect(new Token(TokenKind.Semicolon, ";", null, 1, { start: 0, end: 1 }).toString()).toBe("SEMICOLON ; ");
    expect(new Token(TokenKind.EOF, "", null, 3, { start: 7, end: 7 }).toString()).toBe("EOF  ");
  });

  it("keeps the span it was given", () => {
    const tok = new Token(TokenKind.Identifier, "name", null, 1, { start: 6, end: 10 });
    expect(tok.span).toEqual({ start: 6, end: 10 });
  });

  it("is frozen", () => {
    const tok = new Token(TokenKind.Identifier, "x", null, 2, { start: 4, end: 5 });
    expect(Object.isFrozen(tok)).toBe(true);
    expect(Object.isFrozen(tok.span)).toBe(true);
  });

  it("serializes without its span", () => {
    const tok = new Token(TokenKind.Identifier, "x", null, 2, { start: 4, end: 5 });
    expect(JSON.parse(JSON.stringify(tok))).toEqual({
      kind: "IDENTIFIER",
      lexeme: "x",
      literal: null,
      line: 2,
    });
  });
});

describe("KEYWORDS", () => {
  it("maps sixteen reserved words", () => {
    expect(KEYWORDS.size).toBe(16);
    expect(KEYWORDS.get("fun")).toBe(TokenKind.Fun);
    expect(KEYWORDS.get("nil")).toBe(TokenKind.Nil);
    expect(KEYWORDS.get("function")).toBeUndefined();
  });
});
