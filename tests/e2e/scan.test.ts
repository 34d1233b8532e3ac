import { describe, it, expect } from "vitest";
import { scan } from "../../src/scan.js";
import { TokenKind } from "../../src/lexer/tokens.js";

describe("scan", () => {
  it("scans a small program", () => {
    const source = [
      "class Greeter {",
      "  greet(name) {",
      '    print "hello " + name;',
      "  }",
      "}",
      "",
    ].join("\n");
    const result = scan(source, "greeter.brine");
    expect(result.errors).toHaveLength(0);
    expect(result.tokens.map((t) => t.toString())).toEqual([
      "CLASS class ",
      "IDENTIFIER Greeter ",
      "LEFT_BRACE { ",
      "IDENTIFIER greet ",
      "LEFT_PAREN ( ",
      "IDENTIFIER name ",
      "RIGHT_PAREN ) ",
      "LEFT_BRACE { ",
      "PRINT print ",
      'STRING "hello " hello ',
      "PLUS + ",
      "IDENTIFIER name ",
      "SEMICOLON ; ",
      "RIGHT_BRACE } ",
      "RIGHT_BRACE } ",
      "EOF  ",
    ]);
    expect(result.tokens[result.tokens.length - 1].line).toBe(6);
  });

  it("collects every error in one pass", () => {
    const result = scan('a ? b\n"open', "bad.brine");
    expect(result.tokens.map((t) => t.kind)).toEqual([
      TokenKind.Identifier, TokenKind.Identifier, TokenKind.EOF,
    ]);
    expect(result.errors.map((d) => `${d.source}:${d.line} ${d.message}`)).toEqual([
      "bad.brine:1 Unexpected character.",
      "bad.brine:2 Unterminated string.",
    ]);
  });

  it("keeps errors separate between runs", () => {
    expect(scan("$").errors).toHaveLength(1);
    expect(scan("ok").errors).toHaveLength(0);
  });

  it("names stdin when no filename is given", () => {
    expect(scan("~").errors[0].source).toBe("<stdin>");
  });
});
