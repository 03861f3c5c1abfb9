import { test } from "node:test";
import { deepStrictEqual, strictEqual } from "node:assert";
import { Lexer } from "../src/lexer.ts";
import { type Token, TokenType } from "../src/token.ts";

const lex = (src: string): Token[] => {
  const lexer = new Lexer(src);
  const tokens: Token[] = [];
  for (let tok = lexer.nextToken(); tok.type !== TokenType.EOF; tok = lexer.nextToken()) {
    tokens.push(tok);
  }
  return tokens;
};

test("Lexer: program header and assignment", () => {
  const types = lex("program p; begin x := 3.14 end.").map((t) => t.type);
  deepStrictEqual(types, [
    TokenType.PROGRAM,
    TokenType.IDENTIFIER,
    TokenType.SEMICOLON,
    TokenType.BEGIN,
    TokenType.IDENTIFIER,
    TokenType.COLON_EQUALS,
    TokenType.REAL,
    TokenType.END,
    TokenType.PERIOD,
  ]);
});

test("Lexer: keywords are case-insensitive, text is kept", () => {
  const tokens = lex("BeGiN WriteLn Total");
  deepStrictEqual(tokens.map((t) => t.type), [
    TokenType.BEGIN,
    TokenType.WRITELN,
    TokenType.IDENTIFIER,
  ]);
  deepStrictEqual(tokens.map((t) => t.text), ["BeGiN", "WriteLn", "Total"]);
});

test("Lexer: numbers", () => {
  const tokens = lex("42 1.5 2e3 7.");
  deepStrictEqual(tokens.map((t) => [t.type, t.value]), [
    [TokenType.INTEGER, 42],
    [TokenType.REAL, 1.5],
    [TokenType.REAL, 2000],
    [TokenType.INTEGER, 7],
    [TokenType.PERIOD, undefined],
  ]);
});

test("Lexer: doubled quote inside a string", () => {
  const [tok] = lex("'it''s'");
  strictEqual(tok.type, TokenType.STRING);
  strictEqual(tok.value, "it's");
});

test("Lexer: comments are skipped and lines counted", () => {
  const [tok] = lex("{ comment }\n(* another\n *) x");
  strictEqual(tok.type, TokenType.IDENTIFIER);
  strictEqual(tok.line, 3);
});

test("Lexer: operators", () => {
  deepStrictEqual(lex("<= >= <> < > = : := + - * /").map((t) => t.type), [
    TokenType.LESS_EQUALS,
    TokenType.GREATER_EQUALS,
    TokenType.NOT_EQUALS,
    TokenType.LESS_THAN,
    TokenType.GREATER_THAN,
    TokenType.EQUALS,
    TokenType.COLON,
    TokenType.COLON_EQUALS,
    TokenType.PLUS,
    TokenType.MINUS,
    TokenType.STAR,
    TokenType.SLASH,
  ]);
});

test("Lexer: bad input becomes ERROR tokens", () => {
  deepStrictEqual(lex("@ x").map((t) => [t.type, t.value]), [
    [TokenType.ERROR, "Invalid character"],
    [TokenType.IDENTIFIER, undefined],
  ]);
  deepStrictEqual(lex("'abc").map((t) => t.value), ["Unterminated string"]);
  deepStrictEqual(lex("{ never").map((t) => t.value), ["Unterminated comment"]);
});

test("Lexer: EOF repeats at the end of input", () => {
  const lexer = new Lexer("x");
  strictEqual(lexer.nextToken().type, TokenType.IDENTIFIER);
  strictEqual(lexer.nextToken().type, TokenType.EOF);
  strictEqual(lexer.nextToken().type, TokenType.EOF);
  strictEqual(lexer.currentToken().type, TokenType.EOF);
});

test("Lexer: NUL in the source is an invalid character, not the end", () => {
  deepStrictEqual(lex("x\0y").map((t) => [t.type, t.text]), [
    [TokenType.IDENTIFIER, "x"],
    [TokenType.ERROR, "\0"],
    [TokenType.IDENTIFIER, "y"],
  ]);
});
