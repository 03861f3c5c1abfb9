import { test } from "node:test";
import { deepStrictEqual, strictEqual } from "node:assert";
import { readFileSync } from "node:fs";
import { interpret, type IO, printAST, printTokens } from "../src/main.ts";

const capture = (): { io: IO; out: string[]; err: string[] } => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      out: (text) => {
        out.push(text);
      },
      err: (line) => {
        err.push(line);
      },
    },
    out,
    err,
  };
};

const example = (name: string): string =>
  readFileSync(new URL(`../examples/${name}`, import.meta.url), "utf8");

test("interpret: fibonacci example", () => {
  const { io, out, err } = capture();
  strictEqual(interpret(example("fibonacci.pas"), io), 0);
  strictEqual(out.join(""), "   0   1   1   2   3   5   8  13  21  34\n");
  deepStrictEqual(err, []);
});

test("interpret: squares example", () => {
  const { io, out } = capture();
  strictEqual(interpret(example("squares.pas"), io), 0);
  strictEqual(
    out.join(""),
    " 1 squared is    1\n 2 squared is    4\n 3 squared is    9\n   4.667\n",
  );
});

test("interpret: parse errors prevent execution", () => {
  const { io, out, err } = capture();
  strictEqual(interpret("program p; begin x := 1; writeln(z) end.", io), 1);
  deepStrictEqual(out, []);
  deepStrictEqual(err, [
    "SEMANTIC ERROR at line 1: Undeclared identifier at 'z'",
    "1 error(s)",
  ]);
});

test("interpret: runtime error", () => {
  const { io, out, err } = capture();
  strictEqual(interpret("program p; begin writeln('a'); y := 1 / 0 end.", io), 2);
  deepStrictEqual(out, ["a", "\n"]);
  deepStrictEqual(err, ["RUNTIME ERROR at line 1: Division by zero: /"]);
});

test("interpret: symbol table dump", () => {
  const { io, out } = capture();
  strictEqual(interpret("program p; begin x := 2; Y := x * 3 end.", io, true), 0);
  deepStrictEqual(out, ["x = 2\n", "Y = 6\n"]);
});

test("printTokens", () => {
  const { io, out } = capture();
  strictEqual(printTokens("x := 1", io), 0);
  deepStrictEqual(out, [
    "1\tIDENTIFIER\tx\n",
    "1\tCOLON_EQUALS\t:=\n",
    "1\tINTEGER\t1\n",
  ]);
  strictEqual(printTokens("?", capture().io), 1);
});

test("printAST", () => {
  const { io, out } = capture();
  strictEqual(printAST("program demo; begin end.", io), 0);
  deepStrictEqual(JSON.parse(out.join("")), {
    type: "Program",
    line: 1,
    name: "demo",
    body: { type: "Compound", line: 1, body: [] },
  });
});
