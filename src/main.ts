#!/usr/bin/env -S node --import tsx
import { readFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
  formatDiagnostic,
  Interpreter,
  Lexer,
  Parser,
  type Program,
  RuntimeError,
  Symtab,
  TokenType,
} from "./mod.ts";

export type IO = {
  /** program output, written as is */
  out: (text: string) => void;
  /** diagnostics, one line per call */
  err: (line: string) => void;
};

const stdio: IO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (line) => console.error(line),
};

type Parsed = { ast: Program; symtab: Symtab; errors: number };

const parse = (src: string, io: IO): Parsed => {
  const symtab = new Symtab();
  const parser = new Parser(new Lexer(src), symtab);
  const ast = parser.parseProgram();
  for (const d of parser.diagnostics()) io.err(formatDiagnostic(d));
  const errors = parser.errorCount();
  if (errors > 0) io.err(`${errors} error(s)`);
  return { ast, symtab, errors };
};

/**
 * Parses and runs one program. Nothing runs when the parser reported
 * errors. Returns the exit status: 0, 1 for parse errors, 2 for a runtime
 * error.
 */
export const interpret = (
  src: string,
  io: IO = stdio,
  showSymtab = false,
): number => {
  const { ast, symtab, errors } = parse(src, io);
  if (errors > 0) return 1;

  try {
    new Interpreter(symtab, { write: io.out }).execute(ast);
  } catch (e) {
    if (!(e instanceof RuntimeError)) throw e;
    io.err(e.message);
    return 2;
  }

  if (showSymtab) {
    const programName = ast.name.toLowerCase();
    for (const entry of symtab.entries()) {
      if (entry.name.toLowerCase() === programName) continue;
      io.out(`${entry.name} = ${entry.getValue()}\n`);
    }
  }
  return 0;
};

export const printAST = (src: string, io: IO = stdio): number => {
  const { ast, errors } = parse(src, io);
  if (errors > 0) return 1;
  io.out(JSON.stringify(ast, null, 2) + "\n");
  return 0;
};

export const printTokens = (src: string, io: IO = stdio): number => {
  const lexer = new Lexer(src);
  let status = 0;
  for (let tok = lexer.nextToken(); tok.type !== TokenType.EOF; tok = lexer.nextToken()) {
    if (tok.type === TokenType.ERROR) status = 1;
    io.out(`${tok.line}\t${TokenType[tok.type]}\t${tok.text}\n`);
  }
  return status;
};

const main = async (): Promise<void> => {
  const program = new Command()
    .name("pasc")
    .version("0.1.0")
    .description("Interpreter for a small Pascal subset");

  program
    .command("run")
    .description("Run a Pascal source file")
    .argument("<file>", "source file")
    .option("--symtab", "print variable values after the run")
    .action(async (file: string, options: { symtab?: boolean }) => {
      const src = await readFile(file, "utf8");
      process.exitCode = interpret(src, stdio, options.symtab === true);
    });

  program
    .command("ast")
    .description("Show the AST of a Pascal source file")
    .argument("<file>", "source file")
    .action(async (file: string) => {
      process.exitCode = printAST(await readFile(file, "utf8"));
    });

  program
    .command("tokens")
    .description("Show the tokens of a Pascal source file")
    .argument("<file>", "source file")
    .action(async (file: string) => {
      process.exitCode = printTokens(await readFile(file, "utf8"));
    });

  await program.parseAsync(process.argv);
};

const invokedDirectly = process.argv[1] !== undefined &&
  realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) await main();
