export { Lexer } from "./lexer.ts";
export { Parser } from "./parser.ts";
export { Symtab, SymtabEntry } from "./symtab.ts";
export { Interpreter } from "./ast-walking/interpreter.ts";
export type { InterpreterOptions, Value } from "./ast-walking/interpreter.ts";
export { formatNumber, formatString } from "./ast-walking/format.ts";
export { formatDiagnostic, ParseError, RuntimeError } from "./errors.ts";
export type { Diagnostic, DiagnosticKind } from "./errors.ts";
export { TokenType } from "./token.ts";
export type { Token, TokenSource } from "./token.ts";
export type * from "./ast.ts";
