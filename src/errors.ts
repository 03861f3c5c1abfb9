import type { Token } from "./token.ts";

export type DiagnosticKind = "SYNTAX" | "SEMANTIC";

export type Diagnostic = {
  kind: DiagnosticKind;
  line: number;
  message: string;
  text: string;
};

export const formatDiagnostic = (d: Diagnostic): string =>
  `${d.kind} ERROR at line ${d.line}: ${d.message} at '${d.text}'`;

/** Thrown inside the parser and caught at the nearest statement boundary. */
export class ParseError extends Error {
  constructor(message: string, public readonly token: Token) {
    super(message);
    this.name = "ParseError";
  }

  public toDiagnostic = (): Diagnostic => ({
    kind: "SYNTAX",
    line: this.token.line,
    message: this.message,
    text: this.token.text,
  });
}

/** Fatal: the interpreter stops at the first one. */
export class RuntimeError extends Error {
  constructor(
    public readonly line: number,
    public readonly reason: string,
    public readonly text: string,
  ) {
    super(`RUNTIME ERROR at line ${line}: ${reason}: ${text}`);
    this.name = "RuntimeError";
  }
}
