import type {
  BinOp,
  Expression,
  Loop,
  Program,
  Statement,
  Test,
  Variable,
  Write,
  Writeln,
} from "../ast.ts";
import { RuntimeError } from "../errors.ts";
import type { Symtab, SymtabEntry } from "../symtab.ts";
import { err } from "../utils.ts";
import { formatNumber, formatString } from "./format.ts";

export type Value = number | string | boolean;

export type InterpreterOptions = {
  /** receives program output; defaults to stdout */
  write?: (text: string) => void;
};

const unknownNode = (node: never): never =>
  err("Interpreter", `Unknown node: ${JSON.stringify(node)}`);

/**Interpreter
 *
 * Walks a parsed program, synchronously. Only run programs the parser
 * reported no errors for: every `Variable` must resolve in the symbol table.
 * Division by zero throws a `RuntimeError` and nothing after it executes.
 */
export class Interpreter {
  private symtab: Symtab;
  private write: (text: string) => void;

  constructor(symtab: Symtab, options: InterpreterOptions = {}) {
    this.symtab = symtab;
    this.write = options.write ?? ((text: string) => {
      process.stdout.write(text);
    });
  }

  public execute = (program: Program): void => {
    this.exec(program.body);
  };

  private exec = (stmt: Statement): void => {
    switch (stmt.type) {
      case "Compound": {
        for (const s of stmt.body) this.exec(s);
        return;
      }
      case "Assign": {
        this.entry(stmt.target).setValue(this.number(stmt.value));
        return;
      }
      case "Loop": {
        this.loop(stmt);
        return;
      }
      case "If": {
        if (this.test(stmt.test)) this.exec(stmt.then);
        else if (stmt.else) this.exec(stmt.else);
        return;
      }
      case "Write": {
        this.print(stmt);
        return;
      }
      case "Writeln": {
        this.print(stmt);
        this.write("\n");
        return;
      }
      default:
        return unknownNode(stmt);
    }
  };

  // Runs the children in order until a Test comes out true.
  private loop = (loop: Loop): void => {
    while (true) {
      for (const node of loop.body) {
        if (node.type === "Test") {
          if (this.test(node)) return;
        } else this.exec(node);
      }
    }
  };

  private test = (test: Test): boolean => this.boolean(test.cond);

  private print = (stmt: Write | Writeln): void => {
    if (!stmt.value) return;
    const width = stmt.width ? this.number(stmt.width) : 0;

    if (stmt.value.type === "StringConstant") {
      this.write(formatString(stmt.value.value, width));
      return;
    }
    const decimals = stmt.decimals ? this.number(stmt.decimals) : 0;
    this.write(formatNumber(this.number(stmt.value), width, decimals));
  };

  private eval = (expr: Expression): Value => {
    switch (expr.type) {
      case "IntegerConstant":
      case "RealConstant":
      case "StringConstant": {
        return expr.value;
      }
      case "Variable": {
        return this.entry(expr).getValue();
      }
      case "UnaryOp": {
        const { op } = expr;
        switch (op) {
          case "Not":
            return !this.boolean(expr.argument);
          case "Negate":
            return -this.number(expr.argument);
          case "Positive":
            return this.number(expr.argument);
          default:
            return unknownNode(op);
        }
      }
      case "BinOp": {
        return this.binOp(expr);
      }
      default:
        return unknownNode(expr);
    }
  };

  private binOp = (expr: BinOp): Value => {
    // no short circuit: both sides always run
    if (expr.op === "And" || expr.op === "Or") {
      const left = this.boolean(expr.left);
      const right = this.boolean(expr.right);
      return expr.op === "And" ? left && right : left || right;
    }

    const { op } = expr;
    const left = this.number(expr.left);
    const right = this.number(expr.right);

    switch (op) {
      case "Eq":
        return left === right;
      case "Ne":
        return left !== right;
      case "Lt":
        return left < right;
      case "Le":
        return left <= right;
      case "Gt":
        return left > right;
      case "Ge":
        return left >= right;
      case "Add":
        return left + right;
      case "Subtract":
        return left - right;
      case "Multiply":
        return left * right;
      case "Divide":
        return left / this.divisor(expr, right);
      case "IntegerDivide":
        return Math.trunc(left / this.divisor(expr, right));
      case "Modulus":
        return left % this.divisor(expr, right);
      default:
        return unknownNode(op);
    }
  };

  private divisor = (expr: BinOp, value: number): number => {
    if (value === 0) {
      throw new RuntimeError(expr.line, "Division by zero", expr.text);
    }
    return value;
  };

  private entry = (variable: Variable): SymtabEntry =>
    this.symtab.lookup(variable.name) ??
      err("Interpreter", `No entry for variable '${variable.text}'`);

  private number = (expr: Expression): number => {
    const value = this.eval(expr);
    return typeof value === "number"
      ? value
      : err("Interpreter", `Expected a number at line ${expr.line}`);
  };

  private boolean = (expr: Expression): boolean => {
    const value = this.eval(expr);
    return typeof value === "boolean"
      ? value
      : err("Interpreter", `Expected a boolean at line ${expr.line}`);
  };
}
