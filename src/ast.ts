export type NodeType =
  | "Program"
  | "Compound"
  | "Assign"
  | "Loop"
  | "Test"
  | "If"
  | "Write"
  | "Writeln"
  | "BinOp"
  | "UnaryOp"
  | "Variable"
  | "IntegerConstant"
  | "RealConstant"
  | "StringConstant";

export type BinaryOperator =
  | "Add"
  | "Subtract"
  | "Multiply"
  | "Divide"
  | "IntegerDivide"
  | "Modulus"
  | "And"
  | "Or"
  | "Eq"
  | "Ne"
  | "Lt"
  | "Le"
  | "Gt"
  | "Ge";

export type UnaryOperator = "Not" | "Negate" | "Positive";

export interface Node {
  type: NodeType;
  line: number;
}

export interface Program extends Node {
  type: "Program";
  name: string;
  body: Compound;
}

export type Statement =
  | Compound
  | Assign
  | Loop
  | If
  | Write
  | Writeln;

export type Expression =
  | BinOp
  | UnaryOp
  | Variable
  | IntegerConstant
  | RealConstant
  | StringConstant;

export interface Compound extends Node {
  type: "Compound";
  body: Statement[];
}

export interface Assign extends Node {
  type: "Assign";
  target: Variable;
  value: Expression;
}

// Statements and exactly one Test. A leading test makes a pre-test loop
// (WHILE), a trailing one a post-test loop (REPEAT).
export interface Loop extends Node {
  type: "Loop";
  body: (Statement | Test)[];
}

export interface Test extends Node {
  type: "Test";
  cond: Expression;
}

export interface If extends Node {
  type: "If";
  test: Test;
  then: Statement;
  else?: Statement;
}

interface Output extends Node {
  value?: Variable | StringConstant;
  width?: IntegerConstant;
  decimals?: IntegerConstant;
}

export interface Write extends Output {
  type: "Write";
}

export interface Writeln extends Output {
  type: "Writeln";
}

export interface BinOp extends Node {
  type: "BinOp";
  op: BinaryOperator;
  text: string;
  left: Expression;
  right: Expression;
}

export interface UnaryOp extends Node {
  type: "UnaryOp";
  op: UnaryOperator;
  text: string;
  argument: Expression;
}

/** Refers to its symbol-table entry by lowercased name. */
export interface Variable extends Node {
  type: "Variable";
  name: string;
  text: string;
}

export interface IntegerConstant extends Node {
  type: "IntegerConstant";
  value: number;
}

export interface RealConstant extends Node {
  type: "RealConstant";
  value: number;
}

export interface StringConstant extends Node {
  type: "StringConstant";
  value: string;
}
