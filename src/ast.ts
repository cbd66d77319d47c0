import { type BinaryOperator, describeToken } from "./token.js";
import { numberToLiteral } from "./utils.js";

export type NodeType =
  | "Num"
  | "Negative"
  | "Grouping"
  | "Abs"
  | "Binary"
  | "Exponent"
  | "Func"
  | "Var"
  | "Call";

export interface Node {
  type: NodeType;
}

export type Expr =
  | Num
  | Negative
  | Grouping
  | Abs
  | Binary
  | Exponent
  | FuncApp
  | Var
  | Call;

export interface Num extends Node {
  type: "Num";
  value: number;
}

export interface Negative extends Node {
  type: "Negative";
  argument: Expr;
}

export interface Grouping extends Node {
  type: "Grouping";
  argument: Expr;
}

export interface Abs extends Node {
  type: "Abs";
  argument: Expr;
}

export interface Binary extends Node {
  type: "Binary";
  op: BinaryOperator;
  left: Expr;
  right: Expr;
}

export interface Exponent extends Node {
  type: "Exponent";
  base: Expr;
  exponent: Expr;
}

/** Built-ins with their own syntax; only `log` carries data, its base */
export type Func =
  | { kind: "sin" }
  | { kind: "cos" }
  | { kind: "tan" }
  | { kind: "ln" }
  | { kind: "log"; base: number };

export interface FuncApp extends Node {
  type: "Func";
  func: Func;
  argument: Expr;
}

// resolved when evaluated, not when parsed
export interface Var extends Node {
  type: "Var";
  name: string;
}

export interface Call extends Node {
  type: "Call";
  name: string;
  args: Expr[];
}

export type Stmt =
  | { type: "Expr"; expr: Expr }
  | { type: "Assign"; name: string; value: Expr }
  | { type: "Fn"; name: string; params: string[]; body: Expr };

const formatFunc = (func: Func): string =>
  func.kind === "log" ? `log${numberToLiteral(func.base)}` : func.kind;

/** Source text that parses back to the same tree */
export const format = (expr: Expr): string => {
  switch (expr.type) {
    case "Num":
      return numberToLiteral(expr.value);
    case "Negative":
      return `-${format(expr.argument)}`;
    case "Grouping":
      return `(${format(expr.argument)})`;
    case "Abs":
      return `|${format(expr.argument)}|`;
    case "Binary":
      return `${format(expr.left)} ${describeToken({ type: expr.op })} ${
        format(expr.right)
      }`;
    case "Exponent":
      return `${format(expr.base)}^${format(expr.exponent)}`;
    case "Func":
      return `${formatFunc(expr.func)}(${format(expr.argument)})`;
    case "Var":
      return expr.name;
    case "Call":
      return `${expr.name}(${expr.args.map(format).join(", ")})`;
  }
};

export const formatStmt = (stmt: Stmt): string => {
  switch (stmt.type) {
    case "Expr":
      return format(stmt.expr);
    case "Assign":
      return `let ${stmt.name} = ${format(stmt.value)}`;
    case "Fn":
      return `fn ${stmt.name}(${stmt.params.join(", ")}) ${format(stmt.body)}`;
  }
};
