import type { Binary, Call, Expr, Func, Stmt } from "../ast.js";
import { EvalError } from "../errors.js";
import { TokenType } from "../token.js";
import { num, type Value } from "../value.js";
import { Context, type UserFunc } from "./context.js";

/** What one statement did to the environment */
export type Outcome =
  | { type: "Value"; value: number; expr: Expr }
  | { type: "Declared"; name: string };

export type Env = {
  vars: [string, Value][];
  funcs: [string, UserFunc][];
};

/**Interpreter */
export class Interpreter {
  private context: Context;

  constructor(ctx: Context = new Context()) {
    this.context = ctx;
  }

  public define = (name: string, value: Value): void => {
    this.context.setVar(name, value);
  };

  public declareFunction = (
    name: string,
    params: string[],
    body: Expr,
  ): void => {
    this.context.setFunc(name, params, body);
  };

  // variables go, functions stay
  public resetVars = (): void => {
    this.context.clearVars();
  };

  public env = (): Env => ({
    vars: this.context.variables(),
    funcs: this.context.functions(),
  });

  public interpretExpr = (expr: Expr): number => this.eval(expr);

  /** Runs one statement; `ans` follows every computed value */
  public execute = (stmt: Stmt): Outcome => {
    switch (stmt.type) {
      case "Expr": {
        const value = this.eval(stmt.expr);
        this.define("ans", num(value));
        return { type: "Value", value, expr: stmt.expr };
      }
      case "Assign": {
        const value = this.eval(stmt.value);
        this.define("ans", num(value));
        this.define(stmt.name, num(value));
        return { type: "Value", value, expr: stmt.value };
      }
      case "Fn": {
        this.declareFunction(stmt.name, stmt.params, stmt.body);
        return { type: "Declared", name: stmt.name };
      }
    }
  };

  private eval = (expr: Expr): number => {
    switch (expr.type) {
      case "Num":
        return expr.value;
      case "Negative":
        return -this.eval(expr.argument);
      case "Grouping":
        return this.eval(expr.argument);
      case "Abs":
        return Math.abs(this.eval(expr.argument));
      case "Binary":
        return this.binary(expr);
      case "Exponent":
        return Math.pow(this.eval(expr.base), this.eval(expr.exponent));
      case "Func":
        return applyFunc(expr.func, this.eval(expr.argument));
      case "Var":
        return this.context.getVar(expr.name).value;
      case "Call":
        return this.call(expr);
    }
  };

  private binary = (expr: Binary): number => {
    const left = this.eval(expr.left);
    const right = this.eval(expr.right);
    switch (expr.op) {
      case TokenType.OP_ADD:
        return left + right;
      case TokenType.OP_SUB:
        return left - right;
      case TokenType.OP_MUL:
        return left * right;
      case TokenType.OP_DIV:
        return left / right;
      case TokenType.OP_MOD:
        return left % right;
    }
  };

  private call = (expr: Call): number => {
    const fn = this.context.getFunc(expr.name);
    const arity = fn.type === "UserFunc" ? fn.params.length : fn.arity;
    if (arity !== expr.args.length) {
      throw new EvalError(
        `Function '${expr.name}' expects ${arity} argument${
          arity === 1 ? "" : "s"
        }, got ${expr.args.length}`,
      );
    }
    // arguments see the caller's scope
    const args = expr.args.map((arg) => this.eval(arg));
    if (fn.type === "NativeFunc") return fn.fn(...args);

    const bindings = new Map<string, Value>();
    fn.params.forEach((param, i) => bindings.set(param, num(args[i])));
    this.context.enterScope(bindings);
    try {
      return this.eval(fn.body);
    } finally {
      this.context.exitScope();
    }
  };
}

const applyFunc = (func: Func, x: number): number => {
  switch (func.kind) {
    case "sin":
      return Math.sin(x);
    case "cos":
      return Math.cos(x);
    case "tan":
      return Math.tan(x);
    case "ln":
      return Math.log(x);
    case "log":
      return Math.log(x) / Math.log(func.base);
  }
};
