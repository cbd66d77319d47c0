import type { Expr } from "../ast.js";
import { EvalError } from "../errors.js";
import type { Value } from "../value.js";
import { type NativeFunc, nativeFuncs } from "./core.js";

export type UserFunc = { type: "UserFunc"; params: string[]; body: Expr }; // declared with `fn`

export type FuncVal = UserFunc | NativeFunc;

export const MAX_CALL_DEPTH = 256;

/** Runtime container for variables and functions */
export class Context {
  private vars = new Map<string, Value>();
  private funcs = new Map<string, UserFunc>();
  // one frame of parameter bindings per active call
  private scopes: Map<string, Value>[] = [];

  public enterScope = (bindings: Map<string, Value>): void => {
    if (this.scopes.length >= MAX_CALL_DEPTH) {
      throw new EvalError("Maximum call depth exceeded");
    }
    this.scopes.push(bindings);
  };

  public exitScope = (): void => {
    this.scopes.pop();
  };

  public depth = (): number => this.scopes.length;

  public setVar = (name: string, value: Value): void => {
    this.vars.set(name, value);
  };

  // parameters shadow globals; only the innermost frame is visible
  public getVar = (name: string): Value => {
    const frame: Map<string, Value> | undefined = this.scopes[this.scopes.length - 1];
    const local = frame?.get(name);
    if (local !== undefined) return local;
    const global = this.vars.get(name);
    if (global !== undefined) return global;
    throw new EvalError(`Unknown variable '${name}'`);
  };

  public setFunc = (name: string, params: string[], body: Expr): void => {
    this.funcs.set(name, { type: "UserFunc", params, body });
  };

  public getFunc = (name: string): FuncVal => {
    const fn = this.funcs.get(name) ?? nativeFuncs.get(name);
    if (fn !== undefined) return fn;
    throw new EvalError(`Undefined function '${name}'`);
  };

  public clearVars = (): void => {
    this.vars.clear();
  };

  public variables = (): [string, Value][] => [...this.vars];

  public functions = (): [string, UserFunc][] => [...this.funcs];
}
