export { Lexer, tokenize } from "./lexer.js";
export { parse, Parser } from "./parser.js";
export { Interpreter } from "./ast-walking/interpreter.js";
export type { Env, Outcome } from "./ast-walking/interpreter.js";
export { Context } from "./ast-walking/context.js";
export { Session } from "./session.js";
export type { EvalResult } from "./session.js";
export { History } from "./history.js";
export { dumpRc, loadRc, saveRc } from "./rc.js";
export { format, formatStmt } from "./ast.js";
export type { Expr, Func, Stmt } from "./ast.js";
export { describeToken, TokenType } from "./token.js";
export type { Token } from "./token.js";
export { formatValue, num, toInput } from "./value.js";
export type { Value } from "./value.js";
export {
  EvalError,
  formatError,
  ParseError,
  RcError,
  TallyError,
  TokenizeError,
} from "./errors.js";
