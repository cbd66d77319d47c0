import { describeToken, type Token } from "./token.js";

/** Base class for every error raised while handling one line of input */
export class TallyError extends Error {
  constructor(public readonly from: string, message: string) {
    super(message);
    this.name = "TallyError";
  }
}

export class TokenizeError extends TallyError {
  constructor(message: string, public readonly text: string) {
    super("Tokenizer", message);
    this.name = "TokenizeError";
  }
}

/** Carries the token that broke an expectation */
export class ParseError extends TallyError {
  constructor(public readonly token: Token, message: string) {
    super("Parser", message);
    this.name = "ParseError";
  }

  public describe = (): string =>
    `${this.message} (at ${describeToken(this.token)})`;
}

export class EvalError extends TallyError {
  constructor(message: string) {
    super("Interpreter", message);
    this.name = "EvalError";
  }
}

export class RcError extends TallyError {
  constructor(
    public readonly file: string,
    public readonly line: number,
    cause: TallyError,
  ) {
    super("Rc", `${file}:${line}: ${cause.message}`);
    this.name = "RcError";
  }
}

export const formatError = (e: unknown): string => {
  if (e instanceof ParseError) return `ERROR: ${e.describe()}`;
  if (e instanceof Error) return `ERROR: ${e.message}`;
  return `ERROR: ${String(e)}`;
};
