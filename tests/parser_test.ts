import { describe, expect, it } from "vitest";
import { type Expr, format, formatStmt } from "../src/ast.js";
import { ParseError } from "../src/errors.js";
import { tokenize } from "../src/lexer.js";
import { parse, Parser } from "../src/parser.js";
import { type Token, TokenType } from "../src/token.js";

const expr = (src: string): Expr => {
  const stmt = parse(src);
  if (stmt.type !== "Expr") throw new Error(`not an expression: ${src}`);
  return stmt.expr;
};

const parseError = (src: string): ParseError => {
  try {
    parse(src);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`parsed: ${src}`);
};

describe("Parser", () => {
  it("parses a sum", () => {
    expect(parse("10 + 5")).toEqual({
      type: "Expr",
      expr: {
        type: "Binary",
        op: TokenType.OP_ADD,
        left: { type: "Num", value: 10 },
        right: { type: "Num", value: 5 },
      },
    });
  });

  it("binds * tighter than +", () => {
    expect(expr("1 + 2 * 3")).toEqual({
      type: "Binary",
      op: TokenType.OP_ADD,
      left: { type: "Num", value: 1 },
      right: {
        type: "Binary",
        op: TokenType.OP_MUL,
        left: { type: "Num", value: 2 },
        right: { type: "Num", value: 3 },
      },
    });
  });

  it("keeps groupings in the tree", () => {
    expect(expr("(1 + 2) * 5")).toEqual({
      type: "Binary",
      op: TokenType.OP_MUL,
      left: {
        type: "Grouping",
        argument: {
          type: "Binary",
          op: TokenType.OP_ADD,
          left: { type: "Num", value: 1 },
          right: { type: "Num", value: 2 },
        },
      },
      right: { type: "Num", value: 5 },
    });
  });

  it("parses negation below division", () => {
    expect(expr("-(5)/1")).toEqual({
      type: "Binary",
      op: TokenType.OP_DIV,
      left: {
        type: "Negative",
        argument: { type: "Grouping", argument: { type: "Num", value: 5 } },
      },
      right: { type: "Num", value: 1 },
    });
  });

  it("chains unary minus", () => {
    expect(expr("--5")).toEqual({
      type: "Negative",
      argument: { type: "Negative", argument: { type: "Num", value: 5 } },
    });
  });

  it("folds exponents to the left", () => {
    expect(expr("2^3^2")).toEqual({
      type: "Exponent",
      base: {
        type: "Exponent",
        base: { type: "Num", value: 2 },
        exponent: { type: "Num", value: 3 },
      },
      exponent: { type: "Num", value: 2 },
    });
  });

  it("parses built-ins and absolute values", () => {
    expect(expr("log2(|x|) + sin(1)")).toEqual({
      type: "Binary",
      op: TokenType.OP_ADD,
      left: {
        type: "Func",
        func: { kind: "log", base: 2 },
        argument: { type: "Abs", argument: { type: "Var", name: "x" } },
      },
      right: {
        type: "Func",
        func: { kind: "sin" },
        argument: { type: "Num", value: 1 },
      },
    });
  });

  it("parses calls with full expressions as arguments", () => {
    expect(expr("foo(1, 2 * 3)")).toEqual({
      type: "Call",
      name: "foo",
      args: [
        { type: "Num", value: 1 },
        {
          type: "Binary",
          op: TokenType.OP_MUL,
          left: { type: "Num", value: 2 },
          right: { type: "Num", value: 3 },
        },
      ],
    });
    expect(expr("f()")).toEqual({ type: "Call", name: "f", args: [] });
  });

  it("parses numerals to their value", () => {
    for (const src of ["0", "42", "3.14", ".5", "7.", "1e+21", "2.5e-3"]) {
      expect(expr(src)).toEqual({ type: "Num", value: Number(src) });
    }
  });

  it("parses assignments", () => {
    expect(parse("let foo = sqrt(144)")).toEqual({
      type: "Assign",
      name: "foo",
      value: { type: "Call", name: "sqrt", args: [{ type: "Num", value: 144 }] },
    });
  });

  it("parses function declarations", () => {
    expect(parse("fn foo(x, y) x + y")).toEqual({
      type: "Fn",
      name: "foo",
      params: ["x", "y"],
      body: {
        type: "Binary",
        op: TokenType.OP_ADD,
        left: { type: "Var", name: "x" },
        right: { type: "Var", name: "y" },
      },
    });
    expect(parse("fn two() 2")).toEqual({
      type: "Fn",
      name: "two",
      params: [],
      body: { type: "Num", value: 2 },
    });
  });

  it("substitutes single letters when given a map", () => {
    const letters = new Map([["a", 1]]);
    expect(parse("a + 3", letters)).toEqual({
      type: "Expr",
      expr: {
        type: "Binary",
        op: TokenType.OP_ADD,
        left: { type: "Num", value: 1 },
        right: { type: "Num", value: 3 },
      },
    });
    expect(() => parse("b", letters)).toThrow(
      new ParseError({ type: TokenType.VAR, name: "b" }, "Unknown variable"),
    );
  });

  it("accepts a token list without EOF", () => {
    const tokens: Token[] = [{ type: TokenType.NUM, value: 4 }];
    expect(new Parser(tokens).parse()).toEqual({
      type: "Expr",
      expr: { type: "Num", value: 4 },
    });
  });
});

describe("Parser errors", () => {
  it.each<[string, string, Token]>([
    ["", "Expected expression", { type: TokenType.EOF }],
    ["-(5", "Missing closing parentheses", { type: TokenType.EOF }],
    ["|3", "Missing closing pipe", { type: TokenType.EOF }],
    ["foo(1, 2", "Missing closing parentheses", { type: TokenType.EOF }],
    ["sin(1", "Missing closing parentheses", { type: TokenType.EOF }],
    ["log(100)", "Missing base for log function", {
      type: TokenType.FUNC,
      name: "log",
    }],
    ["sin 1", "Missing opening parentheses", { type: TokenType.NUM, value: 1 }],
    ["1 +", "Expected expression", { type: TokenType.EOF }],
    ["1 2", "Unexpected token", { type: TokenType.NUM, value: 2 }],
    ["let = 3", "Expected variable name", { type: TokenType.OP_EQ }],
    ["let x 3", "Expected '='", { type: TokenType.NUM, value: 3 }],
    ["fn (x) x", "Expected function name", { type: TokenType.LPAREN }],
    ["fn f x", "Missing opening parentheses", { type: TokenType.VAR, name: "x" }],
    ["fn f(1) 1", "Expected parameter name", { type: TokenType.NUM, value: 1 }],
    ["fn f(x, x) x", "Duplicate parameter name", { type: TokenType.VAR, name: "x" }],
    ["fn f(x y", "Missing closing parentheses", { type: TokenType.VAR, name: "y" }],
  ])("%j fails with %s", (src, message, token) => {
    const e = parseError(src);
    expect(e.message).toBe(message);
    expect(e.token).toEqual(token);
  });

  it("stops at the nesting limit", () => {
    const e = parseError("(".repeat(300) + "1" + ")".repeat(300));
    expect(e.message).toBe("Expression nested too deeply");
    expect(e.token).toEqual({ type: TokenType.LPAREN });
  });

  it("accepts nesting just under the limit", () => {
    const src = "(".repeat(255) + "1" + ")".repeat(255);
    expect(parse(src).type).toBe("Expr");
  });

  it("describes the offending token", () => {
    expect(parseError("(1").describe()).toBe(
      "Missing closing parentheses (at end of input)",
    );
  });
});

describe("format", () => {
  it("prints source text", () => {
    expect(format(expr("-(5)/1"))).toBe("-(5) / 1");
    expect(format(expr("log10( 100 )+ln(2)"))).toBe("log10(100) + ln(2)");
    expect(formatStmt(parse("fn foo(a,b) a+b*5"))).toBe(
      "fn foo(a, b) a + b * 5",
    );
    expect(formatStmt(parse("let  x=|y|"))).toBe("let x = |y|");
  });

  it.each([
    "1 + 2 * 3",
    "(1 + 2) * 3",
    "-(5) / 1",
    "--5",
    "2^3^2",
    "-2^2",
    "|x - 3| % 2",
    "log10(100) + ln(2) - log2.5(x)",
    "sin(cos(tan(0.5)))",
    "foo(1, bar(2), x) / baz()",
    "1e+21 * 5e-7",
    "1e400 + log1e400(2)",
  ])("round-trips %s", (src) => {
    const tree = expr(src);
    expect(expr(format(tree))).toEqual(tree);
  });

  it("prints overflowing literals as numerals", () => {
    expect(format(expr("1e400"))).toBe("1e999");
    expect(format(expr("log1e400(2)"))).toBe("log1e999(2)");
  });

  it("formats what the lexer produced", () => {
    expect(tokenize(format(expr("3 % 2")))).toEqual(tokenize("3 % 2"));
  });
});
