import type { Expr, Func, Stmt } from "./ast.js";
import { ParseError } from "./errors.js";
import { tokenize } from "./lexer.js";
import { type BinaryOperator, type Token, TokenType } from "./token.js";

// groupings, pipes, negations and arguments open one level each
export const MAX_NESTING = 256;

/**
 * Parser
 *
 * Without `letters`, a single-letter name becomes a `Var` node and is looked up
 * when evaluated, like any other name. With `letters`, single letters are
 * replaced by their value right here and an unmapped letter is a parse error.
 * The two mechanisms never mix within one parse.
 */
export class Parser {
  private pos = 0;
  private depth = 0;

  constructor(
    private tokens: Token[],
    private letters?: ReadonlyMap<string, number>,
  ) {
    const last = tokens[tokens.length - 1];
    if (last === undefined || last.type !== TokenType.EOF) {
      this.tokens = [...tokens, { type: TokenType.EOF }];
    }
  }

  private peek = (): Token => this.tokens[this.pos];

  private atEnd = (): boolean => this.peek().type === TokenType.EOF;

  private advance = (): Token => {
    const tok = this.peek();
    if (!this.atEnd()) this.pos++;
    return tok;
  };

  private check = (type: TokenType): boolean =>
    !this.atEnd() && this.peek().type === type;

  private consume = (type: TokenType, msg: string): Token => {
    if (this.check(type)) return this.advance();
    throw new ParseError(this.peek(), msg);
  };

  public parse = (): Stmt => {
    let stmt: Stmt;
    switch (this.peek().type) {
      case TokenType.FN:
        stmt = this.fnDecl();
        break;
      case TokenType.LET:
        stmt = this.assign();
        break;
      default:
        stmt = { type: "Expr", expr: this.expression() };
    }
    if (!this.atEnd()) throw new ParseError(this.peek(), "Unexpected token");
    return stmt;
  };

  // VAR and IDENT both name things; the split only matters to `letters`
  private name = (msg: string): string => {
    const tok = this.peek();
    if (tok.type === TokenType.VAR || tok.type === TokenType.IDENT) {
      this.advance();
      return tok.name;
    }
    throw new ParseError(tok, msg);
  };

  private fnDecl = (): Stmt => {
    this.advance();
    const name = this.name("Expected function name");
    this.consume(TokenType.LPAREN, "Missing opening parentheses");
    const params: string[] = [];
    if (!this.check(TokenType.RPAREN)) {
      do {
        const tok = this.peek();
        const param = this.name("Expected parameter name");
        if (params.includes(param)) {
          throw new ParseError(tok, "Duplicate parameter name");
        }
        params.push(param);
      } while (this.check(TokenType.COMMA) && this.advance());
    }
    this.consume(TokenType.RPAREN, "Missing closing parentheses");
    const body = this.expression();
    return { type: "Fn", name, params, body };
  };

  private assign = (): Stmt => {
    this.advance();
    const name = this.name("Expected variable name");
    this.consume(TokenType.OP_EQ, "Expected '='");
    const value = this.expression();
    return { type: "Assign", name, value };
  };

  private expression = (): Expr => this.term();

  private binaryChain = (
    ops: BinaryOperator[],
    next: () => Expr,
  ): Expr => {
    let left = next();
    for (;;) {
      const op = ops.find((o) => o === this.peek().type);
      if (op === undefined) return left;
      this.advance();
      const right = next();
      left = { type: "Binary", op, left, right };
    }
  };

  private term = (): Expr =>
    this.binaryChain([TokenType.OP_ADD, TokenType.OP_SUB], this.factor);

  private factor = (): Expr =>
    this.binaryChain(
      [TokenType.OP_MUL, TokenType.OP_DIV, TokenType.OP_MOD],
      this.exponent,
    );

  // folds to the left: 2^3^2 is (2^3)^2
  private exponent = (): Expr => {
    let base = this.unary();
    while (this.peek().type === TokenType.OP_POW) {
      this.advance();
      const exponent = this.unary();
      base = { type: "Exponent", base, exponent };
    }
    return base;
  };

  private unary = (): Expr => {
    if (++this.depth > MAX_NESTING) {
      throw new ParseError(this.peek(), "Expression nested too deeply");
    }
    try {
      if (this.peek().type === TokenType.OP_SUB) {
        this.advance();
        return { type: "Negative", argument: this.unary() };
      }
      return this.primary();
    } finally {
      this.depth--;
    }
  };

  private primary = (): Expr => {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.NUM: {
        this.advance();
        return { type: "Num", value: tok.value };
      }
      case TokenType.LPAREN: {
        this.advance();
        const argument = this.expression();
        this.consume(TokenType.RPAREN, "Missing closing parentheses");
        return { type: "Grouping", argument };
      }
      case TokenType.PIPE: {
        this.advance();
        const argument = this.expression();
        this.consume(TokenType.PIPE, "Missing closing pipe");
        return { type: "Abs", argument };
      }
      case TokenType.VAR: {
        if (this.letters !== undefined) {
          const value = this.letters.get(tok.name);
          if (value === undefined) {
            throw new ParseError(tok, "Unknown variable");
          }
          this.advance();
          return { type: "Num", value };
        }
        return this.reference(tok.name);
      }
      case TokenType.IDENT: {
        return this.reference(tok.name);
      }
      case TokenType.FUNC: {
        this.advance();
        let func: Func;
        if (tok.name === "log") {
          const base = this.advance();
          if (base.type !== TokenType.NUM) {
            throw new ParseError(tok, "Missing base for log function");
          }
          func = { kind: "log", base: base.value };
        } else {
          func = { kind: tok.name };
        }
        this.consume(TokenType.LPAREN, "Missing opening parentheses");
        const argument = this.expression();
        this.consume(TokenType.RPAREN, "Missing closing parentheses");
        return { type: "Func", func, argument };
      }
      default:
        throw new ParseError(tok, "Expected expression");
    }
  };

  private reference = (name: string): Expr => {
    this.advance();
    if (!this.check(TokenType.LPAREN)) return { type: "Var", name };
    this.advance();
    const args: Expr[] = [];
    if (!this.check(TokenType.RPAREN)) {
      do {
        args.push(this.expression());
      } while (this.check(TokenType.COMMA) && this.advance());
    }
    this.consume(TokenType.RPAREN, "Missing closing parentheses");
    return { type: "Call", name, args };
  };
}

export const parse = (
  src: string,
  letters?: ReadonlyMap<string, number>,
): Stmt => new Parser(tokenize(src), letters).parse();
