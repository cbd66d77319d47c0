import { TokenizeError } from "./errors.js";
import { isBuiltin, type Token, TokenType } from "./token.js";
import { isalnum, isalpha, isdigit, isspace } from "./utils.js";

/**Lexer */
export class Lexer {
  private pos: number;
  private tok: Token;

  constructor(private src: string) {
    this.pos = 0;
    this.tok = { type: TokenType.EOF };
  }

  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "\0";

  private peek = (offset: number): string =>
    this.pos + offset < this.src.length ? this.src[this.pos + offset] : "\0";

  private bump = (): void => {
    this.pos++;
  };

  private skipSpaces = (): void => {
    while (isspace(this.current())) this.bump();
  };

  private parseNumber = (): number => {
    const start = this.pos;
    while (isdigit(this.current()) || this.current() === ".") this.bump();

    // exponent suffix, so that `1e+21` and `5e-7` read back as written
    if (this.current() === "e" || this.current() === "E") {
      const sign = this.peek(1) === "+" || this.peek(1) === "-" ? 1 : 0;
      if (isdigit(this.peek(1 + sign))) {
        this.pos += 1 + sign;
        while (isdigit(this.current())) this.bump();
      }
    }

    const text = this.src.slice(start, this.pos);
    const mantissa = text.split(/[eE]/)[0];
    const dots = mantissa.split(".").length - 1;
    if (dots > 1 || mantissa === ".") {
      throw new TokenizeError(`Invalid number: '${text}'`, text);
    }
    return Number(text);
  };

  private parseAlpha = (): string => {
    const start = this.pos;
    while (isalpha(this.current())) this.bump();
    // `log10(x)`: the base is a numeral glued to the name
    if (
      this.src.slice(start, this.pos) === "log" &&
      (isdigit(this.current()) || this.current() === ".")
    ) return "log";
    while (isalnum(this.current())) this.bump();
    return this.src.slice(start, this.pos);
  };

  public nextToken = (): void => {
    this.skipSpaces();
    const ch = this.current();
    if (ch === "\0") {
      this.tok = { type: TokenType.EOF };
      return;
    } else if (isdigit(ch) || ch === ".") {
      this.tok = { type: TokenType.NUM, value: this.parseNumber() };
      return;
    } else if (isalpha(ch)) {
      const ident = this.parseAlpha();
      switch (ident) {
        case "let": {
          this.tok = { type: TokenType.LET };
          return;
        }
        case "fn": {
          this.tok = { type: TokenType.FN };
          return;
        }
        default: {
          if (isBuiltin(ident)) {
            this.tok = { type: TokenType.FUNC, name: ident };
          } else if (ident.length === 1) {
            this.tok = { type: TokenType.VAR, name: ident };
          } else {
            this.tok = { type: TokenType.IDENT, name: ident };
          }
          return;
        }
      }
    }

    switch (ch) {
      case "+":
        this.tok = { type: TokenType.OP_ADD };
        break;
      case "-":
        this.tok = { type: TokenType.OP_SUB };
        break;
      case "*":
        this.tok = { type: TokenType.OP_MUL };
        break;
      case "/":
        this.tok = { type: TokenType.OP_DIV };
        break;
      case "%":
        this.tok = { type: TokenType.OP_MOD };
        break;
      case "^":
        this.tok = { type: TokenType.OP_POW };
        break;
      case "=":
        this.tok = { type: TokenType.OP_EQ };
        break;
      case "(":
        this.tok = { type: TokenType.LPAREN };
        break;
      case ")":
        this.tok = { type: TokenType.RPAREN };
        break;
      case "|":
        this.tok = { type: TokenType.PIPE };
        break;
      case ",":
        this.tok = { type: TokenType.COMMA };
        break;
      default: {
        const unknown = String.fromCodePoint(this.src.codePointAt(this.pos) ?? 0);
        const column = [...this.src.slice(0, this.pos)].length;
        throw new TokenizeError(
          `Unknown character '${unknown}' at position ${column}`,
          unknown,
        );
      }
    }
    this.bump();
  };

  public currentToken = (): Token => {
    return this.tok;
  };

  /** Every token of the source, ending in exactly one EOF */
  public tokenize = (): Token[] => {
    const tokens: Token[] = [];
    do {
      this.nextToken();
      tokens.push(this.tok);
    } while (this.tok.type !== TokenType.EOF);
    return tokens;
  };
}

export const tokenize = (src: string): Token[] => new Lexer(src).tokenize();
