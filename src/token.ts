export enum TokenType {
  OP_ADD,
  OP_SUB,
  OP_MUL,
  OP_DIV,
  OP_MOD,
  OP_POW,
  OP_EQ,
  NUM,
  VAR,
  FUNC,
  IDENT,
  LET,
  FN,
  LPAREN,
  RPAREN,
  PIPE,
  COMMA,
  EOF,
}

export const BUILTINS = ["sin", "cos", "tan", "log", "ln"] as const;
export type Builtin = typeof BUILTINS[number];

export type Token =
  | { type: TokenType.NUM; value: number }
  | { type: TokenType.VAR; name: string }
  | { type: TokenType.FUNC; name: Builtin }
  | { type: TokenType.IDENT; name: string }
  | {
    type:
      | TokenType.OP_ADD
      | TokenType.OP_SUB
      | TokenType.OP_MUL
      | TokenType.OP_DIV
      | TokenType.OP_MOD
      | TokenType.OP_POW
      | TokenType.OP_EQ
      | TokenType.LET
      | TokenType.FN
      | TokenType.LPAREN
      | TokenType.RPAREN
      | TokenType.PIPE
      | TokenType.COMMA
      | TokenType.EOF;
  };

export type BinaryOperator =
  | TokenType.OP_ADD
  | TokenType.OP_SUB
  | TokenType.OP_MUL
  | TokenType.OP_DIV
  | TokenType.OP_MOD;

export const isBuiltin = (name: string): name is Builtin =>
  BUILTINS.some((builtin) => builtin === name);

// how a token is shown back to the user
export const describeToken = (tok: Token): string => {
  switch (tok.type) {
    case TokenType.NUM:
      return String(tok.value);
    case TokenType.VAR:
    case TokenType.FUNC:
    case TokenType.IDENT:
      return tok.name;
    case TokenType.OP_ADD:
      return "+";
    case TokenType.OP_SUB:
      return "-";
    case TokenType.OP_MUL:
      return "*";
    case TokenType.OP_DIV:
      return "/";
    case TokenType.OP_MOD:
      return "%";
    case TokenType.OP_POW:
      return "^";
    case TokenType.OP_EQ:
      return "=";
    case TokenType.LET:
      return "let";
    case TokenType.FN:
      return "fn";
    case TokenType.LPAREN:
      return "(";
    case TokenType.RPAREN:
      return ")";
    case TokenType.PIPE:
      return "|";
    case TokenType.COMMA:
      return ",";
    case TokenType.EOF:
      return "end of input";
  }
};
