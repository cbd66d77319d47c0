export const isdigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

export const isalpha = (ch: string): boolean =>
  ch.length === 1 &&
  ((ch >= "A" && ch <= "Z") || (ch >= "a" && ch <= "z"));

export const isalnum = (ch: string): boolean =>
  isalpha(ch) || isdigit(ch) || ch === "_";

export const isspace = (ch: string): boolean =>
  ch === " " || ch === "\t" || ch === "\n" || ch === "\r";

/** Display form of a number: `inf`, `-inf` and `NaN` for the IEEE specials */
export const formatNumber = (n: number): string => {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0";
  return String(n);
};

/**
 * Text that the lexer reads back as the same number. The specials have no
 * literal, so they are written as the division that produces them.
 */
export const numberToInput = (n: number): string => {
  if (Number.isNaN(n)) return "0/0";
  if (n === Infinity) return "1/0";
  if (n === -Infinity) return "-1/0";
  if (Object.is(n, -0)) return "-0";
  return String(n);
};

/** A numeral the lexer reads back as `n`; literals too large for a double are infinite */
export const numberToLiteral = (n: number): string =>
  n === Infinity ? "1e999" : String(n);
