import { isDeepStrictEqual } from "node:util";
import { type Expr, format } from "./ast.js";

/**
 * Evaluated expressions, oldest first, without structural duplicates.
 *
 * `selected` may sit one past the last entry, which is where a fresh line is
 * typed; moving up from there lands on the newest entry.
 */
export class History {
  private exprs: Expr[] = [];
  private selected = 0;

  public entries = (): readonly Expr[] => this.exprs;

  public selection = (): number => this.selected;

  public push = (expr: Expr): void => {
    if (this.exprs.some((e) => isDeepStrictEqual(e, expr))) return;
    const atFresh = this.selected === this.exprs.length;
    this.exprs.push(expr);
    if (atFresh) this.selected = this.exprs.length;
  };

  public selectPrevious = (): string | undefined => {
    if (this.exprs.length === 0) return undefined;
    if (this.selected > 0) this.selected--;
    return format(this.exprs[this.selected]);
  };

  public selectNext = (): string | undefined => {
    if (this.exprs.length === 0) return undefined;
    if (this.selected < this.exprs.length - 1) this.selected++;
    else this.selected = this.exprs.length - 1;
    return format(this.exprs[this.selected]);
  };

  public removeSelected = (): Expr | undefined => {
    if (this.selected >= this.exprs.length) return undefined;
    const [removed] = this.exprs.splice(this.selected, 1);
    if (this.exprs.length > 0 && this.selected >= this.exprs.length) {
      this.selected--;
    }
    return removed;
  };

  public clear = (): void => {
    this.exprs = [];
    this.selected = 0;
  };
}
