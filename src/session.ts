import { formatStmt } from "./ast.js";
import { type Env, Interpreter } from "./ast-walking/interpreter.js";
import { formatError, TallyError } from "./errors.js";
import { History } from "./history.js";
import { parse } from "./parser.js";
import { saveRc } from "./rc.js";
import { formatNumber } from "./utils.js";

export type EvalResult =
  | { ok: true; output: string; value?: number }
  | { ok: false; error: string };

/** One calculator session: an interpreter plus the expression history */
export class Session {
  public readonly history = new History();

  constructor(public readonly interpreter: Interpreter = new Interpreter()) {}

  /** Evaluates one line; a failed line changes nothing */
  public eval = (line: string): EvalResult => {
    try {
      const stmt = parse(line);
      const outcome = this.interpreter.execute(stmt);
      if (outcome.type === "Declared") {
        return { ok: true, output: formatStmt(stmt) };
      }
      this.history.push(outcome.expr);
      return {
        ok: true,
        output: formatNumber(outcome.value),
        value: outcome.value,
      };
    } catch (e) {
      // a long flat chain parses fine but is too deep to walk
      if (e instanceof RangeError) {
        return { ok: false, error: "ERROR: Expression nested too deeply" };
      }
      if (!(e instanceof TallyError)) throw e;
      return { ok: false, error: formatError(e) };
    }
  };

  public env = (): Env => this.interpreter.env();

  /** Writes the environment to `file`; a failed write leaves the session usable */
  public save = async (file: string): Promise<EvalResult> => {
    try {
      await saveRc(file, this.interpreter);
    } catch (e) {
      if (!(e instanceof Error && "code" in e)) throw e;
      return {
        ok: false,
        error: `ERROR: Failed to write to rc file, ${e.message}`,
      };
    }
    return { ok: true, output: `Saved to ${file}` };
  };

  public resetVars = (): void => {
    this.interpreter.resetVars();
  };

  public resetHistory = (): void => {
    this.history.clear();
  };
}
