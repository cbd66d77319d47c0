import { readFile, writeFile } from "node:fs/promises";
import { formatStmt } from "./ast.js";
import { Interpreter } from "./ast-walking/interpreter.js";
import { RcError, TallyError } from "./errors.js";
import { parse } from "./parser.js";
import { num, toInput } from "./value.js";

const readOrCreate = async (file: string): Promise<string> => {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    if (!(e instanceof Error) || !("code" in e) || e.code !== "ENOENT") throw e;
    await writeFile(file, "");
    return "";
  }
};

/**
 * Applies every `let`/`fn` line of the rc file to `interpreter`, in file
 * order. Lines are run against a scratch interpreter first, so a bad file
 * leaves `interpreter` untouched.
 */
export const loadRc = async (
  file: string,
  interpreter: Interpreter,
): Promise<void> => {
  const src = await readOrCreate(file);
  const scratch = new Interpreter();

  src.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === "") return;
    try {
      const stmt = parse(line);
      switch (stmt.type) {
        case "Assign": {
          const value = scratch.interpretExpr(stmt.value);
          scratch.define(stmt.name, num(value));
          break;
        }
        case "Fn": {
          scratch.declareFunction(stmt.name, stmt.params, stmt.body);
          break;
        }
        case "Expr":
          throw new TallyError("Rc", "Expected a 'let' or 'fn' line");
      }
    } catch (e) {
      if (e instanceof TallyError) throw new RcError(file, i + 1, e);
      throw e;
    }
  });

  const { vars, funcs } = scratch.env();
  for (const [name, value] of vars) interpreter.define(name, value);
  for (const [name, fn] of funcs) {
    interpreter.declareFunction(name, fn.params, fn.body);
  }
};

/** One line per variable, then one per function */
export const dumpRc = (interpreter: Interpreter): string => {
  const { vars, funcs } = interpreter.env();
  const lines = [
    ...vars.map(([name, value]) => toInput(name, value)),
    ...funcs.map(([name, fn]) =>
      formatStmt({ type: "Fn", name, params: fn.params, body: fn.body })
    ),
  ];
  return lines.length === 0 ? "" : lines.join("\n") + "\n";
};

export const saveRc = async (
  file: string,
  interpreter: Interpreter,
): Promise<void> => {
  await writeFile(file, dumpRc(interpreter));
};
