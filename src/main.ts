#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { Command } from "commander";
import { packageVersion, resolveConfig } from "./config.js";
import {
  describeToken,
  format,
  formatError,
  formatStmt,
  formatValue,
  Interpreter,
  loadRc,
  parse,
  Session,
  TallyError,
  tokenize,
} from "./mod.js";

const HELP = `Enter an expression, \`let x = expr\` or \`fn f(a, b) expr\`.
  .env      show variables and functions
  .history  show evaluated expressions
  .save     write variables and functions to the rc file
  .reset    forget all variables (functions are kept)
  .clear    forget the expression history
  .help     show this message
  .exit     leave`;

const openSession = async (rcFile: string): Promise<Session> => {
  const interpreter = new Interpreter();
  await loadRc(rcFile, interpreter);
  return new Session(interpreter);
};

const printEnv = (session: Session): void => {
  const { vars, funcs } = session.env();
  for (const [name, value] of vars) {
    console.log(`${name} = ${formatValue(value)}`);
  }
  for (const [name, fn] of funcs) {
    console.log(
      formatStmt({ type: "Fn", name, params: fn.params, body: fn.body }),
    );
  }
};

// true when the loop should stop
const command = async (
  session: Session,
  line: string,
  rcFile: string,
): Promise<boolean> => {
  switch (line) {
    case ".exit":
      return true;
    case ".help":
      console.log(HELP);
      break;
    case ".env":
      printEnv(session);
      break;
    case ".history":
      session.history.entries().forEach((expr, i) => {
        console.log(`${i + 1}  ${format(expr)}`);
      });
      break;
    case ".save": {
      const result = await session.save(rcFile);
      if (result.ok) console.log(result.output);
      else console.error(result.error);
      break;
    }
    case ".reset":
      session.resetVars();
      break;
    case ".clear":
      session.resetHistory();
      break;
    default:
      console.error(`Unknown command '${line}', try .help`);
  }
  return false;
};

const repl = async (rcFile: string): Promise<void> => {
  const session = await openSession(rcFile);
  console.log("tally REPL, .help for commands");

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    rl.setPrompt("> ");
    rl.prompt();
    for await (const raw of rl) {
      const line = raw.trim();
      if (line.startsWith(".")) {
        if (await command(session, line, rcFile)) break;
      } else if (line !== "") {
        const result = session.eval(line);
        if (result.ok) console.log(result.output);
        else console.error(result.error);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
};

const evaluate = async (rcFile: string, src: string): Promise<void> => {
  const session = await openSession(rcFile);
  const result = session.eval(src);
  if (result.ok) {
    console.log(result.output);
  } else {
    console.error(result.error);
    process.exitCode = 1;
  }
};

const printAST = (src: string): void => {
  console.log(JSON.stringify(parse(src), null, 2));
};

const printTokens = (src: string): void => {
  console.log(tokenize(src).map(describeToken).join(" "));
};

const main = async (): Promise<void> => {
  const program = new Command();
  program
    .name("tally")
    .version(packageVersion())
    .description("Interactive arithmetic expression calculator")
    .option("--rc <file>", "rc file holding saved variables and functions");

  const rcFile = (): string =>
    resolveConfig(program.opts<{ rc?: string }>()).rcFile;

  program
    .command("repl", { isDefault: true })
    .description("Start the interactive calculator")
    .action(async () => await repl(rcFile()));

  program
    .command("eval")
    .argument("<expr...>", "expression or statement")
    .description("Evaluate one line and print the result")
    .action(async (words: string[]) =>
      await evaluate(rcFile(), words.join(" "))
    );

  program
    .command("ast")
    .argument("<expr...>", "expression or statement")
    .description("Show the parsed statement")
    .action((words: string[]) => printAST(words.join(" ")));

  program
    .command("tokens")
    .argument("<expr...>", "expression or statement")
    .description("Show the tokens of a line")
    .action((words: string[]) => printTokens(words.join(" ")));

  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    if (!(e instanceof TallyError)) throw e;
    console.error(formatError(e));
    process.exitCode = 1;
  }
};

await main();
