import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export const RC_ENV = "TALLY_RC";
export const RC_NAME = ".tallyrc";

export type Config = {
  rcFile: string;
};

/** `--rc` wins over `$TALLY_RC`, which wins over `~/.tallyrc` */
export const resolveConfig = (
  opts: { rc?: string },
  env: NodeJS.ProcessEnv = process.env,
): Config => ({
  rcFile: opts.rc ?? env[RC_ENV] ?? join(homedir(), RC_NAME),
});

export const packageVersion = (): string => {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    typeof pkg === "object" && pkg !== null && "version" in pkg &&
    typeof pkg.version === "string"
  ) return pkg.version;
  return "0.0.0";
};
