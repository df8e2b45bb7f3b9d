import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

/**
 * Loads `ENV_FILE` when set, otherwise `.env.local` then `.env` from the
 * working directory. Variables already present in the environment win.
 */
export function loadEnv(cwd: string = process.cwd()): { loaded: string[] } {
  const explicit = process.env.ENV_FILE;
  const candidates = explicit
    ? [path.isAbsolute(explicit) ? explicit : path.resolve(cwd, explicit)]
    : [path.resolve(cwd, ".env.local"), path.resolve(cwd, ".env")];

  const loaded: string[] = [];
  for (const file of candidates) {
    if (!fs.existsSync(file)) continue;
    dotenv.config({ path: file, override: false });
    loaded.push(file);
  }
  return { loaded };
}
