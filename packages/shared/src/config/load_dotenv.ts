import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { createLogger } from "../logging.js";

const log = createLogger({ component: "config" });

const ENV_FILES = [".env", ".env.local"] as const;

function hasWorkspaces(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
  } catch {
    return false;
  }
}

/**
 * Walk up from `startDir` to the first directory holding a `.env` file or the
 * workspace root `package.json`.
 */
export function findProjectRoot(startDir: string): string {
  let dir = resolve(startDir);
  for (;;) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath) && hasWorkspaces(pkgPath)) return dir;
    const parent = dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

/**
 * Parse one dotenv value. Quoted values keep `#`; unquoted values drop a
 * trailing ` # comment`.
 */
export function parseEnvValue(raw: string): string {
  const value = raw.trim();
  const quote = value[0];
  if (quote === '"' || quote === "'") {
    const end = value.indexOf(quote, 1);
    if (end > 0) return value.slice(1, end);
  }
  const comment = value.search(/\s#/);
  return comment >= 0 ? value.slice(0, comment).trimEnd() : value;
}

/**
 * Parse dotenv text into key/value pairs. Blank lines, comments and lines
 * without `=` are skipped; `export KEY=value` is accepted.
 */
export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, "");
    if (!trimmed || trimmed.startsWith("#")) continue;
    const idx = trimmed.indexOf("=");
    if (idx <= 0) continue;
    out[trimmed.slice(0, idx).trim()] = parseEnvValue(trimmed.slice(idx + 1));
  }
  return out;
}

/**
 * Load `.env` then `.env.local` from the project root into `process.env`.
 * Variables already present in the environment win.
 */
export function loadDotEnvIfPresent(cwd: string = process.cwd()): void {
  const root = findProjectRoot(cwd);
  for (const filename of ENV_FILES) {
    const fullPath = resolve(root, filename);
    if (!existsSync(fullPath)) continue;
    let text: string;
    try {
      text = readFileSync(fullPath, "utf8");
    } catch (err) {
      log.warn({ filename, err: err instanceof Error ? err.message : String(err) }, "Failed to read env file");
      continue;
    }
    for (const [key, value] of Object.entries(parseDotEnv(text))) {
      if (process.env[key] === undefined) process.env[key] = value;
    }
  }
}
