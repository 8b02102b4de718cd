import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

/** `dir` and its ancestors, nearest first, at most `limit` levels above `dir`. */
function ancestors(dir: string, limit: number): string[] {
  const out = [path.resolve(dir)];
  for (let up = 0; up < limit; up++) {
    const parent = path.dirname(out[out.length - 1] ?? dir);
    if (out.includes(parent)) break;
    out.push(parent);
  }
  return out;
}

/**
 * Nearest directory at or above `startDir` holding `marker` (a relative path),
 * e.g. the checked-in tracker config. Throws REPO_ROOT_NOT_FOUND otherwise.
 */
export function findRepoRoot(startDir: string, marker: string, maxHops = 8): string {
  const root = ancestors(startDir, maxHops).find((dir) => fs.existsSync(path.join(dir, marker)));
  if (root === undefined) throw new Error(`REPO_ROOT_NOT_FOUND: ${marker} @ ${startDir}`);
  return root;
}

/**
 * KEY=value lines; `#` comments and surrounding quotes allowed.
 * Variables already present in `env` win.
 */
export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    if (key === undefined) continue;
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (env[key] == null) env[key] = val;
  }
}
