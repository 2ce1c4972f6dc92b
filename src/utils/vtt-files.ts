import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { renderLines, toLines } from "../vtt/document.js";

/** Reads a document as UTF-8, BOM stripped, line endings normalized. */
export async function readVttLines(path: string): Promise<string[]> {
  return toLines(await readFile(path, "utf8"));
}

/** Writes UTF-8 without BOM, ending in a single newline. */
export async function writeVttLines(path: string, lines: readonly string[]): Promise<void> {
  await writeFile(path, renderLines(lines), "utf8");
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|[\]\\]/g, "\\$&");
}

/** Single-segment wildcard (`*`, `?`) to an anchored RegExp. */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((char) => {
      if (char === "*") return ".*";
      if (char === "?") return ".";
      return escapeRegExp(char);
    })
    .join("");
  return new RegExp(`^${source}$`);
}

/** Regular files directly inside `dir` whose names match `pattern`, sorted by name. */
export async function listMatchingFiles(dir: string, pattern: string): Promise<string[]> {
  const matcher = wildcardToRegExp(pattern);
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && matcher.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}
