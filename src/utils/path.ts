import { homedir } from "node:os";
import { basename, dirname, extname, join, resolve } from "node:path";

/**
 * Resolves a path that may start with `~` to an absolute path using os.homedir().
 * Absolute paths pass through unchanged; relative paths resolve against cwd.
 */
export function resolveTildePath(p: string): string {
  if (p.startsWith("~/") || p === "~") {
    return resolve(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function fileStem(p: string): string {
  return basename(p, extname(p));
}

/** `dir/name.vtt` + `_fixed` -> `dir/name_fixed.vtt` */
export function withSuffix(p: string, suffix: string, ext = extname(p)): string {
  return join(dirname(p), `${fileStem(p)}${suffix}${ext}`);
}

export function fixedPath(p: string): string {
  return withSuffix(p, "_fixed");
}

export function compressedPath(p: string): string {
  return withSuffix(p, "_compressed");
}

export function tempMergedPath(output: string): string {
  return withSuffix(output, "_tmp_merged", ".vtt");
}

/** Part file name for 1-based part number `n`. */
export function partFileName(stem: string, n: number): string {
  return `${stem}_part${n}.vtt`;
}
