#!/usr/bin/env node

/**
 * vtt-toolkit CLI: clean / split / merge / compress WebVTT subtitles.
 *
 * Usage:
 *   vtt-toolkit clean --in input.vtt --fix
 *   vtt-toolkit split --in input_fixed.vtt --out_dir parts --minutes 10
 *   vtt-toolkit merge --parts_dir parts --pattern "*english.vtt" --out merged_english.vtt
 *   vtt-toolkit compress --in merged_english.vtt --out merged_english_compressed.vtt
 *   vtt-toolkit cleansplit --in input.vtt --out_dir parts --minutes 10
 *   vtt-toolkit mergecompress --parts_dir parts --pattern "*english.vtt" --out final.vtt
 *   vtt-toolkit cleancompresssplit --in input.vtt --out_dir parts
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { formatCleanReport, runClean } from "../commands/clean.js";
import { formatCompressReport, runCompress } from "../commands/compress.js";
import { formatMergeReport, runMerge } from "../commands/merge.js";
import { runCleanCompressSplit, runCleanSplit, runMergeCompress } from "../commands/pipelines.js";
import { formatSplitReport, runSplit } from "../commands/split.js";
import { type Defaults, loadConfig } from "../config.js";
import { InvalidOptionsError, VttToolkitError, formatErrorForUser } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { resolveTildePath } from "../utils/path.js";

const logger = createLogger("cli");

const CLI_OPTIONS = {
  in: { type: "string" },
  out: { type: "string" },
  out_dir: { type: "string" },
  parts_dir: { type: "string" },
  pattern: { type: "string" },
  minutes: { type: "string" },
  rebase: { type: "boolean" },
  start_at_zero: { type: "boolean" },
  gap_ms: { type: "string" },
  max_chars: { type: "string" },
  fix: { type: "boolean" },
  show: { type: "string" },
} as const;

function parseCliArgs(args: string[]) {
  return parseArgs({ args, options: CLI_OPTIONS, strict: true });
}

type CliValues = ReturnType<typeof parseCliArgs>["values"];

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value === "") {
    throw new InvalidOptionsError(`${flag} is required`);
  }
  return value;
}

function requiredPath(value: string | undefined, flag: string): string {
  return resolveTildePath(required(value, flag));
}

function optionalPath(value: string | undefined): string | undefined {
  return value ? resolveTildePath(value) : undefined;
}

function toNumber(raw: string | undefined, fallback: number): number {
  return raw === undefined ? fallback : Number(raw);
}

function print(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function chunking(values: CliValues, defaults: Defaults) {
  return {
    minutes: toNumber(values.minutes, defaults.chunkMinutes),
    rebase: values.rebase ?? false,
    startAtZero: values.start_at_zero ?? false,
  };
}

function compression(values: CliValues, defaults: Defaults) {
  return {
    gapMs: toNumber(values.gap_ms, defaults.gapMs),
    maxChars: toNumber(values.max_chars, defaults.maxChars),
  };
}

async function dispatch(command: string, values: CliValues, defaults: Defaults): Promise<void> {
  switch (command) {
    case "clean": {
      const show = toNumber(values.show, defaults.showLimit);
      const result = await runClean({
        input: requiredPath(values.in, "--in"),
        output: optionalPath(values.out),
        fix: values.fix ?? false,
        show,
      });
      print(formatCleanReport(result, show));
      return;
    }
    case "split": {
      const result = await runSplit({
        input: requiredPath(values.in, "--in"),
        outDir: optionalPath(values.out_dir),
        ...chunking(values, defaults),
      });
      print(formatSplitReport(result));
      return;
    }
    case "merge": {
      const result = await runMerge({
        partsDir: requiredPath(values.parts_dir, "--parts_dir"),
        pattern: values.pattern ?? defaults.mergePattern,
        output: requiredPath(values.out, "--out"),
      });
      print(formatMergeReport(result));
      return;
    }
    case "compress": {
      const result = await runCompress({
        input: requiredPath(values.in, "--in"),
        output: requiredPath(values.out, "--out"),
        ...compression(values, defaults),
      });
      print(formatCompressReport(result));
      return;
    }
    case "cleansplit": {
      const result = await runCleanSplit({
        input: requiredPath(values.in, "--in"),
        outDir: requiredPath(values.out_dir, "--out_dir"),
        ...chunking(values, defaults),
      });
      print([`Clean+fix wrote: ${result.fixedPath}`, ...formatSplitReport(result.split)]);
      return;
    }
    case "mergecompress": {
      const result = await runMergeCompress({
        partsDir: requiredPath(values.parts_dir, "--parts_dir"),
        pattern: values.pattern ?? defaults.mergePattern,
        output: requiredPath(values.out, "--out"),
        ...compression(values, defaults),
      });
      print([...formatMergeReport(result.merge), ...formatCompressReport(result.compress)]);
      return;
    }
    case "cleancompresssplit": {
      const result = await runCleanCompressSplit({
        input: requiredPath(values.in, "--in"),
        outDir: requiredPath(values.out_dir, "--out_dir"),
        ...chunking(values, defaults),
        ...compression(values, defaults),
      });
      print([...formatCompressReport(result.compress), ...formatSplitReport(result.split)]);
      return;
    }
  }
}

const COMMANDS = new Set([
  "clean",
  "split",
  "merge",
  "compress",
  "cleansplit",
  "mergecompress",
  "cleancompresssplit",
]);

export function showHelp(): void {
  console.log(`
Usage: vtt-toolkit <command> [options]

Commands:
  clean               Check timestamps (--in, --fix, --out, --show)
  split               Split into N-minute parts (--in, --out_dir, --minutes, --rebase, --start_at_zero)
  merge               Merge parts chronologically (--parts_dir, --pattern, --out)
  compress            Merge adjacent short cues (--in, --out, --gap_ms, --max_chars)
  cleansplit          clean --fix, then split
  mergecompress       merge, then compress
  cleancompresssplit  clean --fix, compress, then split

Examples:
  vtt-toolkit clean --in input.vtt --fix
  vtt-toolkit mergecompress --parts_dir parts --pattern "*english.vtt" --out merged.vtt
`);
}

function isParseArgsError(error: unknown): error is Error {
  return (
    error instanceof TypeError &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  );
}

/** Runs one CLI invocation and returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  if (command === undefined || command === "help" || command === "--help") {
    showHelp();
    return 0;
  }
  if (!COMMANDS.has(command)) {
    console.error(`Unknown command: ${command}`);
    showHelp();
    return 1;
  }

  try {
    const { values } = parseCliArgs(rest);
    await dispatch(command, values, loadConfig().defaults);
    return 0;
  } catch (error) {
    if (error instanceof VttToolkitError) {
      logger.debug({ error, command }, "command failed");
      console.error(`[vtt-toolkit] ${command} failed: ${formatErrorForUser(error)}`);
      return 1;
    }
    if (isParseArgsError(error)) {
      console.error(`[vtt-toolkit] ${error.message}`);
      return 1;
    }
    throw error;
  }
}

// Only runs when executed directly, not when imported by tests
const isMain =
  process.argv[1] !== undefined &&
  realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
if (isMain) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("\n[vtt-toolkit] Failed:", error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
