/**
 * Composite commands. Each step communicates with the next through files
 * only; the pipeline stops at the first failure and intermediate files
 * are removed on a best-effort basis.
 */

import {
  type CleanCompressSplitParamsInput,
  type CleanSplitParamsInput,
  type MergeCompressParamsInput,
  CleanCompressSplitParams,
  CleanSplitParams,
  MergeCompressParams,
} from "../schemas/commands.js";
import { createLogger } from "../utils/logger.js";
import { compressedPath, fixedPath, tempMergedPath } from "../utils/path.js";
import { readVttLines, removeFile, writeVttLines } from "../utils/vtt-files.js";
import { fixTimeline } from "../vtt/timeline.js";
import type { FixLogEntry } from "../vtt/types.js";
import { type CompressCommandResult, runCompress } from "./compress.js";
import { type MergeCommandResult, runMerge } from "./merge.js";
import { parseParams } from "./params.js";
import { type SplitResult, runSplit } from "./split.js";

const logger = createLogger("commands:pipelines");

async function removeIntermediates(paths: readonly string[]): Promise<void> {
  for (const path of paths) {
    try {
      await removeFile(path);
    } catch (error) {
      logger.warn({ error, path }, "Failed to remove intermediate file");
    }
  }
}

async function writeFixed(input: string): Promise<{ path: string; log: FixLogEntry[] }> {
  const lines = await readVttLines(input);
  const fixed = fixTimeline(lines);
  const path = fixedPath(input);
  await writeVttLines(path, fixed.lines);
  logger.info({ step: "fix", input, output: path, fixes: fixed.log.length }, "clean+fix wrote file");
  return { path, log: fixed.log };
}

export interface CleanSplitResult {
  fixedPath: string;
  fixLog: FixLogEntry[];
  split: SplitResult;
}

/** Fix timestamps into `<stem>_fixed<ext>`, then split that file. The fixed file is kept. */
export async function runCleanSplit(params: CleanSplitParamsInput): Promise<CleanSplitResult> {
  const parsed = parseParams(CleanSplitParams, params);
  const fixed = await writeFixed(parsed.input);
  const split = await runSplit({
    input: fixed.path,
    outDir: parsed.outDir,
    minutes: parsed.minutes,
    rebase: parsed.rebase,
    startAtZero: parsed.startAtZero,
  });
  return { fixedPath: fixed.path, fixLog: fixed.log, split };
}

export interface MergeCompressResult {
  merge: MergeCommandResult;
  compress: CompressCommandResult;
}

/** Merge into a temporary file beside the output, then compress it into the output. */
export async function runMergeCompress(params: MergeCompressParamsInput): Promise<MergeCompressResult> {
  const parsed = parseParams(MergeCompressParams, params);
  const tempPath = tempMergedPath(parsed.output);
  // Only files this run has written are cleaned up.
  const created: string[] = [];

  try {
    const merge = await runMerge({ partsDir: parsed.partsDir, pattern: parsed.pattern, output: tempPath });
    created.push(tempPath);
    const compress = await runCompress({
      input: tempPath,
      output: parsed.output,
      gapMs: parsed.gapMs,
      maxChars: parsed.maxChars,
    });
    return { merge, compress };
  } finally {
    await removeIntermediates(created);
  }
}

export interface CleanCompressSplitResult {
  fixLog: FixLogEntry[];
  compress: CompressCommandResult;
  split: SplitResult;
}

/** Fix, compress, then split. Both intermediate files are removed afterwards. */
export async function runCleanCompressSplit(
  params: CleanCompressSplitParamsInput,
): Promise<CleanCompressSplitResult> {
  const parsed = parseParams(CleanCompressSplitParams, params);
  const compressedFile = compressedPath(parsed.input);
  const created: string[] = [];

  try {
    const fixed = await writeFixed(parsed.input);
    created.push(fixed.path);
    const compress = await runCompress({
      input: fixed.path,
      output: compressedFile,
      gapMs: parsed.gapMs,
      maxChars: parsed.maxChars,
    });
    created.push(compressedFile);
    const split = await runSplit({
      input: compressedFile,
      outDir: parsed.outDir,
      minutes: parsed.minutes,
      rebase: parsed.rebase,
      startAtZero: parsed.startAtZero,
    });
    return { fixLog: fixed.log, compress, split };
  } finally {
    await removeIntermediates(created);
  }
}
