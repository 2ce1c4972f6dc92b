import { basename } from "node:path";
import { type MergeParamsInput, MergeParams } from "../schemas/commands.js";
import { NoInputFilesError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { listMatchingFiles, readVttLines, writeVttLines } from "../utils/vtt-files.js";
import { mergeDocuments } from "../vtt/merger.js";
import type { NamedDocument } from "../vtt/types.js";
import { parseParams } from "./params.js";

const logger = createLogger("commands:merge");

export interface MergeCommandResult {
  output: string;
  /** File names in merge order. */
  order: string[];
}

/**
 * Merges every file in `partsDir` matching `pattern` into one document,
 * ordered by first cue time, then part number, then name.
 */
export async function runMerge(params: MergeParamsInput): Promise<MergeCommandResult> {
  const parsed = parseParams(MergeParams, params);
  const files = await listMatchingFiles(parsed.partsDir, parsed.pattern);
  if (files.length === 0) {
    throw new NoInputFilesError(parsed.partsDir, parsed.pattern);
  }

  const docs: NamedDocument[] = [];
  for (const file of files) {
    docs.push({ name: basename(file), lines: await readVttLines(file) });
  }
  const merged = mergeDocuments(docs);
  await writeVttLines(parsed.output, merged.lines);

  logger.info(
    { command: "merge", partsDir: parsed.partsDir, pattern: parsed.pattern, files: merged.order.length },
    "merge completed",
  );

  return { output: parsed.output, order: merged.order };
}

export function formatMergeReport(result: MergeCommandResult): string[] {
  return [
    "Merge order (sorted):",
    ...result.order.map((name) => `   ${name}`),
    "",
    `Merged ${result.order.length} files -> ${result.output}`,
  ];
}
