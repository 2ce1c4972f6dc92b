import { dirname, join } from "node:path";
import { type SplitParamsInput, SplitParams } from "../schemas/commands.js";
import { createLogger } from "../utils/logger.js";
import { fileStem, partFileName } from "../utils/path.js";
import { ensureDir, readVttLines, writeVttLines } from "../utils/vtt-files.js";
import { chunkCues } from "../vtt/chunker.js";
import { parseCues } from "../vtt/cue-parser.js";
import { splitHeaderAndBody } from "../vtt/document.js";
import { parseParams } from "./params.js";

const logger = createLogger("commands:split");

const MS_PER_MINUTE = 60_000;

export interface SplitResult {
  input: string;
  outDir: string;
  cueCount: number;
  files: string[];
}

/**
 * Splits a document into `<stem>_part<N>.vtt` files of `minutes` each.
 * Nothing is written (and no directory created) when the input has no cues.
 */
export async function runSplit(params: SplitParamsInput): Promise<SplitResult> {
  const parsed = parseParams(SplitParams, params);
  const lines = await readVttLines(parsed.input);
  const { header, body } = splitHeaderAndBody(lines);
  const cues = parseCues(body);

  const chunks = chunkCues(cues, {
    chunkMs: parsed.minutes * MS_PER_MINUTE,
    startAtZero: parsed.startAtZero,
    rebase: parsed.rebase,
    header,
    source: parsed.input,
  });

  const outDir = parsed.outDir ?? dirname(parsed.input);
  await ensureDir(outDir);

  const stem = fileStem(parsed.input);
  const files: string[] = [];
  for (const chunk of chunks) {
    const file = join(outDir, partFileName(stem, chunk.partNumber));
    await writeVttLines(file, chunk.lines);
    files.push(file);
  }

  logger.info(
    { command: "split", input: parsed.input, cues: cues.length, parts: files.length, outDir },
    "split completed",
  );

  return { input: parsed.input, outDir, cueCount: cues.length, files };
}

export function formatSplitReport(result: SplitResult): string[] {
  return [`Split wrote ${result.files.length} file(s) -> ${result.outDir}`];
}
