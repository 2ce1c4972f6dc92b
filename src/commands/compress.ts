import { type CompressParamsInput, CompressParams } from "../schemas/commands.js";
import { createLogger } from "../utils/logger.js";
import { readVttLines, writeVttLines } from "../utils/vtt-files.js";
import { compressDocument } from "../vtt/compressor.js";
import { parseParams } from "./params.js";

const logger = createLogger("commands:compress");

export interface CompressCommandResult {
  input: string;
  output: string;
  inputCount: number;
  outputCount: number;
}

export async function runCompress(params: CompressParamsInput): Promise<CompressCommandResult> {
  const parsed = parseParams(CompressParams, params);
  const lines = await readVttLines(parsed.input);
  const result = compressDocument(lines, { gapMs: parsed.gapMs, maxChars: parsed.maxChars }, parsed.input);
  await writeVttLines(parsed.output, result.lines);

  logger.info(
    { command: "compress", input: parsed.input, before: result.inputCount, after: result.outputCount },
    "compress completed",
  );

  return {
    input: parsed.input,
    output: parsed.output,
    inputCount: result.inputCount,
    outputCount: result.outputCount,
  };
}

export function formatCompressReport(result: CompressCommandResult): string[] {
  return [`Compressed cues: ${result.inputCount} -> ${result.outputCount}   Output: ${result.output}`];
}
