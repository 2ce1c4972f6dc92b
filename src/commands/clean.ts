import { type CleanParamsInput, CleanParams } from "../schemas/commands.js";
import { createLogger } from "../utils/logger.js";
import { fixedPath } from "../utils/path.js";
import { readVttLines, writeVttLines } from "../utils/vtt-files.js";
import { checkTimeline, fixTimeline } from "../vtt/timeline.js";
import type { FixLogEntry, TimelineIssue } from "../vtt/types.js";
import { limitReport, parseParams } from "./params.js";

const logger = createLogger("commands:clean");

export interface CleanResult {
  input: string;
  cueCount: number;
  issues: TimelineIssue[];
  fixed?: {
    output: string;
    log: FixLogEntry[];
  };
}

/**
 * Checks every timestamp line of a document. With `fix`, also writes the
 * normalized document (default: `<stem>_fixed<ext>` beside the input).
 */
export async function runClean(params: CleanParamsInput): Promise<CleanResult> {
  const parsed = parseParams(CleanParams, params);
  const lines = await readVttLines(parsed.input);
  const { issues, cues } = checkTimeline(lines);

  const result: CleanResult = { input: parsed.input, cueCount: cues.length, issues };

  if (parsed.fix) {
    const output = parsed.output ?? fixedPath(parsed.input);
    const fixed = fixTimeline(lines);
    await writeVttLines(output, fixed.lines);
    result.fixed = { output, log: fixed.log };
  }

  logger.info(
    {
      command: "clean",
      input: parsed.input,
      cues: cues.length,
      issues: issues.length,
      fixes: result.fixed?.log.length,
    },
    "clean completed",
  );

  return result;
}

export function formatCleanReport(result: CleanResult, show: number): string[] {
  const lines = [`Checked: ${result.input}`, `Issues found: ${result.issues.length}`];
  lines.push(
    ...limitReport(
      result.issues.map((issue) => [
        `[Line ${issue.lineNumber}] ${issue.kind}: ${issue.detail}`,
        `  ${issue.raw}`,
      ]),
      show,
    ),
  );

  if (result.fixed) {
    lines.push(
      "",
      "=== Fix mode ===",
      `Wrote: ${result.fixed.output}`,
      `Timestamp lines normalized/swapped/skipped: ${result.fixed.log.length}`,
    );
    lines.push(
      ...limitReport(
        result.fixed.log.map((entry) => [`[Line ${entry.lineNumber}] ${entry.action}: ${entry.detail}`]),
        show,
      ),
    );
  }

  return lines;
}
