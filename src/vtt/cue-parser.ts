import { isBlank } from "./document.js";
import { tryDecodeTimestamp } from "./timestamp.js";
import type { Cue, CueScanResult, TimestampLineMatch } from "./types.js";

const TIMESTAMP_LINE_REGEX = /^\s*(.+?)\s*-->\s*(.+?)(\s+.*)?$/;

/**
 * Matches `<start> --> <end>[ <settings>]`. The end is the first
 * whitespace-delimited token on the right; the rest is kept as settings.
 */
export function matchTimestampLine(line: string): TimestampLineMatch | null {
  const match = TIMESTAMP_LINE_REGEX.exec(line);
  if (!match) {
    return null;
  }

  const startRaw = match[1].trim();
  const endRaw = match[2].trim().split(/\s+/)[0];
  return { startRaw, endRaw, settings: match[3] ?? "" };
}

/**
 * Scans body lines into cue blocks. Blocks whose timestamps cannot be decoded
 * are reported as skipped and scanning resumes on the following line.
 */
export function scanCueBlocks(lines: readonly string[]): CueScanResult[] {
  const results: CueScanResult[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    const match = matchTimestampLine(line);
    if (!match) {
      i++;
      continue;
    }

    const start = tryDecodeTimestamp(match.startRaw);
    const end = tryDecodeTimestamp(match.endRaw);
    if (!start.ok || !end.ok) {
      const reason = start.ok ? (end.ok ? "" : end.reason) : start.reason;
      results.push({ kind: "skipped", lineNumber: i + 1, line, reason });
      i++;
      continue;
    }

    const lineNumber = i + 1;
    i++;
    const textLines: string[] = [];
    while (i < lines.length && !isBlank(lines[i])) {
      textLines.push(lines[i]);
      i++;
    }
    while (i < lines.length && isBlank(lines[i])) {
      i++;
    }

    results.push({
      kind: "cue",
      cue: { startMs: start.ms, endMs: end.ms, textLines, timestampLine: line, lineNumber },
    });
  }

  return results;
}

/** Decodable cues in document order (not sorted by time). */
export function parseCues(lines: readonly string[]): Cue[] {
  const cues: Cue[] = [];
  for (const result of scanCueBlocks(lines)) {
    if (result.kind === "cue") {
      cues.push(result.cue);
    }
  }
  return cues;
}
