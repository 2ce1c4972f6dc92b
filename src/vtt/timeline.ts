/**
 * Timeline checks and repairs over raw document lines.
 *
 * Both passes work line by line on the unparsed document so that a file can
 * be repaired before the cue parser would have to drop blocks from it.
 */

import { matchTimestampLine } from "./cue-parser.js";
import { encodeTimestamp, tryDecodeTimestamp } from "./timestamp.js";
import type { FixLogEntry, TimedCue, TimelineIssue } from "./types.js";

export interface TimelineCheckResult {
  issues: TimelineIssue[];
  cues: TimedCue[];
}

export interface TimelineFixResult {
  lines: string[];
  log: FixLogEntry[];
}

type DecodedLine =
  | { kind: "none" }
  | { kind: "failed"; startRaw: string; endRaw: string; reason: string }
  | { kind: "ok"; startRaw: string; endRaw: string; settings: string; startMs: number; endMs: number };

function decodeLine(line: string): DecodedLine {
  const match = matchTimestampLine(line);
  if (!match) {
    return { kind: "none" };
  }

  const { startRaw, endRaw, settings } = match;
  const start = tryDecodeTimestamp(startRaw);
  if (!start.ok) {
    return { kind: "failed", startRaw, endRaw, reason: start.reason };
  }
  const end = tryDecodeTimestamp(endRaw);
  if (!end.ok) {
    return { kind: "failed", startRaw, endRaw, reason: end.reason };
  }
  return { kind: "ok", startRaw, endRaw, settings, startMs: start.ms, endMs: end.ms };
}

/**
 * Read-only check. Flags undecodable lines, cues ending before they start,
 * starts going backwards and overlaps with the previous decodable cue.
 */
export function checkTimeline(lines: readonly string[]): TimelineCheckResult {
  const issues: TimelineIssue[] = [];
  const cues: TimedCue[] = [];

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const decoded = decodeLine(line);
    if (decoded.kind === "none") {
      return;
    }
    if (decoded.kind === "failed") {
      issues.push({ lineNumber, kind: "PARSE_FAIL", detail: decoded.reason, raw: line });
      return;
    }

    if (decoded.endMs < decoded.startMs) {
      issues.push({
        lineNumber,
        kind: "END_BEFORE_START",
        detail: `start=${decoded.startMs} end=${decoded.endMs}`,
        raw: line,
      });
    }
    cues.push({ lineNumber, startMs: decoded.startMs, endMs: decoded.endMs, raw: line });
  });

  for (let i = 1; i < cues.length; i++) {
    const previous = cues[i - 1];
    const current = cues[i];
    if (current.startMs < previous.startMs) {
      issues.push({
        lineNumber: current.lineNumber,
        kind: "START_DECREASED",
        detail: `prev_start=${previous.startMs} current_start=${current.startMs} (prev line ${previous.lineNumber})`,
        raw: current.raw,
      });
    }
    if (current.startMs < previous.endMs) {
      issues.push({
        lineNumber: current.lineNumber,
        kind: "OVERLAP",
        detail: `prev_end=${previous.endMs} current_start=${current.startMs} (prev line ${previous.lineNumber})`,
        raw: current.raw,
      });
    }
  }

  return { issues, cues };
}

/**
 * Rewrites every decodable timestamp line to canonical form, swapping start
 * and end when reversed. Cue settings after the end timestamp are kept.
 * Undecodable lines are left untouched and logged.
 */
export function fixTimeline(lines: readonly string[]): TimelineFixResult {
  const fixed: string[] = [];
  const log: FixLogEntry[] = [];

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const decoded = decodeLine(line);
    if (decoded.kind === "none") {
      fixed.push(line);
      return;
    }
    if (decoded.kind === "failed") {
      fixed.push(line);
      log.push({ lineNumber, action: "SKIP_UNPARSEABLE", detail: decoded.reason });
      return;
    }

    let { startMs, endMs } = decoded;
    const swapped = endMs < startMs;
    if (swapped) {
      [startMs, endMs] = [endMs, startMs];
    }

    const rendered = `${encodeTimestamp(startMs)} --> ${encodeTimestamp(endMs)}${decoded.settings}`.trimEnd();
    fixed.push(rendered);

    const detail = `${decoded.startRaw} --> ${decoded.endRaw}`;
    if (swapped) {
      log.push({ lineNumber, action: "SWAP_START_END", detail });
    } else if (line.trim() !== rendered.trim()) {
      log.push({ lineNumber, action: "NORMALIZE", detail });
    }
  });

  return { lines: fixed, log };
}
