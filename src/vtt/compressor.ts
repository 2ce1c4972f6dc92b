/**
 * Cue compression: fuses temporally adjacent cues that do not yet end a
 * sentence into longer cues, bounded by a gap threshold and a character
 * budget.
 *
 * The fold is modelled as a one-state machine: `Accumulating(cue)` with a
 * single transition {@link absorb} that either extends the accumulator or
 * flushes it and starts over from the incoming cue.
 */

import { NoCuesParsedError } from "../utils/errors.js";
import { scanCueBlocks } from "./cue-parser.js";
import { DEFAULT_HEADER, splitHeaderAndBody } from "./document.js";
import { encodeTimestamp } from "./timestamp.js";
import type { CompressibleCue, CompressOptions } from "./types.js";

export const DEFAULT_COMPRESS_OPTIONS: CompressOptions = { gapMs: 500, maxChars: 130 };

const SENTENCE_END = new Set([".", "?", "!", "。", "？", "！", "…"]);
const TAG_REGEX = /<[^>]+>/g;
const WHITESPACE_RUN_REGEX = /\s+/g;

export function cleanCueText(text: string): string {
  return text.trim().replace(TAG_REGEX, "").replace(WHITESPACE_RUN_REGEX, " ");
}

/** Length in code points, so CJK and astral characters count once. */
export function countChars(text: string): number {
  return Array.from(text).length;
}

/** Empty text counts as terminated and never takes in a following cue. */
export function endsSentence(text: string): boolean {
  const cleaned = cleanCueText(text);
  if (!cleaned) {
    return true;
  }
  const chars = Array.from(cleaned);
  return SENTENCE_END.has(chars[chars.length - 1]);
}

export function shouldFuse(current: CompressibleCue, next: CompressibleCue, options: CompressOptions): boolean {
  const gap = next.startMs - current.endMs;
  return (
    gap <= options.gapMs &&
    !endsSentence(current.text) &&
    countChars(current.text) + 1 + countChars(next.text) <= options.maxChars
  );
}

export function fuse(current: CompressibleCue, next: CompressibleCue): CompressibleCue {
  return {
    startMs: current.startMs,
    endMs: Math.max(current.endMs, next.endMs),
    text: cleanCueText(`${current.text} ${next.text}`),
  };
}

export interface Accumulating {
  kind: "accumulating";
  cue: CompressibleCue;
}

export interface Transition {
  state: Accumulating;
  flushed?: CompressibleCue;
}

export function absorb(state: Accumulating, next: CompressibleCue, options: CompressOptions): Transition {
  if (shouldFuse(state.cue, next, options)) {
    return { state: { kind: "accumulating", cue: fuse(state.cue, next) } };
  }
  return { state: { kind: "accumulating", cue: next }, flushed: state.cue };
}

function compareByTime(a: CompressibleCue, b: CompressibleCue): number {
  return a.startMs - b.startMs || a.endMs - b.endMs;
}

export function compressCues(
  cues: readonly CompressibleCue[],
  options: CompressOptions = DEFAULT_COMPRESS_OPTIONS,
): CompressibleCue[] {
  if (cues.length === 0) {
    throw new NoCuesParsedError();
  }

  const [first, ...rest] = [...cues].sort(compareByTime);
  const merged: CompressibleCue[] = [];
  let state: Accumulating = { kind: "accumulating", cue: first };

  for (const next of rest) {
    const transition = absorb(state, next, options);
    if (transition.flushed) {
      merged.push(transition.flushed);
    }
    state = transition.state;
  }

  merged.push(state.cue);
  return merged;
}

/**
 * Reads cues for compression: markup stripped, whitespace collapsed, and a
 * reversed interval repaired so every cue satisfies end >= start.
 */
export function readCompressibleCues(lines: readonly string[]): CompressibleCue[] {
  const { body } = splitHeaderAndBody(lines);
  const cues: CompressibleCue[] = [];
  for (const result of scanCueBlocks(body)) {
    if (result.kind !== "cue") {
      continue;
    }
    const { startMs, endMs, textLines } = result.cue;
    cues.push({
      startMs: Math.min(startMs, endMs),
      endMs: Math.max(startMs, endMs),
      text: cleanCueText(textLines.map((line) => line.trim()).join(" ")),
    });
  }
  return cues;
}

export function renderCompressed(cues: readonly CompressibleCue[]): string[] {
  const lines = [...DEFAULT_HEADER];
  for (const cue of cues) {
    lines.push(`${encodeTimestamp(cue.startMs)} --> ${encodeTimestamp(cue.endMs)}`, cue.text, "");
  }
  return lines;
}

export interface CompressDocumentResult {
  lines: string[];
  cues: CompressibleCue[];
  inputCount: number;
  outputCount: number;
}

export function compressDocument(
  lines: readonly string[],
  options: CompressOptions = DEFAULT_COMPRESS_OPTIONS,
  source?: string,
): CompressDocumentResult {
  const input = readCompressibleCues(lines);
  if (input.length === 0) {
    throw new NoCuesParsedError(source);
  }

  const cues = compressCues(input, options);
  return {
    lines: renderCompressed(cues),
    cues,
    inputCount: input.length,
    outputCount: cues.length,
  };
}
