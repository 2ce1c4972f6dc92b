export interface Cue {
  startMs: number;
  endMs: number;
  textLines: string[];
  /** Timestamp line as it appeared in the source (without line terminator). */
  timestampLine: string;
  /** 1-based line number within the scanned lines. */
  lineNumber: number;
}

export interface TimestampLineMatch {
  startRaw: string;
  endRaw: string;
  /** Trailing cue settings including their leading whitespace, or "". */
  settings: string;
}

export type CueScanResult =
  | { kind: "cue"; cue: Cue }
  | { kind: "skipped"; lineNumber: number; line: string; reason: string };

export type IssueKind = "PARSE_FAIL" | "END_BEFORE_START" | "START_DECREASED" | "OVERLAP";

export interface TimelineIssue {
  lineNumber: number;
  kind: IssueKind;
  detail: string;
  raw: string;
}

export type FixAction = "SKIP_UNPARSEABLE" | "SWAP_START_END" | "NORMALIZE";

export interface FixLogEntry {
  lineNumber: number;
  action: FixAction;
  detail: string;
}

export interface TimedCue {
  lineNumber: number;
  startMs: number;
  endMs: number;
  raw: string;
}

export interface Chunk {
  /** 0-based bucket index on the chunk grid. */
  index: number;
  /** 1-based number used in output file names. */
  partNumber: number;
  startMs: number;
  cues: Cue[];
  lines: string[];
}

export interface NamedDocument {
  name: string;
  lines: string[];
}

export interface CompressibleCue {
  startMs: number;
  endMs: number;
  /** Cleaned text: no markup, single spaces. */
  text: string;
}

export interface CompressOptions {
  gapMs: number;
  maxChars: number;
}
