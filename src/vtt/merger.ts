import { NoInputFilesError } from "../utils/errors.js";
import { parseCues } from "./cue-parser.js";
import { ensureHeader, splitHeaderAndBody, trimBlankEdges } from "./document.js";
import type { NamedDocument } from "./types.js";

/** Sorts documents without any cue after every real one. */
export const NO_CUES_SENTINEL_MS = 10 ** 12;
/** Sorts names without a part number after every numbered part. */
export const NO_PART_SENTINEL = 10 ** 9;

// "part2", "_part02", "Part 10", "lesson-part_3" ... but not "depart4".
const PART_NUMBER_REGEX = /(?:^|[^a-z])part[^a-z\d]*(\d+)/i;

export function partNumberFromName(name: string): number | undefined {
  const match = PART_NUMBER_REGEX.exec(name);
  if (!match) {
    return undefined;
  }
  return Number.parseInt(match[1], 10);
}

export function firstCueStartMs(lines: readonly string[]): number | undefined {
  const { body } = splitHeaderAndBody(lines);
  return parseCues(body)[0]?.startMs;
}

export interface MergeSortKey {
  firstStartMs: number;
  partNumber: number;
  name: string;
}

export function mergeSortKey(doc: NamedDocument): MergeSortKey {
  return {
    firstStartMs: firstCueStartMs(doc.lines) ?? NO_CUES_SENTINEL_MS,
    partNumber: partNumberFromName(doc.name) ?? NO_PART_SENTINEL,
    name: doc.name.toLowerCase(),
  };
}

function compareKeys(a: MergeSortKey, b: MergeSortKey): number {
  if (a.firstStartMs !== b.firstStartMs) {
    return a.firstStartMs - b.firstStartMs;
  }
  if (a.partNumber !== b.partNumber) {
    return a.partNumber - b.partNumber;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/** Orders documents by content time, then part number, then name. Stable. */
export function sortForMerge<T extends NamedDocument>(docs: readonly T[]): T[] {
  return docs
    .map((doc) => ({ doc, key: mergeSortKey(doc) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map((entry) => entry.doc);
}

export interface MergeResult {
  lines: string[];
  order: string[];
}

/**
 * Concatenates the bodies of all documents in chronological order under the
 * header of the first one.
 */
export function mergeDocuments(docs: readonly NamedDocument[]): MergeResult {
  if (docs.length === 0) {
    throw new NoInputFilesError();
  }

  const sorted = sortForMerge(docs);
  const lines: string[] = [];

  sorted.forEach((doc, position) => {
    const { header, body } = splitHeaderAndBody(doc.lines);
    if (position === 0) {
      lines.push(...ensureHeader(header));
    }
    const trimmed = trimBlankEdges(body);
    if (trimmed.length > 0) {
      lines.push(...trimmed, "");
    }
  });

  return { lines, order: sorted.map((doc) => doc.name) };
}
