import { NoCuesFoundError } from "../utils/errors.js";
import { ensureHeader } from "./document.js";
import { encodeTimestamp } from "./timestamp.js";
import type { Chunk, Cue } from "./types.js";

export interface ChunkOptions {
  chunkMs: number;
  /** Grid starts at 00:00 instead of the chunk boundary at or below the first cue. */
  startAtZero: boolean;
  /** Rewrite timestamps relative to each chunk's start. */
  rebase: boolean;
  /** Header of the source document; the default header is used when empty. */
  header?: readonly string[];
  source?: string;
}

export function chunkBase(cues: readonly Cue[], chunkMs: number, startAtZero: boolean): number {
  if (startAtZero || cues.length === 0) {
    return 0;
  }
  const minStart = cues.reduce((min, cue) => Math.min(min, cue.startMs), Number.POSITIVE_INFINITY);
  return Math.floor(minStart / chunkMs) * chunkMs;
}

export function bucketIndex(startMs: number, baseMs: number, chunkMs: number): number {
  return Math.max(0, Math.floor((startMs - baseMs) / chunkMs));
}

/**
 * Groups cues into fixed-duration windows keyed by bucket index. Indices may
 * be sparse; cues keep their input order within a bucket.
 */
export function bucketCues(cues: readonly Cue[], baseMs: number, chunkMs: number): Map<number, Cue[]> {
  const buckets = new Map<number, Cue[]>();
  for (const cue of cues) {
    const index = bucketIndex(cue.startMs, baseMs, chunkMs);
    const bucket = buckets.get(index);
    if (bucket) {
      bucket.push(cue);
    } else {
      buckets.set(index, [cue]);
    }
  }
  return buckets;
}

function renderChunk(cues: readonly Cue[], chunkStart: number, header: string[], rebase: boolean): string[] {
  const lines = [...header];
  for (const cue of cues) {
    if (rebase) {
      lines.push(
        `${encodeTimestamp(cue.startMs - chunkStart)} --> ${encodeTimestamp(cue.endMs - chunkStart)}`,
      );
    } else {
      lines.push(cue.timestampLine.trimEnd());
    }
    lines.push(...cue.textLines, "");
  }
  return lines;
}

/**
 * Partitions cues into independent documents of `chunkMs` each. Windows
 * without cues produce no chunk.
 */
export function chunkCues(cues: readonly Cue[], options: ChunkOptions): Chunk[] {
  if (!Number.isInteger(options.chunkMs) || options.chunkMs <= 0) {
    throw new RangeError(`chunkMs must be a positive integer, got ${options.chunkMs}`);
  }
  if (cues.length === 0) {
    throw new NoCuesFoundError(options.source);
  }

  const header = ensureHeader(options.header ?? []);
  const baseMs = chunkBase(cues, options.chunkMs, options.startAtZero);
  const buckets = bucketCues(cues, baseMs, options.chunkMs);

  return [...buckets.keys()]
    .sort((a, b) => a - b)
    .map((index) => {
      const bucket = buckets.get(index) ?? [];
      const startMs = baseMs + index * options.chunkMs;
      return {
        index,
        partNumber: index + 1,
        startMs,
        cues: bucket,
        lines: renderChunk(bucket, startMs, header, options.rebase),
      };
    });
}
