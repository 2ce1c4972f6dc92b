import { z } from "zod";

/**
 * Option schemas for the toolkit commands. Defaults mirror the config
 * defaults; callers normally pass the configured values explicitly.
 */

const FilePath = z.string().min(1);

const ChunkingParams = z.object({
  minutes: z.number().int().positive().default(10).describe("Chunk size in minutes"),
  rebase: z.boolean().default(false).describe("Rewrite each part's timestamps to start at 00:00"),
  startAtZero: z
    .boolean()
    .default(false)
    .describe("Chunk grid starts at 00:00 instead of aligning to the first cue"),
});

const CompressionParams = z.object({
  gapMs: z.number().int().nonnegative().default(500).describe("Merge if next cue starts within this gap (ms)"),
  maxChars: z.number().int().positive().default(130).describe("Max chars per merged cue"),
});

export const CleanParams = z.object({
  input: FilePath,
  output: FilePath.optional().describe("Output path for --fix. Default: *_fixed.vtt"),
  fix: z.boolean().default(false),
  show: z.number().int().nonnegative().default(50).describe("How many report items to print"),
});

export const SplitParams = ChunkingParams.extend({
  input: FilePath,
  outDir: FilePath.optional().describe("Output directory. Default: input's directory"),
});

export const MergeParams = z.object({
  partsDir: FilePath,
  pattern: z.string().min(1).default("*.vtt"),
  output: FilePath,
});

export const CompressParams = CompressionParams.extend({
  input: FilePath,
  output: FilePath,
});

export const CleanSplitParams = ChunkingParams.extend({
  input: FilePath,
  outDir: FilePath,
});

export const MergeCompressParams = CompressionParams.extend({
  partsDir: FilePath,
  pattern: z.string().min(1).default("*.vtt"),
  output: FilePath,
});

export const CleanCompressSplitParams = ChunkingParams.merge(CompressionParams).extend({
  input: FilePath,
  outDir: FilePath,
});

export type CleanParamsInput = z.input<typeof CleanParams>;
export type SplitParamsInput = z.input<typeof SplitParams>;
export type MergeParamsInput = z.input<typeof MergeParams>;
export type CompressParamsInput = z.input<typeof CompressParams>;
export type CleanSplitParamsInput = z.input<typeof CleanSplitParams>;
export type MergeCompressParamsInput = z.input<typeof MergeCompressParams>;
export type CleanCompressSplitParamsInput = z.input<typeof CleanCompressSplitParams>;
