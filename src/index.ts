export { decodeTimestamp, encodeTimestamp, tryDecodeTimestamp, type DecodeResult } from "./vtt/timestamp.js";
export {
  DEFAULT_HEADER,
  SIGNATURE,
  ensureHeader,
  renderLines,
  splitHeaderAndBody,
  toLines,
  trimBlankEdges,
  type SplitDocument,
} from "./vtt/document.js";
export { matchTimestampLine, parseCues, scanCueBlocks } from "./vtt/cue-parser.js";
export { checkTimeline, fixTimeline, type TimelineCheckResult, type TimelineFixResult } from "./vtt/timeline.js";
export { bucketCues, chunkCues, type ChunkOptions } from "./vtt/chunker.js";
export { mergeDocuments, partNumberFromName, sortForMerge, type MergeResult } from "./vtt/merger.js";
export {
  DEFAULT_COMPRESS_OPTIONS,
  absorb,
  cleanCueText,
  compressCues,
  compressDocument,
  endsSentence,
  shouldFuse,
} from "./vtt/compressor.js";
export type * from "./vtt/types.js";
export { runClean, type CleanResult } from "./commands/clean.js";
export { runSplit, type SplitResult } from "./commands/split.js";
export { runMerge, type MergeCommandResult } from "./commands/merge.js";
export { runCompress, type CompressCommandResult } from "./commands/compress.js";
export { runCleanCompressSplit, runCleanSplit, runMergeCompress } from "./commands/pipelines.js";
export {
  InvalidOptionsError,
  MalformedTimestampError,
  NoCuesFoundError,
  NoCuesParsedError,
  NoInputFilesError,
  VttToolkitError,
  formatErrorForUser,
} from "./utils/errors.js";
