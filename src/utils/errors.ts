/**
 * Error class hierarchy for vtt-toolkit.
 *
 * MalformedTimestampError is recovered per line by the core and never
 * reaches a command. Every other error aborts the command that raised it.
 */

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

export class VttToolkitError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "VttToolkitError";
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Malformed timestamp (recovered per line / per cue)
// ---------------------------------------------------------------------------

export class MalformedTimestampError extends VttToolkitError {
  readonly raw: string;

  constructor(raw: string, reason: string) {
    super(`Malformed timestamp "${raw}": ${reason}`, "MALFORMED_TIMESTAMP");
    this.name = "MalformedTimestampError";
    this.raw = raw;
  }
}

// ---------------------------------------------------------------------------
// Chunker input without cues
// ---------------------------------------------------------------------------

export class NoCuesFoundError extends VttToolkitError {
  readonly source?: string;

  constructor(source?: string) {
    super(
      source
        ? `No cues found in ${source}. Is this a valid VTT with timestamp lines?`
        : "No cues found. Is this a valid VTT with timestamp lines?",
      "NO_CUES_FOUND",
    );
    this.name = "NoCuesFoundError";
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Compressor input without cues
// ---------------------------------------------------------------------------

export class NoCuesParsedError extends VttToolkitError {
  readonly source?: string;

  constructor(source?: string) {
    super(
      source
        ? `No cues parsed for compression from ${source}. Is the input a valid VTT?`
        : "No cues parsed for compression. Is the input a valid VTT?",
      "NO_CUES_PARSED",
    );
    this.name = "NoCuesParsedError";
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Merger filter matched nothing
// ---------------------------------------------------------------------------

export class NoInputFilesError extends VttToolkitError {
  readonly directory?: string;
  readonly pattern?: string;

  constructor(directory?: string, pattern?: string) {
    super(
      directory
        ? `No VTT files found in: ${directory} (pattern=${pattern ?? "*"})`
        : "No VTT files to merge",
      "NO_INPUT_FILES",
    );
    this.name = "NoInputFilesError";
    this.directory = directory;
    this.pattern = pattern;
  }
}

// ---------------------------------------------------------------------------
// Invalid command options
// ---------------------------------------------------------------------------

export class InvalidOptionsError extends VttToolkitError {
  readonly details: string;

  constructor(details: string) {
    super(`Invalid options: ${details}`, "INVALID_OPTIONS");
    this.name = "InvalidOptionsError";
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Helper: format error for user
// ---------------------------------------------------------------------------

export function formatErrorForUser(error: VttToolkitError): string {
  if (error instanceof InvalidOptionsError) {
    return `Invalid options: ${error.details}`;
  }

  if (error instanceof NoInputFilesError) {
    if (error.directory) {
      return `Nothing to merge: no files in ${error.directory} match "${error.pattern ?? "*"}".`;
    }
    return "Nothing to merge: no input files.";
  }

  if (error instanceof NoCuesFoundError || error instanceof NoCuesParsedError) {
    const where = error.source ? ` in ${error.source}` : "";
    return `No usable cues${where}. Nothing was written.`;
  }

  if (error instanceof MalformedTimestampError) {
    return `Unreadable timestamp: ${error.raw}`;
  }

  return error.message;
}
