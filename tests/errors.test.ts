import { describe, expect, it } from "vitest";
import {
  InvalidOptionsError,
  MalformedTimestampError,
  NoCuesFoundError,
  NoCuesParsedError,
  NoInputFilesError,
  VttToolkitError,
  formatErrorForUser,
} from "../src/utils/errors.js";

describe("error classes", () => {
  it("should describe malformed timestamps", () => {
    const error = new MalformedTimestampError("1:xx", 'non-numeric second field "xx"');
    expect(error).toBeInstanceOf(VttToolkitError);
    expect(error.code).toBe("MALFORMED_TIMESTAMP");
    expect(error.message).toBe('Malformed timestamp "1:xx": non-numeric second field "xx"');
  });

  it("should carry a code per document-level failure", () => {
    expect(new NoCuesFoundError("a.vtt").code).toBe("NO_CUES_FOUND");
    expect(new NoCuesParsedError().code).toBe("NO_CUES_PARSED");
    expect(new NoInputFilesError("parts", "*.vtt").message).toBe("No VTT files found in: parts (pattern=*.vtt)");
  });
});

describe("formatErrorForUser", () => {
  it("should format each error kind", () => {
    expect(formatErrorForUser(new InvalidOptionsError("minutes: too small"))).toBe(
      "Invalid options: minutes: too small",
    );
    expect(formatErrorForUser(new NoInputFilesError("parts", "*en.vtt"))).toBe(
      'Nothing to merge: no files in parts match "*en.vtt".',
    );
    expect(formatErrorForUser(new NoInputFilesError())).toBe("Nothing to merge: no input files.");
    expect(formatErrorForUser(new NoCuesFoundError("a.vtt"))).toBe("No usable cues in a.vtt. Nothing was written.");
    expect(formatErrorForUser(new NoCuesParsedError())).toBe("No usable cues. Nothing was written.");
    expect(formatErrorForUser(new MalformedTimestampError("xx", "bad"))).toBe("Unreadable timestamp: xx");
    expect(formatErrorForUser(new VttToolkitError("Something else", "OTHER"))).toBe("Something else");
  });
});
