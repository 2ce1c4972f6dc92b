import { describe, expect, it } from "vitest";
import { checkTimeline, fixTimeline } from "../src/vtt/timeline.js";

describe("fixTimeline", () => {
  it("should swap reversed timestamps and keep the settings", () => {
    const { lines, log } = fixTimeline(["WEBVTT", "", "05:00.000 --> 02:00.000 align:start", "Text"]);
    expect(lines).toEqual(["WEBVTT", "", "00:02:00.000 --> 00:05:00.000 align:start", "Text"]);
    expect(log).toEqual([{ lineNumber: 3, action: "SWAP_START_END", detail: "05:00.000 --> 02:00.000" }]);
  });

  it("should normalize non-canonical timestamps", () => {
    const { lines, log } = fixTimeline(["1:02.5 --> 1:03,000"]);
    expect(lines).toEqual(["00:01:02.500 --> 00:01:03.000"]);
    expect(log).toEqual([{ lineNumber: 1, action: "NORMALIZE", detail: "1:02.5 --> 1:03,000" }]);
  });

  it("should leave undecodable lines untouched and log them", () => {
    const { lines, log } = fixTimeline(["xx:yy --> 00:01.000", "Text"]);
    expect(lines).toEqual(["xx:yy --> 00:01.000", "Text"]);
    expect(log).toEqual([
      {
        lineNumber: 1,
        action: "SKIP_UNPARSEABLE",
        detail: 'Malformed timestamp "xx:yy": non-numeric minute field "xx"',
      },
    ]);
  });

  it("should not log canonical lines or touch non-timestamp lines", () => {
    const input = ["WEBVTT", "Kind: captions", "", "00:00:01.000 --> 00:00:02.000", "  spaced text  "];
    const { lines, log } = fixTimeline(input);
    expect(lines).toEqual(input);
    expect(log).toEqual([]);
  });

  it("should drop trailing whitespace after the settings", () => {
    const { lines, log } = fixTimeline(["00:00:01.000 --> 00:00:02.000 line:0   "]);
    expect(lines).toEqual(["00:00:01.000 --> 00:00:02.000 line:0"]);
    expect(log).toEqual([]);
  });

  it("should reach a fixed point after one pass", () => {
    const first = fixTimeline([
      "WEBVTT",
      "",
      "05:00.000 --> 02:00.000 align:start",
      "a",
      "",
      "46.550 --> 55:56.03.800",
      "b",
      "",
      "xx:yy --> 00:01.000",
      "c",
    ]);
    const second = fixTimeline(first.lines);
    expect(second.lines).toEqual(first.lines);
    expect(second.log.filter((entry) => entry.action !== "SKIP_UNPARSEABLE")).toEqual([]);
  });
});

describe("checkTimeline", () => {
  it("should flag a decreasing start on the third cue", () => {
    const lines = [
      "WEBVTT",
      "",
      "00:00.000 --> 00:01.000",
      "a",
      "",
      "00:05.000 --> 00:06.000",
      "b",
      "",
      "00:03.000 --> 00:04.000",
      "c",
    ];
    const { issues, cues } = checkTimeline(lines);
    const decreased = issues.filter((issue) => issue.kind === "START_DECREASED");
    expect(decreased).toEqual([
      {
        lineNumber: 9,
        kind: "START_DECREASED",
        detail: "prev_start=5000 current_start=3000 (prev line 6)",
        raw: "00:03.000 --> 00:04.000",
      },
    ]);
    expect(issues.map((issue) => issue.kind)).toEqual(["START_DECREASED", "OVERLAP"]);
    expect(cues.map((cue) => cue.startMs)).toEqual([0, 5000, 3000]);
  });

  it("should flag a cue ending before it starts", () => {
    const { issues } = checkTimeline(["00:10.000 --> 00:09.000"]);
    expect(issues).toEqual([
      {
        lineNumber: 1,
        kind: "END_BEFORE_START",
        detail: "start=10000 end=9000",
        raw: "00:10.000 --> 00:09.000",
      },
    ]);
  });

  it("should compare against the previous decodable cue only", () => {
    const lines = [
      "00:01.000 --> 00:05.000",
      "x",
      "",
      "bad --> 00:02.000",
      "y",
      "",
      "00:02.000 --> 00:03.000",
      "z",
    ];
    const { issues } = checkTimeline(lines);
    expect(issues.map((issue) => [issue.lineNumber, issue.kind])).toEqual([
      [4, "PARSE_FAIL"],
      [7, "OVERLAP"],
    ]);
    expect(issues[1].detail).toBe("prev_end=5000 current_start=2000 (prev line 1)");
  });

  it("should report nothing for a clean timeline", () => {
    const { issues } = checkTimeline(["00:00:00.000 --> 00:00:01.000", "a", "", "00:00:01.000 --> 00:00:02.000", "b"]);
    expect(issues).toEqual([]);
  });
});
