import { describe, expect, it } from "vitest";
import { NoCuesParsedError } from "../src/utils/errors.js";
import {
  absorb,
  cleanCueText,
  compressCues,
  compressDocument,
  countChars,
  endsSentence,
  readCompressibleCues,
  shouldFuse,
} from "../src/vtt/compressor.js";
import { textCue } from "./helpers/cues.js";

const OPTIONS = { gapMs: 500, maxChars: 130 };

describe("cleanCueText", () => {
  it("should strip tags and collapse whitespace", () => {
    expect(cleanCueText("  <i>Hello</i>   <b>world</b> ")).toBe("Hello world");
    expect(cleanCueText("<v Ann>Hi</v>\tthere")).toBe("Hi there");
  });
});

describe("countChars", () => {
  it("should count code points", () => {
    expect(countChars("日本語")).toBe(3);
    expect(countChars("a😀")).toBe(2);
  });
});

describe("endsSentence", () => {
  it("should recognize ASCII and CJK terminators", () => {
    expect(endsSentence("world.")).toBe(true);
    expect(endsSentence("本当？")).toBe(true);
    expect(endsSentence("wait…")).toBe(true);
    expect(endsSentence("<i>Done!</i>")).toBe(true);
  });

  it("should treat unterminated text as open", () => {
    expect(endsSentence("Hello")).toBe(false);
    expect(endsSentence("so,")).toBe(false);
  });

  it("should treat empty text as terminated", () => {
    expect(endsSentence("")).toBe(true);
    expect(endsSentence("<br>")).toBe(true);
  });
});

describe("shouldFuse", () => {
  const hello = textCue(0, 1000, "Hello");

  it("should fuse within gap and budget", () => {
    expect(shouldFuse(hello, textCue(1100, 2000, "world."), OPTIONS)).toBe(true);
  });

  it("should not fuse across a large gap", () => {
    expect(shouldFuse(hello, textCue(1600, 2000, "again"), OPTIONS)).toBe(false);
  });

  it("should not fuse after a finished sentence", () => {
    expect(shouldFuse(textCue(0, 1000, "Done."), textCue(1000, 2000, "next"), OPTIONS)).toBe(false);
  });

  it("should respect the character budget including the joining space", () => {
    const world = textCue(1000, 2000, "world");
    expect(shouldFuse(hello, world, { gapMs: 500, maxChars: 10 })).toBe(false);
    expect(shouldFuse(hello, world, { gapMs: 500, maxChars: 11 })).toBe(true);
  });
});

describe("absorb", () => {
  it("should extend the accumulator when fusing", () => {
    const transition = absorb({ kind: "accumulating", cue: textCue(0, 5000, "a") }, textCue(100, 3000, "b"), OPTIONS);
    expect(transition).toEqual({ state: { kind: "accumulating", cue: textCue(0, 5000, "a b") } });
  });

  it("should flush and restart otherwise", () => {
    const current = textCue(0, 1000, "Done.");
    const next = textCue(1000, 2000, "Next");
    expect(absorb({ kind: "accumulating", cue: current }, next, OPTIONS)).toEqual({
      state: { kind: "accumulating", cue: next },
      flushed: current,
    });
  });
});

describe("compressCues", () => {
  it("should fuse an open cue with the next and restart after a terminator", () => {
    const result = compressCues(
      [textCue(0, 1000, "Hello"), textCue(1100, 2000, "world."), textCue(2000, 2500, "Next one")],
      OPTIONS,
    );
    expect(result).toEqual([textCue(0, 2000, "Hello world."), textCue(2000, 2500, "Next one")]);
  });

  it("should sort by start and end before folding", () => {
    const result = compressCues([textCue(1100, 2000, "world."), textCue(0, 1000, "Hello")], OPTIONS);
    expect(result).toEqual([textCue(0, 2000, "Hello world.")]);
  });

  it("should keep input order for identical intervals", () => {
    const result = compressCues([textCue(0, 1, "A."), textCue(0, 1, "B.")], OPTIONS);
    expect(result.map((cue) => cue.text)).toEqual(["A.", "B."]);
  });

  it("should fail on empty input", () => {
    expect(() => compressCues([], OPTIONS)).toThrow(NoCuesParsedError);
  });
});

describe("readCompressibleCues", () => {
  it("should repair reversed intervals", () => {
    expect(readCompressibleCues(["WEBVTT", "", "00:00:05.000 --> 00:00:04.000", " x "])).toEqual([
      textCue(4000, 5000, "x"),
    ]);
  });
});

describe("compressDocument", () => {
  it("should render merged cues under the default header", () => {
    const lines = [
      "WEBVTT",
      "Kind: captions",
      "",
      "1",
      "00:00:00.000 --> 00:00:01.000",
      "<v Ann>Hello</v>",
      "",
      "2",
      "00:00:01.100 --> 00:00:02.000",
      "world.",
      "",
      "00:00:05.000 --> 00:00:06.000",
      "Next  line",
    ];
    const result = compressDocument(lines, OPTIONS);
    expect(result.inputCount).toBe(3);
    expect(result.outputCount).toBe(2);
    expect(result.lines).toEqual([
      "WEBVTT",
      "",
      "00:00:00.000 --> 00:00:02.000",
      "Hello world.",
      "",
      "00:00:05.000 --> 00:00:06.000",
      "Next line",
      "",
    ]);
  });

  it("should fail when no cue can be parsed", () => {
    expect(() => compressDocument(["WEBVTT", "", "nothing here"], OPTIONS, "in.vtt")).toThrow(
      "No cues parsed for compression from in.vtt. Is the input a valid VTT?",
    );
  });
});
