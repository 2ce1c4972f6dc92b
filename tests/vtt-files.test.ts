import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listMatchingFiles, readVttLines, wildcardToRegExp, writeVttLines } from "../src/utils/vtt-files.js";

describe("wildcardToRegExp", () => {
  it("should match * and ? against a whole name", () => {
    const english = wildcardToRegExp("*english.vtt");
    expect(english.test("talk_part1_english.vtt")).toBe(true);
    expect(english.test("english.vtt.bak")).toBe(false);
    expect(english.test("talk_englishXvtt")).toBe(false);
    expect(wildcardToRegExp("part?.vtt").test("part7.vtt")).toBe(true);
    expect(wildcardToRegExp("part?.vtt").test("part10.vtt")).toBe(false);
  });

  it("should treat regex characters literally", () => {
    expect(wildcardToRegExp("a+(b).vtt").test("a+(b).vtt")).toBe(true);
  });
});

describe("file io", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "vtt-toolkit-files-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should read with BOM stripped and line endings normalized", async () => {
    const path = join(testDir, "in.vtt");
    await writeFile(path, "\uFEFFWEBVTT\r\n\r\nHi\r\n", "utf8");
    expect(await readVttLines(path)).toEqual(["WEBVTT", "", "Hi"]);
  });

  it("should write with a single trailing newline", async () => {
    const path = join(testDir, "out.vtt");
    await writeVttLines(path, ["WEBVTT", "", "Hi", "", ""]);
    expect(await readFile(path, "utf8")).toBe("WEBVTT\n\nHi\n");
  });

  it("should list matching regular files sorted by name", async () => {
    await writeFile(join(testDir, "b.vtt"), "");
    await writeFile(join(testDir, "a.vtt"), "");
    await writeFile(join(testDir, "c.srt"), "");
    await mkdir(join(testDir, "d.vtt"));

    expect(await listMatchingFiles(testDir, "*.vtt")).toEqual([join(testDir, "a.vtt"), join(testDir, "b.vtt")]);
  });
});
