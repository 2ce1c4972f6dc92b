/**
 * WebVTT document framing: line normalization, header/body separation and
 * rendering back to text.
 */

export const SIGNATURE = "WEBVTT";
export const DEFAULT_HEADER: readonly string[] = [SIGNATURE, ""];

const BOM = "\uFEFF";

export interface SplitDocument {
  header: string[];
  body: string[];
}

export function isBlank(line: string): boolean {
  return line.trim() === "";
}

function stripBom(line: string): string {
  return line.startsWith(BOM) ? line.slice(BOM.length) : line;
}

/**
 * Splits raw document text into lines. Strips a leading BOM and treats
 * \r\n, \r and \n alike. A final line terminator does not yield an extra line.
 */
export function toLines(text: string): string[] {
  const normalized = stripBom(text).replace(/\r\n?/g, "\n");
  if (normalized === "") {
    return [];
  }
  const lines = normalized.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Header = signature line + metadata lines up to the first blank line, plus
 * the blank separator lines. Everything after is the body, left unparsed.
 * A document without a signature yields an empty header.
 */
export function splitHeaderAndBody(lines: readonly string[]): SplitDocument {
  let i = 0;
  while (i < lines.length && isBlank(lines[i])) {
    i++;
  }

  const header: string[] = [];
  if (i >= lines.length || !stripBom(lines[i]).trim().toUpperCase().startsWith(SIGNATURE)) {
    return { header, body: lines.slice(i) };
  }

  header.push(stripBom(lines[i]));
  i++;
  while (i < lines.length && !isBlank(lines[i])) {
    header.push(lines[i]);
    i++;
  }
  while (i < lines.length && isBlank(lines[i])) {
    header.push(lines[i]);
    i++;
  }

  return { header, body: lines.slice(i) };
}

/**
 * Header to write: the default one when missing, otherwise the given header
 * with a blank separator guaranteed at its end.
 */
export function ensureHeader(header: readonly string[]): string[] {
  if (header.length === 0) {
    return [...DEFAULT_HEADER];
  }
  if (!isBlank(header[header.length - 1])) {
    return [...header, ""];
  }
  return [...header];
}

/** UTF-8 text form for writing: no trailing blank lines, one final newline. */
export function renderLines(lines: readonly string[]): string {
  return `${lines.join("\n").trimEnd()}\n`;
}

export function trimBlankEdges(lines: readonly string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start])) {
    start++;
  }
  while (end > start && isBlank(lines[end - 1])) {
    end--;
  }
  return lines.slice(start, end);
}
