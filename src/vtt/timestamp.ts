/**
 * Timestamp codec: textual VTT timestamps <-> integer milliseconds.
 *
 * Decoding tolerates the dialects found in machine-generated subtitles:
 * bare seconds ("46.550"), MM:SS.mmm, HH:MM:SS.mmm, comma decimals and
 * dirty fractions such as "55:56.03.800".
 */

import { MalformedTimestampError } from "../utils/errors.js";

export type DecodeResult = { ok: true; ms: number } | { ok: false; reason: string };

const PURE_SECONDS_REGEX = /^\d+(\.\d+)?$/;
const DIGITS_REGEX = /^\d+$/;

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

function parseField(raw: string, field: string, value: string): number {
  const trimmed = value.trim();
  if (!DIGITS_REGEX.test(trimmed)) {
    throw new MalformedTimestampError(raw, `non-numeric ${field} field "${value}"`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parses a timestamp into milliseconds.
 * Throws MalformedTimestampError; use {@link tryDecodeTimestamp} to recover per line.
 */
export function decodeTimestamp(text: string): number {
  const ts = text.trim().replace(/,/g, ".");
  if (!ts) {
    throw new MalformedTimestampError(text, "empty timestamp");
  }

  if (PURE_SECONDS_REGEX.test(ts)) {
    return Math.round(Number(ts) * MS_PER_SECOND);
  }

  const segments = ts.split(":");
  let hours: string;
  let minutes: string;
  let rest: string;
  if (segments.length === 3) {
    [hours, minutes, rest] = segments;
  } else if (segments.length === 2) {
    hours = "0";
    [minutes, rest] = segments;
  } else {
    throw new MalformedTimestampError(text, `bad timestamp structure (${segments.length} segments)`);
  }

  // Only the first separator starts the fraction; later groups are glued on.
  const [secondsPart = "", ...fractionGroups] = rest.split(".");
  const seconds = secondsPart === "" ? "0" : secondsPart;
  const fractionDigits = fractionGroups.join("").replace(/\D/g, "") || "0";
  const millis = Number.parseInt(fractionDigits.padEnd(3, "0").slice(0, 3), 10);

  return (
    parseField(text, "hour", hours) * MS_PER_HOUR +
    parseField(text, "minute", minutes) * MS_PER_MINUTE +
    parseField(text, "second", seconds) * MS_PER_SECOND +
    millis
  );
}

export function tryDecodeTimestamp(text: string): DecodeResult {
  try {
    return { ok: true, ms: decodeTimestamp(text) };
  } catch (error) {
    if (error instanceof MalformedTimestampError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
}

/**
 * Formats milliseconds as canonical HH:MM:SS.mmm. Negative input clamps to 0;
 * hours are not wrapped at 24.
 */
export function encodeTimestamp(ms: number): string {
  let remaining = Math.max(0, Math.trunc(ms));
  const hours = Math.floor(remaining / MS_PER_HOUR);
  remaining %= MS_PER_HOUR;
  const minutes = Math.floor(remaining / MS_PER_MINUTE);
  remaining %= MS_PER_MINUTE;
  const seconds = Math.floor(remaining / MS_PER_SECOND);
  const millis = remaining % MS_PER_SECOND;

  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}:${String(
    seconds,
  ).padStart(2, "0")}.${String(millis).padStart(3, "0")}`;
}
