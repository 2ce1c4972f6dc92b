import type { z } from "zod";
import { InvalidOptionsError } from "../utils/errors.js";

/** Validates command options, surfacing zod issues as InvalidOptionsError. */
export function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new InvalidOptionsError(details);
  }
  return result.data;
}

/** Caps a report list at `show` entries, noting how many were left out. */
export function limitReport(entries: string[][], show: number): string[] {
  const lines = entries.slice(0, show).flat();
  if (entries.length > show) {
    lines.push(`... (${entries.length - show} more)`);
  }
  return lines;
}
