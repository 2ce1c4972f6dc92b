import { z } from "zod";

const ConfigSchema = z.object({
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  defaults: z.object({
    chunkMinutes: z.number().int().positive().default(10),
    gapMs: z.number().int().nonnegative().default(500),
    maxChars: z.number().int().positive().default(130),
    showLimit: z.number().int().nonnegative().default(50),
    mergePattern: z.string().min(1).default("*.vtt"),
  }),
});

type Config = z.infer<typeof ConfigSchema>;

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? Number.parseInt(raw, 10) : undefined;
}

export function loadConfig(): Config {
  return ConfigSchema.parse({
    logLevel: process.env.LOG_LEVEL || "info",
    defaults: {
      chunkMinutes: intFromEnv("VTT_CHUNK_MINUTES"),
      gapMs: intFromEnv("VTT_GAP_MS"),
      maxChars: intFromEnv("VTT_MAX_CHARS"),
      showLimit: intFromEnv("VTT_SHOW_LIMIT"),
      mergePattern: process.env.VTT_MERGE_PATTERN || undefined,
    },
  });
}

type Defaults = Config["defaults"];

export { type Config, ConfigSchema, type Defaults };
