import { z } from "zod";
import { readFileSync, mkdirSync, existsSync } from "node:fs";
import { resolve } from "node:path";

const DEFAULT_CONFIG_FILE = "config.json";

// Telegram user-account credentials
const TelegramConfigSchema = z.object({
  apiId: z.number().int().positive(),
  apiHash: z.string().min(1),
  phoneNumber: z.string().min(1),
  sessionFile: z.string().default("session/vidharvest.session"),
  connectionRetries: z.number().int().nonnegative().default(5),
});

const DownloadConfigSchema = z
  .object({
    /** Directory videos are written into; created on startup */
    videoDir: z.string().min(1).default("videos"),
    /** Pause between transfers is a whole number of minutes in [min, max] */
    minDelayMinutes: z.number().int().nonnegative().default(5),
    maxDelayMinutes: z.number().int().nonnegative().default(10),
    /** What to do with a command that arrives while a job is running */
    busyPolicy: z.enum(["reject", "queue"]).default("reject"),
    maxQueuedJobs: z.number().int().positive().default(10),
  })
  .refine((d) => d.minDelayMinutes <= d.maxDelayMinutes, {
    message: "minDelayMinutes must not exceed maxDelayMinutes",
    path: ["maxDelayMinutes"],
  });

// Process-local status endpoint
const HttpConfigSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(19380),
});

// Root config schema
export const ConfigSchema = z.object({
  telegram: TelegramConfigSchema,
  download: DownloadConfigSchema.default(() => DownloadConfigSchema.parse({})),
  http: HttpConfigSchema.default(() => HttpConfigSchema.parse({})),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type BusyPolicy = DownloadConfig["busyPolicy"];

export function getConfigPath(): string {
  return resolve(process.env.VIDHARVEST_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/** Validate already-decoded config data. Throws with every problem listed. */
export function parseConfig(data: unknown): AppConfig {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
    );
    throw new Error(`Invalid config:\n  ${problems.join("\n  ")}`);
  }
  return result.data;
}

export function loadConfig(file: string = getConfigPath()): AppConfig {
  if (!existsSync(file)) {
    throw new Error(`Config file not found: ${file} (copy config.example.json and fill in your API credentials)`);
  }

  const raw = readFileSync(file, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(data);
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
