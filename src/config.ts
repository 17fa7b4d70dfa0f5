import { tmpdir } from "os";
import { join } from "path";
import { z } from "zod";

const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  WDA_HOST: z.string().min(1).default("127.0.0.1"),
  WDA_PORT: z.coerce.number().int().min(1).max(65535).default(8100),
  WDA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ARTIFACTS_DIR: z
    .string()
    .min(1)
    .default(join(tmpdir(), "simbridge", "artifacts")),
  LOG_LEVEL: z
    .string()
    // WARNING is accepted as a spelling of WARN.
    .transform((level) => {
      const upper = level.toUpperCase();
      return upper === "WARNING" ? "WARN" : upper;
    })
    .pipe(z.enum(LOG_LEVELS))
    .default("INFO"),
  SCREENSHOT_SCALE: z.coerce.number().min(0.1).max(1).default(0.5),
  SCREENSHOT_QUALITY: z.coerce.number().int().min(1).max(100).default(60),
});

export interface Config {
  agentHost: string;
  agentPort: number;
  requestTimeoutMs: number;
  artifactsDir: string;
  logLevel: LogLevelName;
  screenshotScale: number;
  screenshotQuality: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads configuration from environment variables. Unset variables take
 * their defaults; present but malformed ones fail start-up.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    agentHost: vars.WDA_HOST,
    agentPort: vars.WDA_PORT,
    requestTimeoutMs: vars.WDA_TIMEOUT_MS,
    artifactsDir: vars.ARTIFACTS_DIR,
    logLevel: vars.LOG_LEVEL,
    screenshotScale: vars.SCREENSHOT_SCALE,
    screenshotQuality: vars.SCREENSHOT_QUALITY,
  };
}
