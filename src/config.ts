import os from "node:os";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const ConfigSchema = Type.Object({
  dataDir: Type.String({ minLength: 1 }),
  monitorIntervalMs: Type.Integer({ minimum: 1_000, default: 30_000 }),
  heartbeatStaleMs: Type.Integer({ minimum: 1, default: 180_000 }),
  marketTimeZone: Type.String({ minLength: 1, default: "America/New_York" }),
  logLevel: Type.Union(
    LOG_LEVELS.map((level) => Type.Literal(level)),
    { default: "info" },
  ),
});

export type Config = Static<typeof ConfigSchema>;
export type LogLevel = Config["logLevel"];

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/** Environment variable → config key. */
const ENV_KEYS: Record<string, keyof Config> = {
  STRIKE_DESK_DATA_DIR: "dataDir",
  MONITOR_INTERVAL_MS: "monitorIntervalMs",
  HEARTBEAT_STALE_MS: "heartbeatStaleMs",
  MARKET_TIME_ZONE: "marketTimeZone",
  LOG_LEVEL: "logLevel",
};

export function defaultDataDir(): string {
  return path.join(os.homedir(), ".strike-desk");
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the runtime config from environment variables. Blank variables count
 * as unset. Numeric strings are converted before validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, unknown> = { dataDir: defaultDataDir() };
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name]?.trim();
    if (value) {
      raw[key] = value;
    }
  }

  const candidate = Value.Convert(ConfigSchema, Value.Default(ConfigSchema, raw));
  if (!Value.Check(ConfigSchema, candidate)) {
    const problems = [...Value.Errors(ConfigSchema, candidate)].map(
      (error) => `${error.path || "/"}: ${error.message}`,
    );
    throw new ConfigError(problems);
  }
  if (!isValidTimeZone(candidate.marketTimeZone)) {
    throw new ConfigError([`/marketTimeZone: unknown time zone "${candidate.marketTimeZone}"`]);
  }
  return candidate;
}

let cached: Config | null = null;

/** Process-wide config, read from `process.env` on first use. */
export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
