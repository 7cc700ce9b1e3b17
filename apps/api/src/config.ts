import { z } from "zod";

const commaList = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? "")
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean),
  );

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((raw) => raw === "true" || raw === "1");

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REDIS_URL: z.string().url().optional(),
  ADMISSION_KEY_PREFIX: z.string().default("admission:"),
  RANK_STATE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  MEMORY_CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
  STORE_FAILURE_POLICY: z.enum(["closed", "open"]).default("closed"),
  API_KEYS: commaList,
  API_KEY_GROUPS: commaList,
  TRUST_PROXY: flag,
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  redisUrl: string | null;
  keyPrefix: string;
  rankStateTtlMs: number;
  /** How often the in-memory stores drop expired entries. */
  memoryCleanupIntervalMs: number;
  storeFailurePolicy: "closed" | "open";
  apiKeys: string[];
  /** API key -> caller group. Keys without an entry fall in "authenticated". */
  apiKeyGroups: Map<string, string>;
  trustProxy: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads the server configuration from the environment. Throws
 * {@link ConfigError} naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join("; ")}`);
  }
  const vars = parsed.data;

  const apiKeyGroups = new Map<string, string>();
  for (const entry of vars.API_KEY_GROUPS) {
    // Format: "key:group". The group is everything after the last ":".
    const separator = entry.lastIndexOf(":");
    const key = entry.slice(0, separator).trim();
    const group = entry.slice(separator + 1).trim();
    if (separator <= 0 || !key || !group) {
      throw new ConfigError(`Invalid environment: API_KEY_GROUPS: expected "key:group", got "${entry}"`);
    }
    apiKeyGroups.set(key, group);
  }

  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    redisUrl: vars.REDIS_URL ?? null,
    keyPrefix: vars.ADMISSION_KEY_PREFIX,
    rankStateTtlMs: vars.RANK_STATE_TTL_MS,
    memoryCleanupIntervalMs: vars.MEMORY_CLEANUP_INTERVAL_MS,
    storeFailurePolicy: vars.STORE_FAILURE_POLICY,
    apiKeys: vars.API_KEYS,
    apiKeyGroups,
    trustProxy: vars.TRUST_PROXY,
  };
}
