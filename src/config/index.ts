import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { ArchRepositorySetting } from "../types/index.js";
import { ConfigError, errorMessage } from "../utils/errors.js";

const settingsSchema = z.object({
  // Label of the architecture field in `pacman -Qi`, localized by the system language
  architectureWording: z.string().min(1).default("Architecture"),
  webscraperDelayMs: z.number().int().nonnegative().default(500),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  maxAttempts: z.number().int().positive().default(3),
  backoffFactor: z.number().positive().default(2),
  fuzzyThreshold: z.number().min(0).max(100).default(70),
  sourceSimilarityThreshold: z.number().min(0).max(1).default(0.8),
  archRepositories: z
    .array(z.object({ name: z.string().min(1), enabled: z.boolean() }))
    .default([
      { name: "core", enabled: true },
      { name: "extra", enabled: true },
      { name: "multilib", enabled: true },
    ]),
  kdeCategories: z.array(z.string().min(1)).default(["plasma", "frameworks", "utilities"]),
});

export type Settings = z.infer<typeof settingsSchema>;

export interface AppConfig extends Settings {
  // GitHub API (optional - increases rate limit from 60/hr to 5000/hr)
  githubToken: string | null;

  // Redis (optional - enables the cross-run tag cache and run metrics)
  upstashRedisRestUrl: string | null;
  upstashRedisRestToken: string | null;

  // Paths
  configFile: string | null;
  changelogDir: string;
}

type EnvKey =
  | "githubToken"
  | "upstashRedisRestUrl"
  | "upstashRedisRestToken"
  | "configFile"
  | "changelogDir";

interface EnvValidation {
  key: EnvKey;
  envVar: string;
  required: boolean;
  defaultValue?: string;
}

const ENV_VALIDATIONS: EnvValidation[] = [
  { key: "githubToken", envVar: "GITHUB_TOKEN", required: false },
  {
    key: "upstashRedisRestUrl",
    envVar: "UPSTASH_REDIS_REST_URL",
    required: false,
  },
  {
    key: "upstashRedisRestToken",
    envVar: "UPSTASH_REDIS_REST_TOKEN",
    required: false,
  },
  { key: "configFile", envVar: "ARCHLOG_CONFIG_FILE", required: false },
  {
    key: "changelogDir",
    envVar: "ARCHLOG_CHANGELOG_DIR",
    required: false,
    defaultValue: join(homedir(), "archlog", "changelog"),
  },
];

// Source layout (src/config) and build layout (dist/src/config) sit at different depths
const DEFAULT_SETTINGS_CANDIDATES = [
  "../../config/default-config.json",
  "../../../config/default-config.json",
];

let cachedConfig: AppConfig | null = null;

function readJsonFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Failed to read settings file ${path}: ${errorMessage(error)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function defaultSettingsPath(): string | null {
  for (const candidate of DEFAULT_SETTINGS_CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Merge the shipped defaults with the user's settings file; keys the user
 * file leaves out keep their default.
 * @throws ConfigError if a file cannot be read or a value has the wrong type
 */
export function loadSettings(userFile: string | null): Settings {
  const defaultsPath = defaultSettingsPath();
  const defaults = defaultsPath ? readJsonFile(defaultsPath) : {};

  let merged: Record<string, unknown> = isRecord(defaults) ? { ...defaults } : {};

  if (userFile) {
    const user = readJsonFile(userFile);
    if (!isRecord(user)) {
      throw new ConfigError(`Settings file ${userFile} must contain a JSON object`);
    }
    merged = { ...merged, ...user };
  }

  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid setting "${issue?.path.join(".") ?? "?"}": ${issue?.message ?? "invalid value"}`,
    );
  }
  return parsed.data;
}

/**
 * Load and validate environment variables and the settings file
 * Call this at application startup to fail fast on invalid config
 * @throws ConfigError if required environment variables are missing or settings are invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing: string[] = [];
  const values: Record<EnvKey, string | null> = {
    githubToken: null,
    upstashRedisRestUrl: null,
    upstashRedisRestToken: null,
    configFile: null,
    changelogDir: null,
  };

  for (const validation of ENV_VALIDATIONS) {
    const value = env[validation.envVar];

    if (!value && validation.required) {
      missing.push(validation.envVar);
    } else {
      // Empty optional fields become null
      values[validation.key] = value || validation.defaultValue || null;
    }
  }

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }

  // Redis credentials only make sense as a pair
  if (Boolean(values.upstashRedisRestUrl) !== Boolean(values.upstashRedisRestToken)) {
    throw new ConfigError(
      "UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together",
    );
  }

  const configFile = values.configFile ? resolve(values.configFile) : null;
  const settings = loadSettings(configFile);

  cachedConfig = {
    ...settings,
    githubToken: values.githubToken,
    upstashRedisRestUrl: values.upstashRedisRestUrl,
    upstashRedisRestToken: values.upstashRedisRestToken,
    configFile,
    changelogDir: resolve(values.changelogDir ?? join(homedir(), "archlog", "changelog")),
  };
  return cachedConfig;
}

/**
 * Get the cached configuration
 * @throws ConfigError if loadConfig() hasn't been called
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    throw new ConfigError("Configuration not loaded. Call loadConfig() first.");
  }
  return cachedConfig;
}

/**
 * Check if configuration has been loaded
 */
export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

/**
 * Reset cached configuration (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export function enabledRepositories(repositories: readonly ArchRepositorySetting[]): string[] {
  return repositories.filter((repository) => repository.enabled).map((repository) => repository.name);
}
