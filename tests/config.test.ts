import { mkdtempSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  enabledRepositories,
  getConfig,
  isConfigLoaded,
  loadConfig,
  resetConfig,
} from "../src/config/index.js";
import { ConfigError } from "../src/utils/errors.js";

let dir: string;

function settingsFile(content: string): string {
  const path = join(dir, "settings.json");
  writeFileSync(path, content, "utf8");
  return path;
}

describe("config", () => {
  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "archlog-config-"));
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
  });

  it("loads the shipped defaults", () => {
    const config = loadConfig({});

    expect(config.architectureWording).toBe("Architecture");
    expect(config.webscraperDelayMs).toBe(500);
    expect(config.fuzzyThreshold).toBe(70);
    expect(config.sourceSimilarityThreshold).toBe(0.8);
    expect(enabledRepositories(config.archRepositories)).toEqual(["core", "extra", "multilib"]);
    expect(config.kdeCategories).toContain("plasma");
    expect(config.githubToken).toBeNull();
    expect(config.upstashRedisRestUrl).toBeNull();
    expect(config.changelogDir).toBe(resolve(join(homedir(), "archlog", "changelog")));
  });

  it("reads credentials and paths from the environment", () => {
    const config = loadConfig({
      GITHUB_TOKEN: "test-secret",
      UPSTASH_REDIS_REST_URL: "https://redis.example.test",
      UPSTASH_REDIS_REST_TOKEN: "test-secret",
      ARCHLOG_CHANGELOG_DIR: join(dir, "out"),
    });

    expect(config.githubToken).toBe("test-secret");
    expect(config.upstashRedisRestUrl).toBe("https://redis.example.test");
    expect(config.changelogDir).toBe(join(dir, "out"));
  });

  it("merges the user settings file over the defaults", () => {
    const file = settingsFile(JSON.stringify({ architectureWording: "Architektur", fuzzyThreshold: 80 }));

    const config = loadConfig({ ARCHLOG_CONFIG_FILE: file });

    expect(config.configFile).toBe(file);
    expect(config.architectureWording).toBe("Architektur");
    expect(config.fuzzyThreshold).toBe(80);
    expect(config.maxAttempts).toBe(3);
  });

  it("rejects invalid settings", () => {
    const file = settingsFile(JSON.stringify({ maxAttempts: 0 }));

    expect(() => loadConfig({ ARCHLOG_CONFIG_FILE: file })).toThrow(/^Invalid setting "maxAttempts"/);
  });

  it("rejects settings files that are not JSON objects", () => {
    expect(() => loadConfig({ ARCHLOG_CONFIG_FILE: settingsFile("[1, 2]") })).toThrow(ConfigError);
    expect(() => loadConfig({ ARCHLOG_CONFIG_FILE: settingsFile("{broken") })).toThrow(
      /^Failed to read settings file/,
    );
    expect(() => loadConfig({ ARCHLOG_CONFIG_FILE: join(dir, "missing.json") })).toThrow(ConfigError);
  });

  it("requires both Redis credentials", () => {
    expect(() => loadConfig({ UPSTASH_REDIS_REST_URL: "https://redis.example.test" })).toThrow(
      "UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together",
    );
  });

  it("caches the loaded configuration", () => {
    expect(isConfigLoaded()).toBe(false);
    expect(() => getConfig()).toThrow(ConfigError);

    const config = loadConfig({});

    expect(isConfigLoaded()).toBe(true);
    expect(getConfig()).toBe(config);
  });
});
