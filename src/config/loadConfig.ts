import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  query: "quantum",
  limit: 10,
  archiveEnabled: false,
  outputDir: "./pdfs",
  linkHost: "github.com",
  searchBaseUrl: "https://export.arxiv.org/api/query",
  availabilityUrl: "https://archive.org/wayback/available",
  saveUrl: "https://web.archive.org/save",
  userAgent: "paper-link-archiver/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 120_000,
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(new Map<string, unknown>(Object.entries(parsed)));
}

const STRING_KEYS = [
  "query",
  "outputDir",
  "linkHost",
  "searchBaseUrl",
  "availabilityUrl",
  "saveUrl",
  "userAgent",
] as const;
const NUMBER_KEYS = ["limit", "requestTimeoutMs", "downloadTimeoutMs"] as const;
const BOOLEAN_KEYS = ["archiveEnabled", "ignoreHttpsErrors"] as const;

function pickOverrides(values: Map<string, unknown>): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const key of STRING_KEYS) {
    const value = values.get(key);
    if (typeof value === "string") {
      overrides[key] = value;
    }
  }
  for (const key of NUMBER_KEYS) {
    const value = values.get(key);
    if (isPositiveInt(value)) {
      overrides[key] = value;
    }
  }
  for (const key of BOOLEAN_KEYS) {
    const value = values.get(key);
    if (typeof value === "boolean") {
      overrides[key] = value;
    }
  }
  return overrides;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/** Parses a whole number greater than zero; anything else yields `fallback`. */
export function toPositiveInt(value: string | undefined, fallback: number): number {
  if (!value || !/^\s*\d+\s*$/.test(value)) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return isPositiveInt(parsed) ? parsed : fallback;
}

export function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return {
    ...merged,
    query: env.QUERY ?? merged.query,
    limit: toPositiveInt(env.LIMIT, merged.limit),
    archiveEnabled: toBool(env.ARCHIVE_ENABLED, merged.archiveEnabled),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    linkHost: env.LINK_HOST ?? merged.linkHost,
    searchBaseUrl: env.SEARCH_BASE_URL ?? merged.searchBaseUrl,
    availabilityUrl: env.AVAILABILITY_URL ?? merged.availabilityUrl,
    saveUrl: env.SAVE_URL ?? merged.saveUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toPositiveInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toPositiveInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
  };
}

export { DEFAULT_CONFIG };
