/**
 * Configuration loader for static auth settings and environment snapshots
 */

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import dotenv from "dotenv";
import { ConfigurationError } from "../auth/errors.js";
import type { ServiceAccountData } from "../types/auth.js";
import type {
  ApiKeyHeaderFormat,
  AuthSettings,
  EnvSnapshot,
  GeminiSettings,
  VertexAiSettings,
} from "../types/config.js";

const CONFIG_DIR = path.join(process.cwd(), "config");
const DEFAULT_CONFIG_FILE = "auth.yaml";

const HEADER_FORMATS: readonly ApiKeyHeaderFormat[] = ["bearer", "x-goog-api-key"];

export const EMPTY_AUTH_SETTINGS: AuthSettings = Object.freeze({
  gemini: Object.freeze({}),
  vertexAi: Object.freeze({}),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an optional string field, rejecting any other type
 */
function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`auth config field '${field}' must be a string`);
  }
  return value;
}

function parseGeminiSection(section: unknown): GeminiSettings {
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigurationError("auth config section 'gemini' must be a mapping");
  }

  const headerFormat = optionalString(section.header_format, "gemini.header_format");
  if (headerFormat !== undefined && !HEADER_FORMATS.some((format) => format === headerFormat)) {
    throw new ConfigurationError(
      `auth config field 'gemini.header_format' must be one of: ${HEADER_FORMATS.join(", ")}`
    );
  }

  return {
    apiKey: optionalString(section.api_key, "gemini.api_key"),
    baseUrl: optionalString(section.base_url, "gemini.base_url"),
    headerFormat: HEADER_FORMATS.find((format) => format === headerFormat),
  };
}

function parseVertexSection(section: unknown): VertexAiSettings {
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigurationError("auth config section 'vertex_ai' must be a mapping");
  }

  let serviceAccountData: ServiceAccountData | undefined;
  if (section.service_account_data !== undefined && section.service_account_data !== null) {
    if (!isRecord(section.service_account_data)) {
      throw new ConfigurationError(
        "auth config field 'vertex_ai.service_account_data' must be a mapping"
      );
    }
    serviceAccountData = Object.freeze({ ...section.service_account_data });
  }

  return {
    projectId: optionalString(section.project_id, "vertex_ai.project_id"),
    location: optionalString(section.location, "vertex_ai.location"),
    accessToken: optionalString(section.access_token, "vertex_ai.access_token"),
    serviceAccountKeyPath: optionalString(
      section.service_account_key,
      "vertex_ai.service_account_key"
    ),
    serviceAccountData,
  };
}

/**
 * Validate a parsed auth.yaml document into frozen settings
 */
export function parseAuthSettings(document: unknown): AuthSettings {
  if (document === undefined || document === null) {
    return EMPTY_AUTH_SETTINGS;
  }
  if (!isRecord(document)) {
    throw new ConfigurationError("auth config must be a YAML mapping");
  }

  return Object.freeze({
    gemini: Object.freeze(parseGeminiSection(document.gemini)),
    vertexAi: Object.freeze(parseVertexSection(document.vertex_ai)),
  });
}

/**
 * Load and parse auth.yaml.
 * An explicitly named file must exist; the default config/auth.yaml is optional.
 */
export function loadAuthSettings(configPath?: string): AuthSettings {
  const explicitPath = configPath ?? process.env.AUTH_CONFIG_PATH;
  const settingsPath = explicitPath ?? path.join(CONFIG_DIR, DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(settingsPath)) {
    if (explicitPath) {
      throw new ConfigurationError(`Auth config not found: ${settingsPath}`);
    }
    return EMPTY_AUTH_SETTINGS;
  }

  const content = fs.readFileSync(settingsPath, "utf-8");

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in auth config ${settingsPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return parseAuthSettings(document);
}

export interface LoadEnvironmentOptions {
  envFile?: string;
  processEnv?: EnvSnapshot;
}

/**
 * Build a frozen environment snapshot: values from an optional .env file,
 * overlaid by the process environment. process.env itself is never modified.
 */
export function loadEnvironment(options: LoadEnvironmentOptions = {}): EnvSnapshot {
  const processEnv = options.processEnv ?? process.env;
  let fileValues: Record<string, string> = {};

  if (options.envFile) {
    if (!fs.existsSync(options.envFile)) {
      throw new ConfigurationError(`Env file not found: ${options.envFile}`);
    }
    fileValues = dotenv.parse(fs.readFileSync(options.envFile));
  }

  return Object.freeze({ ...fileValues, ...processEnv });
}
