/**
 * Configuration types for the multi-auth library
 */

import type { ServiceAccountData } from "./auth.js";

export type LogLevel = "ERROR" | "WARN" | "INFO" | "DEBUG" | "TRACE" | "SILENT";

/**
 * How an API key is placed on outbound requests
 */
export type ApiKeyHeaderFormat = "bearer" | "x-goog-api-key";

export interface GeminiSettings {
  apiKey?: string;
  baseUrl?: string;
  headerFormat?: ApiKeyHeaderFormat;
}

export interface VertexAiSettings {
  projectId?: string;
  location?: string;
  accessToken?: string;
  serviceAccountKeyPath?: string;
  serviceAccountData?: ServiceAccountData;
}

/**
 * Static application-level auth settings, loaded once from config/auth.yaml
 * and passed down read-only.
 */
export interface AuthSettings {
  gemini: Readonly<GeminiSettings>;
  vertexAi: Readonly<VertexAiSettings>;
}

/**
 * Read-only view of environment variables consulted during resolution
 */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

/**
 * Supplies a fresh environment snapshot on each resolution
 */
export type EnvSource = () => EnvSnapshot;
