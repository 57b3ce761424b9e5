/**
 * Gemini API authentication with a plain API key
 */

import type { Logger } from "../logging/logger.js";
import { createDefaultLogger } from "../logging/logger.js";
import type { ApiKeyHeaderFormat, GeminiSettings } from "../types/config.js";
import type { AuthContext, Credentials, HeaderPair } from "../types/auth.js";
import { CredentialFormatError, fail, ok, type AuthResult } from "./errors.js";
import { JSON_CONTENT_TYPE, normalizeModel, type AuthStrategy } from "./types.js";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

/**
 * Format an API key for the chosen header.
 * Values already carrying an auth scheme pass through unchanged.
 */
export function formatApiKey(apiKey: string, format: ApiKeyHeaderFormat = "bearer"): HeaderPair {
  if (format === "x-goog-api-key") {
    return ["x-goog-api-key", apiKey];
  }

  if (apiKey.startsWith("Bearer ") || apiKey.startsWith("Basic ")) {
    return ["Authorization", apiKey];
  }

  return ["Authorization", `Bearer ${apiKey}`];
}

export interface ApiKeyStrategyOptions {
  settings?: Readonly<GeminiSettings>;
  logger?: Logger;
}

export class ApiKeyStrategy implements AuthStrategy {
  readonly kind = "gemini";
  readonly displayName = "Gemini";
  private settings: Readonly<GeminiSettings>;
  private logger: Logger;

  constructor(options: ApiKeyStrategyOptions = {}) {
    this.settings = options.settings ?? {};
    this.logger = options.logger ?? createDefaultLogger();
  }

  async authenticate(credentials: Credentials): Promise<AuthResult<AuthContext>> {
    if (credentials.type !== "api_key" || credentials.apiKey.trim().length === 0) {
      return fail(new CredentialFormatError("Invalid API key"));
    }

    return ok<AuthContext>({ authType: "api_key" });
  }

  async headers(credentials: Credentials): Promise<HeaderPair[]> {
    if (credentials.type !== "api_key") {
      this.logger.warn("API key strategy received non API key credentials", {
        credential_type: credentials.type,
      });
      return [JSON_CONTENT_TYPE];
    }

    return [JSON_CONTENT_TYPE, formatApiKey(credentials.apiKey, this.settings.headerFormat)];
  }

  baseUrl(_credentials: Credentials): AuthResult<string> {
    return ok(this.settings.baseUrl ?? GEMINI_BASE_URL);
  }

  buildPath(model: string, endpoint: string, _credentials: Credentials): string {
    return `${normalizeModel(model)}:${endpoint}`;
  }

  modelsPath(_credentials: Credentials): string {
    return "models";
  }

  /**
   * API keys do not expire
   */
  async refreshCredentials(credentials: Credentials): Promise<AuthResult<Credentials>> {
    return ok(credentials);
  }
}
