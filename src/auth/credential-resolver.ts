/**
 * Credential resolution for the Gemini API and Vertex AI strategies
 *
 * Each value is taken from the first present source, in order:
 * per-call override -> environment -> static application settings.
 * The environment is read through an EnvSource on every call; nothing is cached.
 */

import type { Logger } from "../logging/logger.js";
import { createDefaultLogger } from "../logging/logger.js";
import { EMPTY_AUTH_SETTINGS } from "../config/loader.js";
import type { AuthSettings, EnvSnapshot, EnvSource } from "../types/config.js";
import {
  isAuthStrategyKind,
  type AuthRequestOptions,
  type ResolvedCredentialBundle,
  type ServiceAccountData,
  type VertexCredentials,
  type VertexRouting,
} from "../types/auth.js";
import {
  AuthError,
  ConfigurationError,
  UnknownStrategyError,
  describeError,
  fail,
  ok,
  type AuthResult,
} from "./errors.js";

export const DEFAULT_VERTEX_LOCATION = "us-central1";

/**
 * Environment variables consulted during resolution
 */
export const ENV_VARS = {
  geminiApiKey: ["GEMINI_API_KEY"],
  vertexProjectId: ["VERTEX_PROJECT_ID", "GOOGLE_CLOUD_PROJECT"],
  vertexLocation: ["VERTEX_LOCATION", "GOOGLE_CLOUD_LOCATION"],
  vertexAccessToken: ["VERTEX_ACCESS_TOKEN"],
  vertexServiceAccount: ["VERTEX_SERVICE_ACCOUNT", "VERTEX_JSON_FILE"],
  applicationCredentials: ["GOOGLE_APPLICATION_CREDENTIALS"],
} as const;

export interface CredentialResolverOptions {
  settings?: AuthSettings;
  env?: EnvSource;
  logger?: Logger;
}

/**
 * Blank strings count as absent
 */
function present(value: string | undefined): string | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value;
}

function firstPresent(...candidates: (string | undefined)[]): string | undefined {
  for (const candidate of candidates) {
    const value = present(candidate);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function fromEnv(env: EnvSnapshot, names: readonly string[]): string | undefined {
  return firstPresent(...names.map((name) => env[name]));
}

export class CredentialResolver {
  private settings: AuthSettings;
  private env: EnvSource;
  private logger: Logger;

  constructor(options: CredentialResolverOptions = {}) {
    this.settings = options.settings ?? EMPTY_AUTH_SETTINGS;
    this.env = options.env ?? (() => process.env);
    this.logger = options.logger ?? createDefaultLogger();
  }

  /**
   * Resolve the credential bundle for a strategy
   */
  resolve(
    strategy: string,
    overrides: AuthRequestOptions = {}
  ): AuthResult<ResolvedCredentialBundle> {
    if (!isAuthStrategyKind(strategy)) {
      return fail(new UnknownStrategyError(strategy));
    }

    let env: EnvSnapshot;
    try {
      env = this.env();
    } catch (error) {
      this.logger.error("Failed to read environment", { error: describeError(error) });
      if (error instanceof AuthError) {
        return fail(error);
      }
      return fail(
        new ConfigurationError(`Failed to read environment: ${describeError(error)}`, {
          cause: error,
        })
      );
    }

    if (strategy === "gemini") {
      return this.resolveGemini(env, overrides);
    }
    return this.resolveVertex(env, overrides);
  }

  private resolveGemini(
    env: EnvSnapshot,
    overrides: AuthRequestOptions
  ): AuthResult<ResolvedCredentialBundle> {
    const apiKey = firstPresent(
      overrides.apiKey,
      fromEnv(env, ENV_VARS.geminiApiKey),
      this.settings.gemini.apiKey
    );

    if (!apiKey) {
      return fail(new ConfigurationError("Missing or invalid Gemini API key"));
    }

    return ok<ResolvedCredentialBundle>({
      strategy: "gemini",
      credentials: { type: "api_key", apiKey },
    });
  }

  private resolveVertex(
    env: EnvSnapshot,
    overrides: AuthRequestOptions
  ): AuthResult<ResolvedCredentialBundle> {
    const vertex = this.settings.vertexAi;

    const routing: VertexRouting = {
      projectId: firstPresent(
        overrides.projectId,
        fromEnv(env, ENV_VARS.vertexProjectId),
        vertex.projectId
      ),
      location: firstPresent(
        overrides.location,
        fromEnv(env, ENV_VARS.vertexLocation),
        vertex.location,
        DEFAULT_VERTEX_LOCATION
      ),
    };

    if (!routing.projectId) {
      return fail(new ConfigurationError("Missing Vertex AI project_id"));
    }
    if (!routing.location) {
      return fail(new ConfigurationError("Missing Vertex AI location"));
    }

    const credentials = this.selectVertexMethod(env, overrides, routing);
    if (!credentials) {
      return fail(new ConfigurationError("Missing Vertex AI authentication method"));
    }

    this.logger.debug("Resolved Vertex AI credentials", {
      method: credentials.type,
      project_id: routing.projectId,
      location: routing.location,
    });

    return ok<ResolvedCredentialBundle>({ strategy: "vertex_ai", credentials });
  }

  /**
   * Pick the Vertex AI authentication method; first present wins
   */
  private selectVertexMethod(
    env: EnvSnapshot,
    overrides: AuthRequestOptions,
    routing: VertexRouting
  ): VertexCredentials | undefined {
    const vertex = this.settings.vertexAi;

    const accessToken = present(overrides.accessToken);
    if (accessToken) {
      return { type: "access_token", accessToken, ...routing };
    }

    const jwtToken = present(overrides.jwtToken);
    if (jwtToken) {
      return { type: "jwt_token", jwtToken, ...routing };
    }

    const keyPath = firstPresent(
      overrides.serviceAccountKeyPath,
      fromEnv(env, ENV_VARS.vertexServiceAccount),
      vertex.serviceAccountKeyPath
    );
    if (keyPath) {
      return { type: "service_account_file", keyPath, ...routing };
    }

    const data: ServiceAccountData | undefined =
      overrides.serviceAccountData ?? vertex.serviceAccountData;
    if (data) {
      return { type: "service_account_data", data, ...routing };
    }

    const fallbackToken = firstPresent(
      fromEnv(env, ENV_VARS.vertexAccessToken),
      vertex.accessToken
    );
    if (fallbackToken) {
      return { type: "access_token", accessToken: fallbackToken, ...routing };
    }

    const ambientKeyPath = fromEnv(env, ENV_VARS.applicationCredentials);
    if (ambientKeyPath) {
      this.logger.debug("Using application default credentials key file", {});
      return { type: "service_account_file", keyPath: ambientKeyPath, ...routing };
    }

    return undefined;
  }
}
