/**
 * Vertex AI authentication
 *
 * Accepts an OAuth2 access token, a pre-signed JWT, a service account key file,
 * or inline key data. Key material is exchanged for an access token per call.
 */

import type { Logger } from "../logging/logger.js";
import { createDefaultLogger } from "../logging/logger.js";
import type {
  AuthContext,
  Credentials,
  HeaderPair,
  ServiceAccountData,
  ServiceAccountKey,
  VertexRouting,
} from "../types/auth.js";
import {
  ConfigurationError,
  CredentialFormatError,
  fail,
  ok,
  type AuthResult,
} from "./errors.js";
import { JWTManager, toServiceAccountKey } from "./jwt-manager.js";
import { readKeyFileJson } from "./key-file.js";
import { JSON_CONTENT_TYPE, normalizeModel, type AuthStrategy } from "./types.js";

export const REQUIRED_SERVICE_ACCOUNT_FIELDS = ["client_email", "private_key", "project_id"] as const;

/**
 * Placeholder bearer value sent when no token could be produced.
 * The upstream call then fails with a 401 instead of the header builder throwing.
 */
export const ERROR_TOKEN = "service-account-error-token";

/**
 * Check required key fields in order; the first missing one is reported
 */
export function validateServiceAccountData(data: ServiceAccountData): AuthResult<ServiceAccountKey> {
  for (const field of REQUIRED_SERVICE_ACCOUNT_FIELDS) {
    const value = data[field];
    if (typeof value !== "string" || value.length === 0) {
      return fail(new CredentialFormatError(`Service account data missing required field: ${field}`));
    }
  }
  return ok(toServiceAccountKey(data));
}

function routingOf(credentials: Credentials): VertexRouting {
  if (credentials.type === "api_key") {
    return {};
  }
  return { projectId: credentials.projectId, location: credentials.location };
}

export interface ServiceAccountStrategyOptions {
  jwtManager?: JWTManager;
  logger?: Logger;
}

export class ServiceAccountStrategy implements AuthStrategy {
  readonly kind = "vertex_ai";
  readonly displayName = "Vertex AI";
  private jwtManager: JWTManager;
  private logger: Logger;

  constructor(options: ServiceAccountStrategyOptions = {}) {
    this.logger = options.logger ?? createDefaultLogger();
    this.jwtManager = options.jwtManager ?? new JWTManager({ logger: this.logger });
  }

  async authenticate(credentials: Credentials): Promise<AuthResult<AuthContext>> {
    switch (credentials.type) {
      case "access_token":
        if (credentials.accessToken.trim().length === 0) {
          return fail(new CredentialFormatError("Invalid access token"));
        }
        return ok<AuthContext>({ authType: "access_token", token: credentials.accessToken });

      case "jwt_token":
        if (!credentials.jwtToken.includes(".")) {
          return fail(new CredentialFormatError("Invalid JWT token format"));
        }
        return ok<AuthContext>({ authType: "jwt_token", token: credentials.jwtToken });

      case "service_account_file": {
        const data = await this.readKeyFile(credentials.keyPath);
        if (!data.success) {
          return data;
        }
        return this.serviceAccountContext(data.data);
      }

      case "service_account_data":
        return this.serviceAccountContext(credentials.data);

      case "api_key":
        return fail(new CredentialFormatError("Vertex AI does not accept API key credentials"));
    }
  }

  async headers(credentials: Credentials): Promise<HeaderPair[]> {
    const token = await this.generateAccessToken(credentials);

    if (!token.success) {
      this.logger.warn("Failed to generate Vertex AI access token", {
        credential_type: credentials.type,
        error: token.error.message,
      });
      return [JSON_CONTENT_TYPE, ["Authorization", `Bearer ${ERROR_TOKEN}`]];
    }

    return [JSON_CONTENT_TYPE, ["Authorization", `Bearer ${token.data}`]];
  }

  baseUrl(credentials: Credentials): AuthResult<string> {
    const { projectId, location } = routingOf(credentials);

    if (!projectId && !location) {
      return fail(new ConfigurationError("Missing Vertex AI project_id and location"));
    }
    if (!projectId) {
      return fail(new ConfigurationError("Missing Vertex AI project_id"));
    }
    if (!location) {
      return fail(new ConfigurationError("Missing Vertex AI location"));
    }

    return ok(`https://${location}-aiplatform.googleapis.com/v1`);
  }

  buildPath(model: string, endpoint: string, credentials: Credentials): string {
    const modelPath = normalizeModel(model);
    const { projectId, location } = routingOf(credentials);

    if (!projectId || !location) {
      return `${modelPath}:${endpoint}`;
    }

    return `projects/${projectId}/locations/${location}/publishers/google/${modelPath}:${endpoint}`;
  }

  modelsPath(credentials: Credentials): string {
    const { projectId, location } = routingOf(credentials);

    if (!projectId || !location) {
      return "models";
    }

    return `projects/${projectId}/locations/${location}/publishers/google/models`;
  }

  /**
   * Swap key material for a short-lived access token; tokens pass through
   */
  async refreshCredentials(credentials: Credentials): Promise<AuthResult<Credentials>> {
    if (credentials.type !== "service_account_file" && credentials.type !== "service_account_data") {
      return ok(credentials);
    }

    const token = await this.generateAccessToken(credentials);
    if (!token.success) {
      return token;
    }

    this.logger.debug("Refreshed Vertex AI credentials", {
      previous_type: credentials.type,
      project_id: credentials.projectId,
    });

    return ok<Credentials>({
      type: "access_token",
      accessToken: token.data,
      projectId: credentials.projectId,
      location: credentials.location,
    });
  }

  /**
   * Bearer value for a credential shape
   */
  private async generateAccessToken(credentials: Credentials): Promise<AuthResult<string>> {
    switch (credentials.type) {
      case "access_token":
        return ok(credentials.accessToken);

      case "jwt_token":
        return ok(credentials.jwtToken);

      case "service_account_file": {
        const data = await this.readKeyFile(credentials.keyPath);
        if (!data.success) {
          return data;
        }
        return this.exchange(data.data);
      }

      case "service_account_data":
        return this.exchange(credentials.data);

      case "api_key":
        return fail(new CredentialFormatError("Vertex AI does not accept API key credentials"));
    }
  }

  private async exchange(data: ServiceAccountData): Promise<AuthResult<string>> {
    const key = validateServiceAccountData(data);
    if (!key.success) {
      return key;
    }
    return this.jwtManager.exchangeForAccessToken(key.data);
  }

  private serviceAccountContext(data: ServiceAccountData): AuthResult<AuthContext> {
    const key = validateServiceAccountData(data);
    if (!key.success) {
      return key;
    }

    return ok<AuthContext>({
      authType: "service_account",
      clientEmail: key.data.clientEmail ?? "",
      projectId: key.data.projectId ?? "",
    });
  }

  private async readKeyFile(keyPath: string): Promise<AuthResult<ServiceAccountData>> {
    return readKeyFileJson(keyPath, {
      unreadable: (error) =>
        new ConfigurationError(`Could not read service account key file: ${keyPath}`, {
          cause: error,
        }),
      malformed: (error) =>
        new CredentialFormatError("Invalid JSON in service account key file", { cause: error }),
    });
  }
}
