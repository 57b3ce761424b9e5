/**
 * Contract shared by the Gemini API key and Vertex AI authentication strategies
 */

import type {
  AuthContext,
  AuthStrategyKind,
  Credentials,
  HeaderPair,
} from "../types/auth.js";
import type { AuthResult } from "./errors.js";

export interface AuthStrategy {
  readonly kind: AuthStrategyKind;

  /**
   * Name used in error prefixes, e.g. "Vertex AI"
   */
  readonly displayName: string;

  /**
   * Validate credentials and report what kind of authentication they provide
   */
  authenticate(credentials: Credentials): Promise<AuthResult<AuthContext>>;

  /**
   * Build request headers. Never rejects; failures surface in authenticate().
   */
  headers(credentials: Credentials): Promise<HeaderPair[]>;

  baseUrl(credentials: Credentials): AuthResult<string>;

  /**
   * Resource path for a model method, relative to baseUrl()
   */
  buildPath(model: string, endpoint: string, credentials: Credentials): string;

  /**
   * Path of the model listing collection, relative to baseUrl()
   */
  modelsPath(credentials: Credentials): string;

  /**
   * Return credentials with a fresh token where the scheme has one
   */
  refreshCredentials(credentials: Credentials): Promise<AuthResult<Credentials>>;
}

/**
 * Prefix model ids with "models/" unless already present
 */
export function normalizeModel(model: string): string {
  return model.startsWith("models/") ? model : `models/${model}`;
}

export const JSON_CONTENT_TYPE: HeaderPair = ["Content-Type", "application/json"];
