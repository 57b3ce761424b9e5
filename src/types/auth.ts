/**
 * Core types for Gemini API / Vertex AI authentication
 */

/**
 * Authentication strategy selector.
 * "gemini" uses a plain API key, "vertex_ai" uses OAuth2 / service accounts.
 */
export type AuthStrategyKind = "gemini" | "vertex_ai";

export const AUTH_STRATEGY_KINDS: readonly AuthStrategyKind[] = ["gemini", "vertex_ai"];

export function isAuthStrategyKind(value: unknown): value is AuthStrategyKind {
  return AUTH_STRATEGY_KINDS.some((kind) => kind === value);
}

/**
 * Raw service account key JSON, exactly as stored on disk
 */
export type ServiceAccountData = Readonly<Record<string, unknown>>;

/**
 * Parsed service account key file
 */
export interface ServiceAccountKey {
  type?: string;
  projectId?: string;
  privateKeyId?: string;
  privateKey?: string;
  clientEmail?: string;
  clientId?: string;
  authUri?: string;
  tokenUri?: string;
  authProviderCertUrl?: string;
  clientCertUrl?: string;
}

/**
 * Project routing carried by every Vertex AI credential shape
 */
export interface VertexRouting {
  projectId?: string;
  location?: string;
}

export interface ApiKeyCredentials {
  type: "api_key";
  apiKey: string;
}

export interface AccessTokenCredentials extends VertexRouting {
  type: "access_token";
  accessToken: string;
}

export interface JwtTokenCredentials extends VertexRouting {
  type: "jwt_token";
  jwtToken: string;
}

export interface ServiceAccountFileCredentials extends VertexRouting {
  type: "service_account_file";
  keyPath: string;
}

export interface ServiceAccountDataCredentials extends VertexRouting {
  type: "service_account_data";
  data: ServiceAccountData;
}

export type VertexCredentials =
  | AccessTokenCredentials
  | JwtTokenCredentials
  | ServiceAccountFileCredentials
  | ServiceAccountDataCredentials;

export type Credentials = ApiKeyCredentials | VertexCredentials;

/**
 * Credentials resolved for a single call. Never cached or shared.
 */
export interface ResolvedCredentialBundle {
  strategy: AuthStrategyKind;
  credentials: Credentials;
}

/**
 * Registered JWT claims: issuer, audience, subject, issued-at, expiry
 */
export interface JWTPayload {
  iss: string;
  aud: string;
  sub: string;
  iat: number;
  exp: number;
}

/**
 * Outbound header as a name/value pair
 */
export type HeaderPair = readonly [name: string, value: string];

/**
 * Outcome of a successful authenticate() call
 */
export type AuthContext =
  | { authType: "api_key" }
  | { authType: "access_token"; token: string }
  | { authType: "jwt_token"; token: string }
  | { authType: "service_account"; clientEmail: string; projectId: string };

/**
 * Per-call overrides accepted by the resolver and coordinator
 */
export interface AuthRequestOptions {
  apiKey?: string;
  projectId?: string;
  location?: string;
  accessToken?: string;
  jwtToken?: string;
  serviceAccountKeyPath?: string;
  serviceAccountData?: ServiceAccountData;
}

/**
 * Everything the external transport needs to send one request
 */
export interface RequestTarget {
  strategy: AuthStrategyKind;
  method: "GET" | "POST";
  url: string;
  headers: HeaderPair[];
}
