/**
 * Gemini API / Vertex AI multi-strategy authentication
 */

import { loadAuthSettings, loadEnvironment } from "./config/loader.js";
import { createLogger, type Logger } from "./logging/logger.js";
import { MultiAuthCoordinator } from "./auth/multi-auth-coordinator.js";

export interface CreateCoordinatorOptions {
  /** auth.yaml path; defaults to AUTH_CONFIG_PATH, then config/auth.yaml */
  configPath?: string;
  /** .env file read on every resolution, overlaid by process.env */
  envFile?: string;
  logger?: Logger;
}

/**
 * Build a coordinator from config/auth.yaml and the process environment
 */
export function createMultiAuthCoordinator(
  options: CreateCoordinatorOptions = {}
): MultiAuthCoordinator {
  const logger = options.logger ?? createLogger(process.env.LOG_LEVEL ?? "WARN");
  const settings = loadAuthSettings(options.configPath);
  const { envFile } = options;

  // Fail fast on a missing env file; later reads report through AuthResult
  loadEnvironment({ envFile });

  logger.debug("Auth settings loaded", {
    gemini_configured: settings.gemini.apiKey !== undefined,
    vertex_project_id: settings.vertexAi.projectId,
    env_file: envFile,
  });

  return new MultiAuthCoordinator({
    settings,
    env: () => loadEnvironment({ envFile }),
    logger,
  });
}

export {
  MultiAuthCoordinator,
  DEFAULT_ENDPOINT,
  STREAM_ENDPOINT,
  type AuthHeaders,
  type MultiAuthCoordinatorOptions,
  type PrepareRequestOptions,
} from "./auth/multi-auth-coordinator.js";
export {
  CredentialResolver,
  DEFAULT_VERTEX_LOCATION,
  ENV_VARS,
  type CredentialResolverOptions,
} from "./auth/credential-resolver.js";
export {
  JWTManager,
  CLOUD_PLATFORM_SCOPE,
  DEFAULT_TOKEN_LIFETIME,
  toServiceAccountKey,
  type JWTManagerOptions,
  type PayloadOptions,
  type SignedTokenOptions,
} from "./auth/jwt-manager.js";
export { ApiKeyStrategy, GEMINI_BASE_URL, formatApiKey } from "./auth/api-key-strategy.js";
export {
  ServiceAccountStrategy,
  ERROR_TOKEN,
  REQUIRED_SERVICE_ACCOUNT_FIELDS,
  validateServiceAccountData,
} from "./auth/service-account-strategy.js";
export { JoseSigner, JWT_ALGORITHM, type Signer, type SignOptions } from "./auth/signer.js";
export type { AuthStrategy } from "./auth/types.js";
export {
  AuthError,
  ConfigurationError,
  CredentialFormatError,
  SigningError,
  TransportError,
  UnknownStrategyError,
  describeError,
  fail,
  ok,
  type AuthErrorKind,
  type AuthResult,
} from "./auth/errors.js";
export {
  EMPTY_AUTH_SETTINGS,
  loadAuthSettings,
  loadEnvironment,
  parseAuthSettings,
} from "./config/loader.js";
export { Logger, createLogger, redact } from "./logging/logger.js";
export * from "./types/auth.js";
export type * from "./types/config.js";
