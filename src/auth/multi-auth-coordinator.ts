/**
 * Multi-strategy authentication facade
 *
 * Resolves credentials, authenticates them with the matching strategy and
 * produces request headers or a complete request target. Holds no caches:
 * every call resolves from overrides, the environment and settings again.
 */

import type { Dispatcher } from "undici";
import type { Logger } from "../logging/logger.js";
import { createDefaultLogger } from "../logging/logger.js";
import { EMPTY_AUTH_SETTINGS } from "../config/loader.js";
import type { AuthSettings, EnvSource } from "../types/config.js";
import {
  isAuthStrategyKind,
  type AuthRequestOptions,
  type AuthStrategyKind,
  type Credentials,
  type HeaderPair,
  type RequestTarget,
  type ResolvedCredentialBundle,
} from "../types/auth.js";
import { ApiKeyStrategy } from "./api-key-strategy.js";
import { CredentialResolver } from "./credential-resolver.js";
import {
  ConfigurationError,
  UnknownStrategyError,
  fail,
  ok,
  type AuthError,
  type AuthResult,
} from "./errors.js";
import { JWTManager } from "./jwt-manager.js";
import { ServiceAccountStrategy } from "./service-account-strategy.js";
import type { Signer } from "./signer.js";
import type { AuthStrategy } from "./types.js";

export const DEFAULT_ENDPOINT = "generateContent";
export const STREAM_ENDPOINT = "streamGenerateContent?alt=sse";

const EVENT_STREAM_ACCEPT: HeaderPair = ["Accept", "text/event-stream"];

export interface MultiAuthCoordinatorOptions {
  settings?: AuthSettings;
  env?: EnvSource;
  logger?: Logger;
  jwtManager?: JWTManager;
  /** Used for Google calls when no jwtManager is given */
  dispatcher?: Dispatcher;
  /** Used for local signing when no jwtManager is given */
  signer?: Signer;
}

export interface AuthHeaders {
  strategy: AuthStrategyKind;
  headers: HeaderPair[];
}

export interface PrepareRequestOptions extends AuthRequestOptions {
  model: string;
  /** Model method, defaults to generateContent */
  endpoint?: string;
  /** Use the server-sent events streaming method */
  stream?: boolean;
}

interface Authorized {
  strategy: AuthStrategy;
  credentials: Credentials;
  headers: HeaderPair[];
}

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export class MultiAuthCoordinator {
  private resolver: CredentialResolver;
  private strategies: Record<AuthStrategyKind, AuthStrategy>;
  private logger: Logger;

  constructor(options: MultiAuthCoordinatorOptions = {}) {
    const settings = options.settings ?? EMPTY_AUTH_SETTINGS;
    this.logger = options.logger ?? createDefaultLogger();

    const jwtManager =
      options.jwtManager ??
      new JWTManager({
        logger: this.logger,
        dispatcher: options.dispatcher,
        signer: options.signer,
      });

    this.resolver = new CredentialResolver({ settings, env: options.env, logger: this.logger });
    this.strategies = {
      gemini: new ApiKeyStrategy({ settings: settings.gemini, logger: this.logger }),
      vertex_ai: new ServiceAccountStrategy({ jwtManager, logger: this.logger }),
    };
  }

  /**
   * Resolve, authenticate and build headers for a strategy
   */
  async coordinateAuth(
    strategy: string,
    options: AuthRequestOptions = {}
  ): Promise<AuthResult<AuthHeaders>> {
    const authorized = await this.authorize(strategy, options);
    if (!authorized.success) {
      return authorized;
    }

    return ok({ strategy: authorized.data.strategy.kind, headers: authorized.data.headers });
  }

  getCredentials(
    strategy: string,
    options: AuthRequestOptions = {}
  ): AuthResult<ResolvedCredentialBundle> {
    return this.resolver.resolve(strategy, options);
  }

  /**
   * Infer the strategy from the keys present in a credential map.
   * Only key presence is checked, not the values.
   */
  determineStrategy(credentials: Readonly<Record<string, unknown>>): AuthResult<AuthStrategyKind> {
    if (Object.hasOwn(credentials, "apiKey")) {
      return ok<AuthStrategyKind>("gemini");
    }
    if (Object.hasOwn(credentials, "projectId")) {
      return ok<AuthStrategyKind>("vertex_ai");
    }
    return fail(new ConfigurationError("Cannot determine auth strategy from credentials"));
  }

  getBaseUrl(strategy: string, credentials: Credentials): AuthResult<string> {
    const impl = this.strategyFor(strategy);
    if (!impl.success) {
      return impl;
    }
    return impl.data.baseUrl(credentials);
  }

  buildPath(
    strategy: string,
    model: string,
    endpoint: string,
    credentials: Credentials
  ): AuthResult<string> {
    const impl = this.strategyFor(strategy);
    if (!impl.success) {
      return impl;
    }
    return ok(impl.data.buildPath(model, endpoint, credentials));
  }

  async refreshCredentials(
    strategy: string,
    credentials: Credentials
  ): Promise<AuthResult<Credentials>> {
    const impl = this.strategyFor(strategy);
    if (!impl.success) {
      return impl;
    }

    const refreshed = await impl.data.refreshCredentials(credentials);
    if (!refreshed.success) {
      return fail(this.prefixed(impl.data, refreshed.error));
    }
    return refreshed;
  }

  /**
   * Build the full request target for a model call
   */
  async prepareRequest(
    strategy: string,
    options: PrepareRequestOptions
  ): Promise<AuthResult<RequestTarget>> {
    const { model, endpoint, stream, ...authOptions } = options;

    const authorized = await this.authorize(strategy, authOptions);
    if (!authorized.success) {
      return authorized;
    }

    const { strategy: impl, credentials, headers } = authorized.data;
    const method = stream ? STREAM_ENDPOINT : (endpoint ?? DEFAULT_ENDPOINT);

    const baseUrl = impl.baseUrl(credentials);
    if (!baseUrl.success) {
      return fail(this.prefixed(impl, baseUrl.error));
    }

    const target: RequestTarget = {
      strategy: impl.kind,
      method: "POST",
      url: joinUrl(baseUrl.data, impl.buildPath(model, method, credentials)),
      headers: stream ? [...headers, EVENT_STREAM_ACCEPT] : headers,
    };

    this.logger.debug("Prepared model request", {
      strategy: target.strategy,
      url: target.url,
      stream: Boolean(stream),
    });

    return ok(target);
  }

  /**
   * Build a GET target for the model listing endpoint
   */
  async prepareListModels(
    strategy: string,
    options: AuthRequestOptions = {}
  ): Promise<AuthResult<RequestTarget>> {
    const authorized = await this.authorize(strategy, options);
    if (!authorized.success) {
      return authorized;
    }

    const { strategy: impl, credentials, headers } = authorized.data;

    const baseUrl = impl.baseUrl(credentials);
    if (!baseUrl.success) {
      return fail(this.prefixed(impl, baseUrl.error));
    }

    return ok<RequestTarget>({
      strategy: impl.kind,
      method: "GET",
      url: joinUrl(baseUrl.data, impl.modelsPath(credentials)),
      headers,
    });
  }

  private async authorize(
    strategy: string,
    options: AuthRequestOptions
  ): Promise<AuthResult<Authorized>> {
    const impl = this.strategyFor(strategy);
    if (!impl.success) {
      return impl;
    }

    const resolved = this.resolver.resolve(impl.data.kind, options);
    if (!resolved.success) {
      return fail(this.prefixed(impl.data, resolved.error));
    }

    const { credentials } = resolved.data;
    const context = await impl.data.authenticate(credentials);
    if (!context.success) {
      this.logger.warn("Authentication failed", {
        strategy: impl.data.kind,
        error: context.error.message,
      });
      return fail(this.prefixed(impl.data, context.error));
    }

    this.logger.debug("Authenticated", {
      strategy: impl.data.kind,
      auth_type: context.data.authType,
    });

    const headers = await impl.data.headers(credentials);
    return ok({ strategy: impl.data, credentials, headers });
  }

  private strategyFor(strategy: string): AuthResult<AuthStrategy> {
    if (!isAuthStrategyKind(strategy)) {
      return fail(new UnknownStrategyError(strategy));
    }
    return ok(this.strategies[strategy]);
  }

  private prefixed(strategy: AuthStrategy, error: AuthError): AuthError {
    return error.withPrefix(`${strategy.displayName} auth failed: `);
  }
}
