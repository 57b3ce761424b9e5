/**
 * JWT creation and signing for Google Cloud service accounts
 *
 * Two signing backends:
 * - local RS256 signing with the private key from a service account key file
 * - the IAM Credentials signJwt API, authorised by an existing access token
 *
 * Also exchanges a self-signed assertion for an OAuth2 access token
 * (JWT bearer grant), which is how key material becomes a usable bearer token.
 */

import type { JWTPayload as JoseClaims } from "jose";
import type { Dispatcher } from "undici";
import type { Logger } from "../logging/logger.js";
import { createDefaultLogger } from "../logging/logger.js";
import type { JWTPayload, ServiceAccountData, ServiceAccountKey } from "../types/auth.js";
import {
  AuthError,
  ConfigurationError,
  CredentialFormatError,
  SigningError,
  TransportError,
  describeError,
  fail,
  ok,
  type AuthResult,
} from "./errors.js";
import {
  GoogleClient,
  IAM_CREDENTIALS_URL,
  OAUTH2_TOKEN_URL,
  type GoogleResponse,
} from "./google-client.js";
import { isRecord, readKeyFileJson } from "./key-file.js";
import { JoseSigner, type Signer } from "./signer.js";

/** Token lifetime in seconds */
export const DEFAULT_TOKEN_LIFETIME = 3600;

export const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";

const JWT_BEARER_GRANT = "urn:ietf:params:oauth:grant-type:jwt-bearer";

export interface PayloadOptions {
  lifetimeSeconds?: number;
  /** Unix seconds; defaults to the manager's clock */
  issuedAt?: number;
}

export interface SignedTokenOptions extends PayloadOptions {
  serviceAccountKeyPath?: string;
  serviceAccountData?: ServiceAccountData | ServiceAccountKey;
  accessToken?: string;
}

export interface JWTManagerOptions {
  logger?: Logger;
  signer?: Signer;
  dispatcher?: Dispatcher;
  /** Current time in unix seconds */
  now?: () => number;
}

function stringField(data: Readonly<Record<string, unknown>>, field: string): string | undefined {
  const value = data[field];
  return typeof value === "string" ? value : undefined;
}

function isServiceAccountKey(
  key: ServiceAccountData | ServiceAccountKey
): key is ServiceAccountKey {
  return "privateKey" in key || "clientEmail" in key;
}

/**
 * Map raw key file JSON (snake_case) onto ServiceAccountKey
 */
export function toServiceAccountKey(data: ServiceAccountData): ServiceAccountKey {
  return {
    type: stringField(data, "type"),
    projectId: stringField(data, "project_id"),
    privateKeyId: stringField(data, "private_key_id"),
    privateKey: stringField(data, "private_key"),
    clientEmail: stringField(data, "client_email"),
    clientId: stringField(data, "client_id"),
    authUri: stringField(data, "auth_uri"),
    tokenUri: stringField(data, "token_uri"),
    authProviderCertUrl: stringField(data, "auth_provider_x509_cert_url"),
    clientCertUrl: stringField(data, "client_x509_cert_url"),
  };
}

export class JWTManager {
  private logger: Logger;
  private signer: Signer;
  private client: GoogleClient;
  private now: () => number;

  constructor(options: JWTManagerOptions = {}) {
    this.logger = options.logger ?? createDefaultLogger();
    this.signer = options.signer ?? new JoseSigner();
    this.client = new GoogleClient({ logger: this.logger, dispatcher: options.dispatcher });
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /**
   * Build a fresh claim set.
   * The subject is set to the audience, not the issuer.
   */
  createPayload(issuer: string, audience: string, options: PayloadOptions = {}): JWTPayload {
    const issuedAt = options.issuedAt ?? this.now();
    const lifetime = options.lifetimeSeconds ?? DEFAULT_TOKEN_LIFETIME;

    return {
      iss: issuer,
      aud: audience,
      sub: audience,
      iat: issuedAt,
      exp: issuedAt + lifetime,
    };
  }

  validatePayload(payload: JWTPayload): AuthResult<JWTPayload> {
    const { iss, aud, sub, iat, exp } = payload;
    const stringsPresent = [iss, aud, sub].every(
      (claim) => typeof claim === "string" && claim.length > 0
    );

    if (!stringsPresent || !Number.isInteger(iat) || !Number.isInteger(exp) || exp <= iat) {
      return fail(new CredentialFormatError("Invalid JWT payload format"));
    }

    return ok(payload);
  }

  /**
   * Sign a payload locally with RS256
   */
  async signWithKey(
    payload: JWTPayload,
    key: ServiceAccountKey | ServiceAccountData
  ): Promise<AuthResult<string>> {
    const parsed = isServiceAccountKey(key) ? key : toServiceAccountKey(key);
    return this.signClaims({ ...payload }, parsed);
  }

  /**
   * Sign a payload through the IAM Credentials signJwt API
   */
  async signWithIamApi(
    payload: JWTPayload,
    serviceAccountEmail: string,
    accessToken: string
  ): Promise<AuthResult<string>> {
    const account = encodeURIComponent(serviceAccountEmail);
    const url = `${IAM_CREDENTIALS_URL}/projects/-/serviceAccounts/${account}:signJwt`;

    let response: GoogleResponse;
    try {
      response = await this.client.postJson(
        url,
        { payload: JSON.stringify(payload) },
        { Authorization: `Bearer ${accessToken}` }
      );
    } catch (error) {
      return fail(this.asTransportError(error));
    }

    if (response.statusCode !== 200) {
      this.logger.warn("IAM signJwt rejected request", {
        status_code: response.statusCode,
        service_account: serviceAccountEmail,
      });
      return fail(
        new SigningError(`HTTP ${response.statusCode}: ${response.body}`, {
          statusCode: response.statusCode,
          body: response.body,
        })
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body);
    } catch (error) {
      return fail(
        new SigningError(`Failed to parse response: ${describeError(error)}`, {
          statusCode: response.statusCode,
          body: response.body,
          cause: error,
        })
      );
    }

    if (isRecord(parsed) && typeof parsed.signedJwt === "string" && parsed.signedJwt) {
      return ok(parsed.signedJwt);
    }

    return fail(
      new SigningError(`Unexpected response format: ${response.body}`, {
        statusCode: response.statusCode,
        body: response.body,
      })
    );
  }

  /**
   * Read and parse a service account key file
   */
  async loadServiceAccountKey(keyPath: string): Promise<AuthResult<ServiceAccountKey>> {
    const data = await readKeyFileJson(keyPath, {
      unreadable: (error) =>
        new ConfigurationError(`Failed to read file: ${describeError(error)}`, { cause: error }),
      malformed: (error) =>
        new CredentialFormatError(
          `Failed to parse JSON: ${error === undefined ? "key file is not an object" : describeError(error)}`,
          { cause: error }
        ),
    });
    if (!data.success) {
      return data;
    }

    return ok(toServiceAccountKey(data.data));
  }

  /**
   * Create a signed token. Backend is chosen in fixed order:
   * key file path, then inline key data, then the IAM API.
   */
  async createSignedToken(
    serviceAccountEmail: string,
    audience: string,
    options: SignedTokenOptions = {}
  ): Promise<AuthResult<string>> {
    const payload = this.createPayload(serviceAccountEmail, audience, options);

    const validation = this.validatePayload(payload);
    if (!validation.success) {
      return validation;
    }

    if (options.serviceAccountKeyPath) {
      const key = await this.loadServiceAccountKey(options.serviceAccountKeyPath);
      if (!key.success) {
        return key;
      }
      return this.signWithKey(payload, key.data);
    }

    if (options.serviceAccountData) {
      return this.signWithKey(payload, options.serviceAccountData);
    }

    if (options.accessToken) {
      return this.signWithIamApi(payload, serviceAccountEmail, options.accessToken);
    }

    return fail(
      new ConfigurationError(
        "Either service_account_key, service_account_data, or access_token must be provided"
      )
    );
  }

  getServiceAccountEmail(key: ServiceAccountKey): string | undefined {
    return key.clientEmail;
  }

  /**
   * Exchange a self-signed JWT bearer assertion for an OAuth2 access token
   */
  async exchangeForAccessToken(
    key: ServiceAccountKey,
    scope: string = CLOUD_PLATFORM_SCOPE
  ): Promise<AuthResult<string>> {
    const tokenUri = key.tokenUri || OAUTH2_TOKEN_URL;
    const issuedAt = this.now();

    const assertion = await this.signClaims(
      {
        iss: key.clientEmail,
        scope,
        aud: tokenUri,
        iat: issuedAt,
        exp: issuedAt + DEFAULT_TOKEN_LIFETIME,
      },
      key
    );
    if (!assertion.success) {
      return assertion;
    }

    let response: GoogleResponse;
    try {
      response = await this.client.postForm(tokenUri, {
        grant_type: JWT_BEARER_GRANT,
        assertion: assertion.data,
      });
    } catch (error) {
      return fail(this.asTransportError(error));
    }

    if (response.statusCode !== 200) {
      return fail(
        new SigningError(`Token exchange failed: HTTP ${response.statusCode}: ${response.body}`, {
          statusCode: response.statusCode,
          body: response.body,
        })
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body);
    } catch (error) {
      return fail(
        new SigningError(`Failed to parse token response: ${describeError(error)}`, {
          statusCode: response.statusCode,
          body: response.body,
          cause: error,
        })
      );
    }

    if (isRecord(parsed) && typeof parsed.access_token === "string" && parsed.access_token) {
      this.logger.debug("Exchanged service account assertion for access token", {
        client_email: key.clientEmail,
        expires_in: parsed.expires_in,
      });
      return ok(parsed.access_token);
    }

    return fail(
      new SigningError("Token response did not contain access_token", {
        statusCode: response.statusCode,
        body: response.body,
      })
    );
  }

  private async signClaims(
    claims: JoseClaims,
    key: ServiceAccountKey
  ): Promise<AuthResult<string>> {
    if (!key.privateKey || !key.clientEmail) {
      return fail(new SigningError("Invalid service account key format"));
    }

    try {
      const token = await this.signer.sign(claims, key.privateKey, { keyId: key.privateKeyId });
      return ok(token);
    } catch (error) {
      this.logger.warn("Local JWT signing failed", {
        client_email: key.clientEmail,
        error: describeError(error),
      });
      return fail(
        new SigningError(`Invalid service account key format: ${describeError(error)}`, {
          cause: error,
        })
      );
    }
  }

  private asTransportError(error: unknown): AuthError {
    if (error instanceof AuthError) {
      return error;
    }
    return new TransportError(`Request failed: ${describeError(error)}`, { cause: error });
  }
}
