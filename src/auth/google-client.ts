/**
 * Outbound HTTP calls to Google credential endpoints
 * Uses undici; callers may inject a dispatcher (a MockAgent in tests)
 */

import { request as undiciRequest, type Dispatcher } from "undici";
import type { Logger } from "../logging/logger.js";
import { TransportError, describeError } from "./errors.js";

export const IAM_CREDENTIALS_URL = "https://iamcredentials.googleapis.com/v1";
export const OAUTH2_TOKEN_URL = "https://oauth2.googleapis.com/token";

export interface GoogleResponse {
  statusCode: number;
  body: string;
}

export interface GoogleClientOptions {
  logger: Logger;
  dispatcher?: Dispatcher;
}

/**
 * Minimal client for the IAM signJwt and OAuth2 token endpoints.
 * Non-2xx statuses are returned to the caller; only network failures throw.
 */
export class GoogleClient {
  private logger: Logger;
  private dispatcher?: Dispatcher;

  constructor(options: GoogleClientOptions) {
    this.logger = options.logger;
    this.dispatcher = options.dispatcher;
  }

  /**
   * POST a JSON body
   */
  async postJson(
    url: string,
    payload: unknown,
    headers: Record<string, string> = {}
  ): Promise<GoogleResponse> {
    return this.post(url, JSON.stringify(payload), {
      ...headers,
      "Content-Type": "application/json",
    });
  }

  /**
   * POST an application/x-www-form-urlencoded body
   */
  async postForm(
    url: string,
    fields: Record<string, string>,
    headers: Record<string, string> = {}
  ): Promise<GoogleResponse> {
    return this.post(url, new URLSearchParams(fields).toString(), {
      ...headers,
      "Content-Type": "application/x-www-form-urlencoded",
    });
  }

  private async post(
    url: string,
    body: string,
    headers: Record<string, string>
  ): Promise<GoogleResponse> {
    const startTime = Date.now();
    const endpoint = new URL(url);

    try {
      const response = await undiciRequest(endpoint, {
        method: "POST",
        headers,
        body,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });

      const text = await response.body.text();

      this.logger.debug("Google endpoint responded", {
        host: endpoint.host,
        status_code: response.statusCode,
        latency_ms: Date.now() - startTime,
      });

      return { statusCode: response.statusCode, body: text };
    } catch (error) {
      this.logger.error("Google endpoint request failed", {
        host: endpoint.host,
        error: describeError(error),
      });
      throw new TransportError(`Request failed: ${describeError(error)}`, { cause: error });
    }
  }
}
