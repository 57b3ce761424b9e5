/**
 * Service account key file reading shared by JWTManager and ServiceAccountStrategy
 */

import { readFile } from "node:fs/promises";
import type { ServiceAccountData } from "../types/auth.js";
import { fail, ok, type AuthError, type AuthResult } from "./errors.js";

/**
 * Builds the error reported for each failure; callers word these differently
 */
export interface KeyFileErrors {
  unreadable(error: unknown): AuthError;
  /** `error` is undefined when the JSON parsed but is not an object */
  malformed(error?: unknown): AuthError;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a key file and parse it as a JSON object
 */
export async function readKeyFileJson(
  keyPath: string,
  errors: KeyFileErrors
): Promise<AuthResult<ServiceAccountData>> {
  let content: string;
  try {
    content = await readFile(keyPath, "utf-8");
  } catch (error) {
    return fail(errors.unreadable(error));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return fail(errors.malformed(error));
  }

  if (!isRecord(data)) {
    return fail(errors.malformed());
  }

  return ok(data);
}
