import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { exportPKCS8, generateKeyPair, type JWTPayload as JoseClaims } from "jose";
import { createLogger } from "../../logging/logger.js";
import { JWT_ALGORITHM, type SignOptions, type Signer } from "../signer.js";

export const silentLogger = createLogger("SILENT");

export const CLIENT_EMAIL = "svc@test-project.iam.gserviceaccount.com";
export const PROJECT_ID = "test-project";

/**
 * Key file contents with a placeholder private key, for use with FakeSigner
 */
export function fakeKeyData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: "service_account",
    project_id: PROJECT_ID,
    private_key_id: "key-1",
    private_key: "test-private-key",
    client_email: CLIENT_EMAIL,
    client_id: "100000000000000000001",
    auth_uri: "https://accounts.google.com/o/oauth2/auth",
    token_uri: "https://oauth2.googleapis.com/token",
    auth_provider_x509_cert_url: "https://www.googleapis.com/oauth2/v1/certs",
    client_x509_cert_url: "https://www.googleapis.com/robot/v1/metadata/x509/svc",
    ...overrides,
  };
}

/**
 * Key file contents with a freshly generated RSA key
 */
export async function realKeyData(): Promise<Record<string, unknown>> {
  const { privateKey } = await generateKeyPair(JWT_ALGORITHM, { extractable: true });
  return fakeKeyData({ private_key: await exportPKCS8(privateKey) });
}

export interface SignCall {
  claims: JoseClaims;
  privateKeyPem: string;
  options?: SignOptions;
}

/**
 * Records calls and returns a predictable token
 */
export class FakeSigner implements Signer {
  readonly algorithm = JWT_ALGORITHM;
  readonly calls: SignCall[] = [];

  async sign(claims: JoseClaims, privateKeyPem: string, options?: SignOptions): Promise<string> {
    this.calls.push({ claims, privateKeyPem, options });
    return `header.${String(claims.iss)}.signature`;
  }
}

export interface TempDir {
  dir: string;
  write(name: string, content: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "genai-multi-auth-"));
  return {
    dir,
    async write(name, content) {
      const filePath = path.join(dir, name);
      await writeFile(filePath, content, "utf-8");
      return filePath;
    },
    async cleanup() {
      await rm(dir, { recursive: true, force: true });
    },
  };
}
