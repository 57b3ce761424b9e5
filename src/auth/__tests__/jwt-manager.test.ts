import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { decodeJwt, decodeProtectedHeader } from "jose";
import { JWTManager, toServiceAccountKey } from "../jwt-manager.js";
import {
  CLIENT_EMAIL,
  FakeSigner,
  createTempDir,
  fakeKeyData,
  realKeyData,
  silentLogger,
  type TempDir,
} from "./fixtures.js";

const NOW = 1_700_000_000;
const AUDIENCE = "https://aiplatform.googleapis.com/";

describe("JWTManager payloads", () => {
  const manager = new JWTManager({ logger: silentLogger, now: () => NOW });

  it("builds a one hour payload with the subject set to the audience", () => {
    expect(manager.createPayload(CLIENT_EMAIL, AUDIENCE)).toEqual({
      iss: CLIENT_EMAIL,
      aud: AUDIENCE,
      sub: AUDIENCE,
      iat: NOW,
      exp: NOW + 3600,
    });
  });

  it("honours an explicit lifetime and issue time", () => {
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE, {
      lifetimeSeconds: 600,
      issuedAt: 100,
    });
    expect(payload.iat).toBe(100);
    expect(payload.exp).toBe(700);
  });

  it("accepts a well formed payload", () => {
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);
    expect(manager.validatePayload(payload)).toEqual({ success: true, data: payload });
  });

  it("rejects an expiry that is not after issue time", () => {
    const result = manager.validatePayload({
      iss: CLIENT_EMAIL,
      aud: AUDIENCE,
      sub: AUDIENCE,
      iat: NOW,
      exp: NOW,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("credential_format_error");
      expect(result.error.message).toBe("Invalid JWT payload format");
    }
  });

  it("rejects an empty issuer", () => {
    const result = manager.validatePayload(manager.createPayload("", AUDIENCE));
    expect(result.success).toBe(false);
  });
});

describe("JWTManager local signing", () => {
  it("signs with RS256 using a real key and includes the key id", async () => {
    const manager = new JWTManager({ logger: silentLogger, now: () => NOW });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithKey(payload, await realKeyData());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(decodeJwt(result.data)).toEqual(payload);
      expect(decodeProtectedHeader(result.data)).toEqual({
        alg: "RS256",
        typ: "JWT",
        kid: "key-1",
      });
    }
  });

  it("reports missing key material", async () => {
    const manager = new JWTManager({ logger: silentLogger, signer: new FakeSigner() });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithKey(payload, fakeKeyData({ private_key: undefined }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("signing_error");
      expect(result.error.message).toBe("Invalid service account key format");
    }
  });

  it("reports a private key that is not PEM", async () => {
    const manager = new JWTManager({ logger: silentLogger });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithKey(payload, fakeKeyData());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("signing_error");
      expect(result.error.message.startsWith("Invalid service account key format: ")).toBe(true);
    }
  });
});

describe("JWTManager with Google endpoints", () => {
  let agent: MockAgent;
  let temp: TempDir;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    temp = await createTempDir();
  });

  afterEach(async () => {
    await agent.close();
    await temp.cleanup();
  });

  it("returns the signed JWT from the IAM API", async () => {
    agent
      .get("https://iamcredentials.googleapis.com")
      .intercept({
        path: "/v1/projects/-/serviceAccounts/svc%40test-project.iam.gserviceaccount.com:signJwt",
        method: "POST",
      })
      .reply(200, { keyId: "key-1", signedJwt: "aaa.bbb.ccc" });

    const manager = new JWTManager({ logger: silentLogger, dispatcher: agent, now: () => NOW });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithIamApi(payload, CLIENT_EMAIL, "test-access-token");

    expect(result).toEqual({ success: true, data: "aaa.bbb.ccc" });
  });

  it("surfaces a 403 from the IAM API with status and body", async () => {
    agent
      .get("https://iamcredentials.googleapis.com")
      .intercept({ path: (path) => path.endsWith(":signJwt"), method: "POST" })
      .reply(403, "permission denied");

    const manager = new JWTManager({ logger: silentLogger, dispatcher: agent, now: () => NOW });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithIamApi(payload, CLIENT_EMAIL, "test-access-token");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("signing_error");
      expect(result.error.message).toBe("HTTP 403: permission denied");
      expect(result.error).toMatchObject({ statusCode: 403, body: "permission denied" });
    }
  });

  it("rejects a 200 response without signedJwt", async () => {
    agent
      .get("https://iamcredentials.googleapis.com")
      .intercept({ path: (path) => path.endsWith(":signJwt"), method: "POST" })
      .reply(200, { keyId: "key-1" });

    const manager = new JWTManager({ logger: silentLogger, dispatcher: agent, now: () => NOW });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithIamApi(payload, CLIENT_EMAIL, "test-access-token");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Unexpected response format: {"keyId":"key-1"}');
    }
  });

  it("rejects an empty signedJwt", async () => {
    agent
      .get("https://iamcredentials.googleapis.com")
      .intercept({ path: (path) => path.endsWith(":signJwt"), method: "POST" })
      .reply(200, { keyId: "key-1", signedJwt: "" });

    const manager = new JWTManager({ logger: silentLogger, dispatcher: agent, now: () => NOW });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithIamApi(payload, CLIENT_EMAIL, "test-access-token");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("signing_error");
      expect(result.error.message).toBe(
        'Unexpected response format: {"keyId":"key-1","signedJwt":""}'
      );
    }
  });

  it("maps a network failure to a transport error", async () => {
    agent
      .get("https://iamcredentials.googleapis.com")
      .intercept({ path: (path) => path.endsWith(":signJwt"), method: "POST" })
      .replyWithError(new Error("socket hang up"));

    const manager = new JWTManager({ logger: silentLogger, dispatcher: agent, now: () => NOW });
    const payload = manager.createPayload(CLIENT_EMAIL, AUDIENCE);

    const result = await manager.signWithIamApi(payload, CLIENT_EMAIL, "test-access-token");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("transport_error");
    }
  });

  it("prefers the key file over an access token", async () => {
    const signer = new FakeSigner();
    const manager = new JWTManager({
      logger: silentLogger,
      signer,
      dispatcher: agent,
      now: () => NOW,
    });
    const keyPath = await temp.write("key.json", JSON.stringify(fakeKeyData()));

    const result = await manager.createSignedToken(CLIENT_EMAIL, AUDIENCE, {
      serviceAccountKeyPath: keyPath,
      accessToken: "test-access-token",
    });

    expect(result).toEqual({ success: true, data: `header.${CLIENT_EMAIL}.signature` });
    expect(signer.calls).toHaveLength(1);
    expect(signer.calls[0]?.privateKeyPem).toBe("test-private-key");
    expect(signer.calls[0]?.claims).toEqual({
      iss: CLIENT_EMAIL,
      aud: AUDIENCE,
      sub: AUDIENCE,
      iat: NOW,
      exp: NOW + 3600,
    });
  });

  it("signs inline key data when no key file is given", async () => {
    const signer = new FakeSigner();
    const manager = new JWTManager({ logger: silentLogger, signer, now: () => NOW });

    const result = await manager.createSignedToken(CLIENT_EMAIL, AUDIENCE, {
      serviceAccountData: fakeKeyData(),
    });

    expect(result.success).toBe(true);
    expect(signer.calls[0]?.options).toEqual({ keyId: "key-1" });
  });

  it("requires some signing material", async () => {
    const manager = new JWTManager({ logger: silentLogger, now: () => NOW });

    const result = await manager.createSignedToken(CLIENT_EMAIL, AUDIENCE);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("configuration_error");
      expect(result.error.message).toBe(
        "Either service_account_key, service_account_data, or access_token must be provided"
      );
    }
  });

  it("exchanges a signed assertion for an access token", async () => {
    const signer = new FakeSigner();
    agent
      .get("https://oauth2.googleapis.com")
      .intercept({ path: "/token", method: "POST" })
      .reply(200, { access_token: "ya29.test-token", expires_in: 3599, token_type: "Bearer" });

    const manager = new JWTManager({
      logger: silentLogger,
      signer,
      dispatcher: agent,
      now: () => NOW,
    });

    const result = await manager.exchangeForAccessToken(toServiceAccountKey(fakeKeyData()));

    expect(result).toEqual({ success: true, data: "ya29.test-token" });
    expect(signer.calls[0]?.claims).toEqual({
      iss: CLIENT_EMAIL,
      scope: "https://www.googleapis.com/auth/cloud-platform",
      aud: "https://oauth2.googleapis.com/token",
      iat: NOW,
      exp: NOW + 3600,
    });
  });

  it("reports a rejected token exchange", async () => {
    agent
      .get("https://oauth2.googleapis.com")
      .intercept({ path: "/token", method: "POST" })
      .reply(400, "invalid_grant");

    const manager = new JWTManager({
      logger: silentLogger,
      signer: new FakeSigner(),
      dispatcher: agent,
    });

    const result = await manager.exchangeForAccessToken(toServiceAccountKey(fakeKeyData()));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Token exchange failed: HTTP 400: invalid_grant");
    }
  });
});

describe("JWTManager key files", () => {
  let temp: TempDir;
  const manager = new JWTManager({ logger: silentLogger });

  beforeEach(async () => {
    temp = await createTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("loads a key file into camelCase fields", async () => {
    const keyPath = await temp.write("key.json", JSON.stringify(fakeKeyData()));

    const result = await manager.loadServiceAccountKey(keyPath);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        type: "service_account",
        projectId: "test-project",
        privateKeyId: "key-1",
        privateKey: "test-private-key",
        clientEmail: CLIENT_EMAIL,
        clientId: "100000000000000000001",
        authUri: "https://accounts.google.com/o/oauth2/auth",
        tokenUri: "https://oauth2.googleapis.com/token",
        authProviderCertUrl: "https://www.googleapis.com/oauth2/v1/certs",
        clientCertUrl: "https://www.googleapis.com/robot/v1/metadata/x509/svc",
      });
      expect(manager.getServiceAccountEmail(result.data)).toBe(CLIENT_EMAIL);
    }
  });

  it("distinguishes unreadable files from malformed JSON", async () => {
    const missing = await manager.loadServiceAccountKey(`${temp.dir}/missing.json`);
    const brokenPath = await temp.write("broken.json", "{not json");
    const broken = await manager.loadServiceAccountKey(brokenPath);

    expect(missing.success).toBe(false);
    expect(broken.success).toBe(false);
    if (!missing.success && !broken.success) {
      expect(missing.error.kind).toBe("configuration_error");
      expect(missing.error.message.startsWith("Failed to read file: ")).toBe(true);
      expect(broken.error.kind).toBe("credential_format_error");
      expect(broken.error.message.startsWith("Failed to parse JSON: ")).toBe(true);
    }
  });

  it("rejects a key file that is not a JSON object", async () => {
    const keyPath = await temp.write("list.json", "[]");

    const result = await manager.loadServiceAccountKey(keyPath);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("credential_format_error");
      expect(result.error.message).toBe("Failed to parse JSON: key file is not an object");
    }
  });
});
