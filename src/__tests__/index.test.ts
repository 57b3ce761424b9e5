import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, unlink, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigurationError, createLogger, createMultiAuthCoordinator } from "../index.js";

describe("createMultiAuthCoordinator", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "genai-multi-auth-index-"));
    for (const name of [
      "VERTEX_LOCATION",
      "GOOGLE_CLOUD_LOCATION",
      "VERTEX_SERVICE_ACCOUNT",
      "VERTEX_JSON_FILE",
    ]) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it("wires YAML settings and an env file into the coordinator", async () => {
    const configPath = path.join(dir, "auth.yaml");
    const envFile = path.join(dir, ".env");
    await writeFile(configPath, "vertex_ai:\n  project_id: yaml-project\n  location: us-east1\n");
    await writeFile(envFile, "VERTEX_ACCESS_TOKEN=test-env-token\n");

    const coordinator = createMultiAuthCoordinator({
      configPath,
      envFile,
      logger: createLogger("SILENT"),
    });

    const result = await coordinator.prepareListModels("vertex_ai", {
      projectId: "call-project",
    });

    expect(result).toEqual({
      success: true,
      data: {
        strategy: "vertex_ai",
        method: "GET",
        url: "https://us-east1-aiplatform.googleapis.com/v1/projects/call-project/locations/us-east1/publishers/google/models",
        headers: [
          ["Content-Type", "application/json"],
          ["Authorization", "Bearer test-env-token"],
        ],
      },
    });
  });

  it("rejects a missing env file when the coordinator is created", async () => {
    const configPath = path.join(dir, "auth.yaml");
    const envFile = path.join(dir, "missing.env");
    await writeFile(configPath, "gemini:\n  api_key: test-api-key\n");

    expect(() =>
      createMultiAuthCoordinator({ configPath, envFile, logger: createLogger("SILENT") })
    ).toThrow(`Env file not found: ${envFile}`);
  });

  it("returns a failed result when the env file disappears later", async () => {
    const configPath = path.join(dir, "auth.yaml");
    const envFile = path.join(dir, ".env");
    await writeFile(configPath, "gemini:\n  api_key: test-api-key\n");
    await writeFile(envFile, "LOG_LEVEL=SILENT\n");

    const coordinator = createMultiAuthCoordinator({
      configPath,
      envFile,
      logger: createLogger("SILENT"),
    });
    await unlink(envFile);

    const result = await coordinator.coordinateAuth("gemini", { apiKey: "sk-live-123" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.message).toBe(`Gemini auth failed: Env file not found: ${envFile}`);
    }
  });
});
