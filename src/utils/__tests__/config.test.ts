/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigurationError, ErrorCode } from "../../core/errors.js";
import { loadConfig, requireApiKey } from "../config.js";

describe("loadConfig", () => {
  let tempDir: string;
  let configPath: string;

  beforeAll(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "config-test-"));
    configPath = path.join(tempDir, "config.json");
    await fs.promises.writeFile(
      configPath,
      JSON.stringify({ typedb: { address: "db.internal:8000", database: "from_file" }, frames: { fps: 1 } })
    );
  });

  afterAll(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("uses defaults when nothing is configured", () => {
    const config = loadConfig({ configPath: path.join(tempDir, "missing.json"), env: {} });

    expect(config).toEqual({
      typedb: { address: "http://localhost:8000", username: "admin", password: "password", database: "scene_graph" },
      model: { id: "claude-sonnet-4-20250514", maxTokens: 4096, queryMaxTokens: 1024 },
      frames: { fps: 0.5, maxFrames: 5 },
    });
  });

  it("layers file, environment and overrides", () => {
    const config = loadConfig({
      configPath,
      env: { TYPEDB_DATABASE: "from_env", TYPEDB_PASSWORD: "test-secret", SCENEGRAPH_MODEL: "test-model" },
      overrides: { typedb: { database: "from_flag", username: undefined }, frames: { maxFrames: 2 } },
    });

    expect(config.typedb).toEqual({
      address: "db.internal:8000",
      username: "admin",
      password: "test-secret",
      database: "from_flag",
    });
    expect(config.model.id).toBe("test-model");
    expect(config.frames).toEqual({ fps: 1, maxFrames: 2 });
  });

  it("rejects invalid values with the offending path", () => {
    expect(() => loadConfig({ configPath, env: {}, overrides: { frames: { fps: -1 } } })).toThrow(
      /^Invalid configuration: frames\.fps: /
    );
  });

  it("rejects an unreadable config file", async () => {
    const broken = path.join(tempDir, "broken.json");
    await fs.promises.writeFile(broken, "{ not json");

    expect(() => loadConfig({ configPath: broken, env: {} })).toThrow(ConfigurationError);
  });
});

describe("requireApiKey", () => {
  it("returns the key from the environment", () => {
    expect(requireApiKey({ ANTHROPIC_API_KEY: "test-key" })).toBe("test-key");
  });

  it("fails with a configuration error when missing", () => {
    let caught: unknown;
    try {
      requireApiKey({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: ErrorCode.CONFIG_MISSING_CREDENTIALS });
  });
});
