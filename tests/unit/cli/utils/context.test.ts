/**
 * Tests for command setup helpers.
 * @module tests/unit/cli/utils/context
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomBytes } from "node:crypto";
import {
  createClient,
  loadCliConfig,
  parseIdArgument,
} from "../../../../src/cli/utils/context.js";
import { CLIError, ExitCode } from "../../../../src/cli/utils/errors.js";

describe("CLI context", () => {
  let tempDir: string;
  const originalEnv = { ...process.env };

  beforeEach(async () => {
    tempDir = join(tmpdir(), `todomvc-cli-test-${randomBytes(8).toString("hex")}`);
    await mkdir(tempDir, { recursive: true });
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("TODOMVC_")) delete process.env[key];
    }
  });

  afterEach(async () => {
    process.env = { ...originalEnv };
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("createClient()", () => {
    it("should use --url as is", async () => {
      const client = await createClient({ url: "http://todo.test:9000/api" });

      expect(client.url).toBe("http://todo.test:9000/api");
    });

    it("should build the URL from the project configuration", async () => {
      await writeFile(
        join(tempDir, ".todomvcrc"),
        JSON.stringify({ server: { port: 9191, basePath: "/api" } }),
      );

      const client = await createClient({ project: tempDir });

      expect(client.url).toBe("http://127.0.0.1:9191/api");
    });

    it("should reach a wildcard listen address through loopback", async () => {
      await writeFile(
        join(tempDir, ".todomvcrc"),
        JSON.stringify({ server: { host: "0.0.0.0" } }),
      );

      const client = await createClient({ project: tempDir });

      expect(client.url).toBe("http://127.0.0.1:8080");
    });
  });

  describe("loadCliConfig()", () => {
    it("should report invalid configuration with CONFIG_ERROR", async () => {
      await writeFile(join(tempDir, ".todomvcrc"), "not json");

      const error = await loadCliConfig(tempDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CLIError);
      expect(error).toHaveProperty("code", ExitCode.CONFIG_ERROR);
      expect(error).toHaveProperty(
        "message",
        `Invalid JSON in ${join(tempDir, ".todomvcrc")}`,
      );
    });
  });

  describe("parseIdArgument()", () => {
    it("should accept numeric strings and numbers", () => {
      expect(parseIdArgument("12")).toBe(12);
      expect(parseIdArgument(3)).toBe(3);
    });

    it("should reject anything else with VALIDATION_ERROR", () => {
      expect(() => parseIdArgument("0")).toThrow("Invalid todo id: 0");
      expect(() => parseIdArgument("two")).toThrow(CLIError);
    });
  });
});
