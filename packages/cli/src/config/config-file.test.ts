/**
 * Tests for configuration file loading
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import { findConfig, loadConfigFile } from "./config-file.js";
import { createTempDir, removeTempDir, writeFixture } from "../testing/fixtures.js";

describe("loadConfigFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir("config-test");
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it("parses every supported key", async () => {
    const configPath = await writeFixture(tempDir, "filemeta.config.yaml", [
      "locales: [de_DE, en]",
      "terminal: [xterm, -e]",
      'display: ":0"',
      "logLevel: debug",
      "mimeOverrides:",
      '  ".conf": text/plain',
      "",
    ].join("\n"));

    expect(await loadConfigFile(configPath)).toEqual({
      locales: ["de_DE", "en"],
      terminal: ["xterm", "-e"],
      display: ":0",
      logLevel: "debug",
      mimeOverrides: { ".conf": "text/plain" },
    });
  });

  it("treats an empty file as an empty config", async () => {
    const configPath = await writeFixture(tempDir, "filemeta.config.yaml", "");
    expect(await loadConfigFile(configPath)).toEqual({});
  });

  it("lists every validation problem", async () => {
    const configPath = await writeFixture(tempDir, "filemeta.config.yaml", [
      "logLevel: loud",
      "colour: true",
      "",
    ].join("\n"));

    await expect(loadConfigFile(configPath)).rejects.toThrow(
      `Invalid config in ${configPath}:\n` +
      "  - logLevel: Invalid enum value. Expected 'silent' | 'warn' | 'info' | 'debug', received 'loud'\n" +
      "  - (root): Unrecognized key(s) in object: 'colour'"
    );
  });

  it("rejects suffixes without a leading dot", async () => {
    const configPath = await writeFixture(
      tempDir,
      "filemeta.config.yaml",
      "mimeOverrides:\n  conf: text/plain\n"
    );

    await expect(loadConfigFile(configPath)).rejects.toThrow("Suffix must start with a dot");
  });
});

describe("findConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir("find-config-test");
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it("finds a config file in a parent directory", async () => {
    const nested = path.join(tempDir, "a", "b");
    await fs.mkdir(nested, { recursive: true });
    const configPath = await writeFixture(tempDir, "filemeta.config.yml", "display: ':2'\n");

    expect(await findConfig(nested)).toEqual({
      config: { display: ":2" },
      configPath,
    });
  });

  it("prefers the nearest config file", async () => {
    const nested = path.join(tempDir, "project");
    await fs.mkdir(nested);
    await writeFixture(tempDir, "filemeta.config.yaml", "logLevel: info\n");
    const nearest = await writeFixture(nested, "filemeta.config.yaml", "logLevel: debug\n");

    const found = await findConfig(nested);
    expect(found?.configPath).toBe(nearest);
    expect(found?.config.logLevel).toBe("debug");
  });

  it("reports an invalid config instead of skipping it", async () => {
    await writeFixture(tempDir, "filemeta.config.yaml", "logLevel: 3\n");
    await expect(findConfig(tempDir)).rejects.toThrow("Invalid config in");
  });
});
