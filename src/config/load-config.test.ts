import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, ConversionIoError } from "../errors.js";
import { loadConfigFile } from "./load-config.js";

describe("loadConfigFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tapeshift-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads and resolves a JSON file", async () => {
    const path = join(dir, "tapeshift.json");
    writeFileSync(path, JSON.stringify({ dialect: { rightWall: "%" }, outputExtension: "sim" }));

    const config = await loadConfigFile(path);
    expect(config.dialect.rightWall).toBe("%");
    expect(config.outputExtension).toBe("sim");
    expect(config.inputExtension).toBe("in");
  });

  it("wraps read failures as I/O errors", async () => {
    await expect(loadConfigFile(join(dir, "missing.json"))).rejects.toBeInstanceOf(
      ConversionIoError,
    );
  });

  it("rejects malformed JSON", async () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ dialect: ");

    await expect(loadConfigFile(path)).rejects.toThrow(
      `Invalid configuration: ${path} is not valid JSON`,
    );
  });

  it("rejects invalid settings", async () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ dialect: { blank: "__" } }));

    await expect(loadConfigFile(path)).rejects.toBeInstanceOf(ConfigError);
  });
});
