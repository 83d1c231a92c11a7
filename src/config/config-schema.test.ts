import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONFIG, resolveConfig } from "../types/config.js";
import { DEFAULT_DIALECT } from "../types/dialect.js";
import { converterConfigSchema } from "./config-schema.js";

describe("config validation", () => {
  it("resolves to the defaults when nothing is given", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("merges dialect overrides over the default dialect", () => {
    const config = resolveConfig({ dialect: { blank: "B", directions: { stay: "s" } } });
    expect(config.dialect.blank).toBe("B");
    expect(config.dialect.directions).toEqual({ left: "l", right: "r", stay: "s" });
    expect(config.dialect.leftWall).toBe(DEFAULT_DIALECT.leftWall);
    expect(config.defaultInputPath).toBe("example.in");
  });

  it("accepts path settings", () => {
    const config = resolveConfig({
      defaultInputPath: "tables/machine.tm",
      inputExtension: "tm",
      outputExtension: "sim",
    });
    expect(config.defaultInputPath).toBe("tables/machine.tm");
    expect(config.inputExtension).toBe("tm");
    expect(config.outputExtension).toBe("sim");
  });

  it("rejects multi-character symbols", () => {
    expect(() => resolveConfig({ dialect: { leftWall: "##" } })).toThrow("Invalid configuration");
  });

  it("rejects labels containing whitespace", () => {
    expect(() => resolveConfig({ dialect: { haltPrefix: "halt now" } })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => resolveConfig({ port: 3456 })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ dialect: { marker: "#" } })).toThrow("Invalid configuration");
  });

  it("rejects extensions with a leading dot", () => {
    expect(() => resolveConfig({ inputExtension: ".in" })).toThrow("Invalid configuration");
  });

  it("rejects non-object input", () => {
    expect(() => resolveConfig("strict")).toThrow(ConfigError);
    expect(() => resolveConfig(null)).toThrow(ConfigError);
  });

  it("rejects overlapping reserved symbols", () => {
    expect(() => resolveConfig({ dialect: { blank: "#" } })).toThrow(
      "Invalid configuration: boundary markers, blank and wildcard must be distinct symbols",
    );
  });

  it("rejects reserved symbols that reuse a content bit", () => {
    expect(() => resolveConfig({ dialect: { blank: "0" } })).toThrow(
      "Invalid configuration: '0' is a content bit and cannot be a reserved symbol",
    );
    expect(() => resolveConfig({ dialect: { leftWall: "1" } })).toThrow(
      "Invalid configuration: '1' is a content bit and cannot be a reserved symbol",
    );
    expect(() => resolveConfig({ dialect: { rightWall: "1" } })).toThrow(ConfigError);
    expect(() => resolveConfig({ dialect: { wildcard: "0" } })).toThrow(ConfigError);
  });

  it("rejects a comment delimiter that is also a tape symbol", () => {
    expect(() => resolveConfig({ dialect: { commentDelimiter: "_" } })).toThrow(
      "Invalid configuration: comment delimiter must differ from every tape symbol",
    );
    expect(() => resolveConfig({ dialect: { commentDelimiter: "#" } })).toThrow(ConfigError);
    expect(() => resolveConfig({ dialect: { commentDelimiter: "0" } })).toThrow(ConfigError);
    expect(resolveConfig({ dialect: { commentDelimiter: "%" } }).dialect.commentDelimiter).toBe(
      "%",
    );
  });

  it("rejects duplicate direction and header tokens", () => {
    expect(() => resolveConfig({ dialect: { directions: { left: "r" } } })).toThrow(
      "Invalid configuration: direction tokens must be distinct",
    );
    expect(() => resolveConfig({ dialect: { headers: { sipser: ";I" } } })).toThrow(
      "Invalid configuration: header tokens must be distinct",
    );
  });

  it("rejects identical input and output extensions", () => {
    expect(() => resolveConfig({ outputExtension: "in" })).toThrow(
      "Invalid configuration: input and output extensions must differ",
    );
  });

  it("schema accepts an empty object", () => {
    expect(converterConfigSchema.safeParse({}).success).toBe(true);
  });
});
