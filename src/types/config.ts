import type { z } from "zod";
import { converterConfigSchema, type dialectOverridesSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";
import { CONTENT_BITS, DEFAULT_DIALECT, type Dialect } from "./dialect.js";

/** User-supplied configuration; every field is optional. */
export type ConverterConfig = z.infer<typeof converterConfigSchema>;
type DialectOverrides = z.infer<typeof dialectOverridesSchema>;

/** Fully resolved configuration with defaults applied. */
export interface ResolvedConfig {
  dialect: Dialect;
  defaultInputPath: string; // default: "example.in"
  inputExtension: string; // default: "in"
  outputExtension: string; // default: "out"
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  dialect: DEFAULT_DIALECT,
  defaultInputPath: "example.in",
  inputExtension: "in",
  outputExtension: "out",
};

function mergeDialect(overrides: DialectOverrides | undefined): Dialect {
  const base = DEFAULT_DIALECT;
  if (!overrides) return base;
  return {
    leftWall: overrides.leftWall ?? base.leftWall,
    rightWall: overrides.rightWall ?? base.rightWall,
    blank: overrides.blank ?? base.blank,
    wildcard: overrides.wildcard ?? base.wildcard,
    commentDelimiter: overrides.commentDelimiter ?? base.commentDelimiter,
    directions: {
      left: overrides.directions?.left ?? base.directions.left,
      right: overrides.directions?.right ?? base.directions.right,
      stay: overrides.directions?.stay ?? base.directions.stay,
    },
    headers: {
      infinite: overrides.headers?.infinite ?? base.headers.infinite,
      sipser: overrides.headers?.sipser ?? base.headers.sipser,
    },
    haltPrefix: overrides.haltPrefix ?? base.haltPrefix,
    simPrefix: overrides.simPrefix ?? base.simPrefix,
    startState: overrides.startState ?? base.startState,
  };
}

/** Checks that only make sense once overrides are merged over the defaults. */
function checkResolved(config: ResolvedConfig): void {
  const { leftWall, rightWall, blank, wildcard, commentDelimiter, directions, headers } =
    config.dialect;
  const reserved = [leftWall, rightWall, blank, wildcard];
  if (new Set(reserved).size !== 4) {
    throw new ConfigError("boundary markers, blank and wildcard must be distinct symbols");
  }
  const bit = reserved.find((s) => CONTENT_BITS.includes(s));
  if (bit !== undefined) {
    throw new ConfigError(`'${bit}' is a content bit and cannot be a reserved symbol`);
  }
  if (reserved.includes(commentDelimiter) || CONTENT_BITS.includes(commentDelimiter)) {
    throw new ConfigError("comment delimiter must differ from every tape symbol");
  }
  if (new Set([directions.left, directions.right, directions.stay]).size !== 3) {
    throw new ConfigError("direction tokens must be distinct");
  }
  if (headers.infinite === headers.sipser) {
    throw new ConfigError("header tokens must be distinct");
  }
  if (config.inputExtension === config.outputExtension) {
    throw new ConfigError("input and output extensions must differ");
  }
}

/**
 * Validate user configuration and merge it over {@link DEFAULT_CONFIG}.
 * Accepts unvalidated input (e.g. parsed JSON); throws {@link ConfigError}.
 */
export function resolveConfig(config: unknown = {}): ResolvedConfig {
  const validation = converterConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(validation.error.message, { cause: validation.error });
  }

  const user = validation.data;
  const resolved: ResolvedConfig = {
    dialect: mergeDialect(user.dialect),
    defaultInputPath: user.defaultInputPath ?? DEFAULT_CONFIG.defaultInputPath,
    inputExtension: user.inputExtension ?? DEFAULT_CONFIG.inputExtension,
    outputExtension: user.outputExtension ?? DEFAULT_CONFIG.outputExtension,
  };
  checkResolved(resolved);
  return resolved;
}
