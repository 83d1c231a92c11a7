import { readFile } from "node:fs/promises";
import { ConfigError, ConversionIoError } from "../errors.js";
import { type ResolvedConfig, resolveConfig } from "../types/config.js";

/** Read a JSON configuration file and resolve it over the defaults. */
export async function loadConfigFile(path: string): Promise<ResolvedConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConversionIoError(path, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: err });
  }
  return resolveConfig(json);
}
