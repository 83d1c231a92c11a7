import { readFile, writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { ConversionIoError, InputPathError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { convertSource } from "../machine/converter.js";
import { DEFAULT_CONFIG, type ResolvedConfig } from "../types/config.js";
import type { MachineType } from "../types/machine.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface ConvertFileOptions {
  inputPath?: string;
  config?: ResolvedConfig;
  logger?: Logger;
}

export interface ConvertFileResult {
  machineType: MachineType;
  targetModel: MachineType;
  inputPath: string;
  outputPath: string;
  transitionCount: number;
}

/**
 * Output path for an input path: same path with the input extension replaced.
 * Throws {@link InputPathError} when the input does not carry that extension.
 */
export function deriveOutputPath(inputPath: string, config: ResolvedConfig = DEFAULT_CONFIG): string {
  const ext = extname(inputPath);
  if (ext !== `.${config.inputExtension}`) {
    throw new InputPathError(inputPath, config.inputExtension);
  }
  return `${inputPath.slice(0, -ext.length)}.${config.outputExtension}`;
}

/**
 * Read a table, convert it and write the result beside it.
 * Nothing is written unless the whole conversion succeeds.
 */
export async function convertFile(options: ConvertFileOptions = {}): Promise<ConvertFileResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? noopLogger;
  const inputPath = options.inputPath ?? config.defaultInputPath;
  const outputPath = deriveOutputPath(inputPath, config);
  logger.info("Converting table", { inputPath });

  let source: string;
  try {
    source = await readFile(inputPath, "utf8");
  } catch (err) {
    throw new ConversionIoError(inputPath, { cause: err });
  }

  const result = convertSource(source, { dialect: config.dialect, logger });
  for (const collision of result.collisions) {
    logger.warn("State label overlaps a reserved control-state name", {
      label: collision.label,
      reserved: collision.reserved,
    });
  }

  try {
    await writeFile(outputPath, result.output, "utf8");
  } catch (err) {
    throw new ConversionIoError(outputPath, { cause: err });
  }
  logger.info("Wrote converted table", {
    inputPath,
    outputPath,
    machineType: result.machineType,
    transitions: result.records.length,
  });

  return {
    machineType: result.machineType,
    targetModel: result.targetModel,
    inputPath,
    outputPath,
    transitionCount: result.records.length,
  };
}
