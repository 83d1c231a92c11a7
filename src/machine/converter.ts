import type { Logger } from "../interfaces/logger.js";
import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import { type MachineType, type TransitionRecord, targetModelOf } from "../types/machine.js";
import { noopLogger } from "../utils/noop-logger.js";
import { resolveHeader } from "./header-resolver.js";
import { convertInfiniteToSipser } from "./infinite-to-sipser.js";
import { parseTransitions } from "./line-parser.js";
import { findReservedLabelCollisions, type LabelCollision } from "./reserved-labels.js";
import { serializeTable } from "./serializer.js";
import { convertSipserToInfinite } from "./sipser-to-infinite.js";
import { renameStates } from "./state-renamer.js";

export interface ConvertOptions {
  dialect?: Dialect;
  logger?: Logger;
}

export interface ConversionResult {
  /** Model declared by the input header. */
  machineType: MachineType;
  /** Model the output table runs under. */
  targetModel: MachineType;
  records: TransitionRecord[];
  collisions: LabelCollision[];
  output: string;
}

const PIPELINES: Record<
  MachineType,
  (renamed: readonly TransitionRecord[], dialect: Dialect) => TransitionRecord[]
> = {
  infinite: convertInfiniteToSipser,
  sipser: convertSipserToInfinite,
};

/** Split file content into lines, accepting `\n` and `\r\n` endings. */
export function splitLines(source: string): string[] {
  if (source === "") return [];
  const lines = source.split(/\r?\n/);
  // A terminating newline does not start another line.
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Convert the text of a transition table to the other tape convention.
 * Throws {@link HeaderError} or {@link ParseError}; transformation itself
 * cannot fail.
 */
export function convertSource(source: string, options: ConvertOptions = {}): ConversionResult {
  const dialect = options.dialect ?? DEFAULT_DIALECT;
  const logger = options.logger ?? noopLogger;

  const lines = splitLines(source);
  const machineType = resolveHeader(lines.length > 0 ? lines[0] : undefined, dialect);
  const parsed = parseTransitions(lines.slice(1), dialect, 2);
  logger.debug?.("Parsed transition table", { machineType, transitions: parsed.length });

  const renamed = renameStates(parsed, dialect);
  const collisions = findReservedLabelCollisions(renamed, dialect);
  const records = PIPELINES[machineType](renamed, dialect);
  logger.debug?.("Generated simulation table", {
    targetModel: targetModelOf(machineType),
    transitions: records.length,
  });

  return {
    machineType,
    targetModel: targetModelOf(machineType),
    records,
    collisions,
    output: serializeTable(machineType, records, dialect),
  };
}
