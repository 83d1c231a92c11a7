/**
 * tapeshift public API barrel.
 *
 * Re-exports the transition-table model, the conversion pipelines and their
 * building blocks, the file-level service used by the CLI, and the ambient
 * logger, error and configuration types.
 * @module
 */

// Adapters
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, logLevelFor, StructuredLogger } from "./adapters/structured-logger.js";
// CLI services
export type { CliOptions } from "./cli/args.js";
export { parseArgs } from "./cli/args.js";
export type { ConvertFileOptions, ConvertFileResult } from "./cli/convert-file.js";
export { convertFile, deriveOutputPath } from "./cli/convert-file.js";
// Config
export { converterConfigSchema } from "./config/config-schema.js";
export { loadConfigFile } from "./config/load-config.js";
// Errors
export type { ParseFailure } from "./errors.js";
export {
  ConfigError,
  ConversionIoError,
  describeParseFailure,
  errorMessage,
  HeaderError,
  InputPathError,
  ParseError,
  TapeshiftError,
  toTapeshiftError,
  UsageError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
// Machine
export type { BoundaryCheck } from "./machine/boundary-primitives.js";
export { boundaryCheck, carrySweep, returnHead } from "./machine/boundary-primitives.js";
export { ControlPrefix, controlState, SetupState } from "./machine/control-states.js";
export type { ConversionResult, ConvertOptions } from "./machine/converter.js";
export { convertSource, splitLines } from "./machine/converter.js";
export { EMPTY_FILE_HEADER, resolveHeader } from "./machine/header-resolver.js";
export {
  checkLeftCluster,
  checkRightCluster,
  convertInfiniteToSipser,
  infiniteSetup,
  rewriteForSipser,
  shiftChain,
} from "./machine/infinite-to-sipser.js";
export { parseLine, parseTransitions } from "./machine/line-parser.js";
export type { LabelCollision } from "./machine/reserved-labels.js";
export { findReservedLabelCollisions } from "./machine/reserved-labels.js";
export { formatHeaderComment, formatTransition, serializeTable } from "./machine/serializer.js";
export {
  checkLeftWallCluster,
  convertSipserToInfinite,
  rewriteForInfinite,
  wallSetup,
} from "./machine/sipser-to-infinite.js";
export { renameStates, simulationLabel } from "./machine/state-renamer.js";
export {
  expandWildcards,
  isTerminalState,
  nextStateVia,
  retarget,
  transition,
} from "./machine/transition.js";
// Types
export type { ConverterConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export type { Dialect } from "./types/dialect.js";
export { DEFAULT_DIALECT } from "./types/dialect.js";
export type { Direction, MachineType, TransitionRecord } from "./types/machine.js";
export { targetModelOf } from "./types/machine.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
