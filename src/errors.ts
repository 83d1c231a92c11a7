export class TapeshiftError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TapeshiftError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConversionIoError extends TapeshiftError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`I/O error: ${describeCause(options?.cause)}`, "IO", options);
    this.name = "ConversionIoError";
    this.path = path;
  }
}

export class HeaderError extends TapeshiftError {
  readonly header: string;

  constructor(header: string) {
    super(`Invalid machine type header: ${header}`, "INVALID_HEADER");
    this.name = "HeaderError";
    this.header = header;
  }
}

export type ParseFailure =
  | { kind: "invalid-part-count"; count: number }
  | { kind: "invalid-symbol"; symbol: string }
  | { kind: "invalid-direction"; direction: string };

/** Human-readable detail for a single-line parse failure. */
export function describeParseFailure(failure: ParseFailure): string {
  switch (failure.kind) {
    case "invalid-part-count":
      return `Invalid number of parts, expected 5, got ${failure.count}`;
    case "invalid-symbol":
      return `Invalid symbol, must be a single char: '${failure.symbol}'`;
    case "invalid-direction":
      return `Invalid direction: ${failure.direction}`;
  }
}

export class ParseError extends TapeshiftError {
  readonly failure: ParseFailure;
  readonly lineNumber: number | undefined;

  constructor(failure: ParseFailure, lineNumber?: number) {
    const location = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
    super(`Failed to parse transition line: ${describeParseFailure(failure)}${location}`, "PARSE");
    this.name = "ParseError";
    this.failure = failure;
    this.lineNumber = lineNumber;
  }

  /** Same failure, located at a 1-based line of the input file. */
  atLine(lineNumber: number): ParseError {
    return new ParseError(this.failure, lineNumber);
  }
}

export class ConfigError extends TapeshiftError {
  constructor(detail: string, options?: ErrorOptions) {
    super(`Invalid configuration: ${detail}`, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class InputPathError extends TapeshiftError {
  readonly inputPath: string;

  constructor(inputPath: string, extension: string) {
    super(`Input file name must end with '.${extension}': ${inputPath}`, "INPUT_PATH");
    this.name = "InputPathError";
    this.inputPath = inputPath;
  }
}

export class UsageError extends TapeshiftError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to TapeshiftError (preserves cause chain). */
export function toTapeshiftError(value: unknown): TapeshiftError {
  if (value instanceof TapeshiftError) return value;
  if (value instanceof Error) return new TapeshiftError(value.message, "UNKNOWN", { cause: value });
  return new TapeshiftError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? "unknown failure" : errorMessage(cause);
}
