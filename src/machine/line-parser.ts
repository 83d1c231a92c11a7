import { ParseError } from "../errors.js";
import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { Direction, TransitionRecord } from "../types/machine.js";
import { transition } from "./transition.js";

const DIRECTIONS: readonly Direction[] = ["left", "right", "stay"];

/**
 * Parse one table line.
 *
 * Returns `null` for a line that is blank once its comment is stripped.
 * Throws {@link ParseError} for anything else that is not a five-token rule.
 */
export function parseLine(line: string, dialect: Dialect = DEFAULT_DIALECT): TransitionRecord | null {
  const commentAt = line.indexOf(dialect.commentDelimiter);
  const content = (commentAt === -1 ? line : line.slice(0, commentAt)).trim();
  if (!content) return null;

  const parts = content.split(/\s+/);
  if (parts.length !== 5) {
    throw new ParseError({ kind: "invalid-part-count", count: parts.length });
  }

  const [currentState, currentSymbol, newSymbol, directionToken, newState] = parts;
  return transition(
    currentState,
    parseSymbol(currentSymbol),
    parseSymbol(newSymbol),
    parseDirection(directionToken, dialect),
    newState,
  );
}

/**
 * Parse every rule line, dropping blank and comment-only ones.
 * Errors are located by 1-based line number, counting from `firstLineNumber`.
 */
export function parseTransitions(
  lines: readonly string[],
  dialect: Dialect = DEFAULT_DIALECT,
  firstLineNumber = 1,
): TransitionRecord[] {
  const records: TransitionRecord[] = [];
  lines.forEach((line, index) => {
    let record: TransitionRecord | null;
    try {
      record = parseLine(line, dialect);
    } catch (err) {
      if (err instanceof ParseError) throw err.atLine(firstLineNumber + index);
      throw err;
    }
    if (record) records.push(record);
  });
  return records;
}

function parseSymbol(token: string): string {
  // Code points, so a single astral character counts as one symbol.
  if ([...token].length !== 1) {
    throw new ParseError({ kind: "invalid-symbol", symbol: token });
  }
  return token;
}

function parseDirection(token: string, dialect: Dialect): Direction {
  const direction = DIRECTIONS.find((d) => dialect.directions[d] === token);
  if (!direction) {
    throw new ParseError({ kind: "invalid-direction", direction: token });
  }
  return direction;
}
