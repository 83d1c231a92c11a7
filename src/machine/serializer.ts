import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { MachineType, TransitionRecord } from "../types/machine.js";

const CONVERSION_TITLES: Record<MachineType, string> = {
  infinite: "Infinite-to-Sipser Simulation",
  sipser: "Sipser-to-Infinite Simulation",
};

/**
 * Render one record as a five-token line. An unchanged symbol or state is
 * written as the wildcard.
 */
export function formatTransition(record: TransitionRecord, dialect: Dialect = DEFAULT_DIALECT): string {
  const newSymbol = record.newSymbol === record.currentSymbol ? dialect.wildcard : record.newSymbol;
  const newState = record.newState === record.currentState ? dialect.wildcard : record.newState;
  return [
    record.currentState,
    record.currentSymbol,
    newSymbol,
    dialect.directions[record.direction],
    newState,
  ].join(" ");
}

/** The two comment lines that open a converted table. */
export function formatHeaderComment(
  sourceType: MachineType,
  dialect: Dialect = DEFAULT_DIALECT,
): string[] {
  const c = dialect.commentDelimiter;
  return [`${c} --- ${CONVERSION_TITLES[sourceType]} ---`, `${c} Start state: ${dialect.startState}`];
}

/** Full output text, one `\n`-terminated line per comment and record. */
export function serializeTable(
  sourceType: MachineType,
  records: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): string {
  const lines = [
    ...formatHeaderComment(sourceType, dialect),
    ...records.map((r) => formatTransition(r, dialect)),
  ];
  return lines.map((line) => `${line}\n`).join("");
}
