import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { Direction, TransitionRecord } from "../types/machine.js";

/** Build a frozen transition record. */
export function transition(
  currentState: string,
  currentSymbol: string,
  newSymbol: string,
  direction: Direction,
  newState: string,
): TransitionRecord {
  return Object.freeze({ currentState, currentSymbol, newSymbol, direction, newState });
}

/** Copy of `record` entering `newState` instead. */
export function retarget(record: TransitionRecord, newState: string): TransitionRecord {
  return transition(
    record.currentState,
    record.currentSymbol,
    record.newSymbol,
    record.direction,
    newState,
  );
}

export function isTerminalState(state: string, dialect: Dialect = DEFAULT_DIALECT): boolean {
  return state.startsWith(dialect.haltPrefix);
}

/**
 * Destination for a rewritten transition: terminal targets are kept as-is,
 * anything else goes through the given control state.
 */
export function nextStateVia(
  originalTarget: string,
  controlState: string,
  dialect: Dialect = DEFAULT_DIALECT,
): string {
  return isTerminalState(originalTarget, dialect) ? originalTarget : controlState;
}

/**
 * Undo output compression: a wildcard new symbol or new state means
 * "same as the current one".
 */
export function expandWildcards(
  record: TransitionRecord,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord {
  const newSymbol = record.newSymbol === dialect.wildcard ? record.currentSymbol : record.newSymbol;
  const newState = record.newState === dialect.wildcard ? record.currentState : record.newState;
  if (newSymbol === record.newSymbol && newState === record.newState) return record;
  return transition(record.currentState, record.currentSymbol, newSymbol, record.direction, newState);
}
