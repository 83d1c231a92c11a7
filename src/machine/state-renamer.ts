import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { TransitionRecord } from "../types/machine.js";
import { isTerminalState, transition } from "./transition.js";

/** Label of a source state inside the simulation namespace. */
export function simulationLabel(state: string, dialect: Dialect = DEFAULT_DIALECT): string {
  return isTerminalState(state, dialect) ? state : `${dialect.simPrefix}${state}`;
}

/**
 * Move every non-terminal label of the table into the simulation namespace
 * so it cannot collide with engine control states.
 */
export function renameStates(
  records: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  return records.map((r) =>
    transition(
      simulationLabel(r.currentState, dialect),
      r.currentSymbol,
      r.newSymbol,
      r.direction,
      simulationLabel(r.newState, dialect),
    ),
  );
}
