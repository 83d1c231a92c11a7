/**
 * Bounded (Sipser) → doubly-infinite conversion.
 *
 * The unbounded tape never needs room made; the only thing to reproduce is
 * what happens when the source machine tries to move left off its origin.
 * That move is read as termination: the generated machine halts on the
 * nominal left marker.
 * @module
 */

import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { TransitionRecord } from "../types/machine.js";
import { boundaryCheck } from "./boundary-primitives.js";
import { ControlPrefix, controlState, SetupState } from "./control-states.js";
import { simulationLabel } from "./state-renamer.js";
import { isTerminalState, nextStateVia, retarget, transition } from "./transition.js";

/** Step left onto a blank, mark it as the origin and start the embedded machine. */
export function wallSetup(
  renamedStart: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { startState, wildcard, blank, leftWall } = dialect;
  return [
    transition(startState, wildcard, wildcard, "left", SetupState.writeWall),
    transition(SetupState.writeWall, blank, leftWall, "right", renamedStart),
  ];
}

/** `check_left_wall_<state>`: halt on the left marker, otherwise resume `state`. */
export function checkLeftWallCluster(
  state: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  return boundaryCheck(
    {
      checkState: controlState(ControlPrefix.checkLeftWall, state),
      defaultState: state,
      triggerSymbol: dialect.leftWall,
      writeSymbol: dialect.leftWall,
      direction: "stay",
      targetState: dialect.haltPrefix,
    },
    dialect,
  );
}

/** Route every leftward move to a non-terminal state through the wall check. */
export function rewriteForInfinite(
  records: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): { rewritten: TransitionRecord[]; targets: Set<string> } {
  const targets = new Set<string>();
  const rewritten = records.map((r): TransitionRecord => {
    if (r.direction !== "left") return r;
    if (!isTerminalState(r.newState, dialect)) targets.add(r.newState);
    return retarget(
      r,
      nextStateVia(r.newState, controlState(ControlPrefix.checkLeftWall, r.newState), dialect),
    );
  });
  return { rewritten, targets };
}

/** Full Sipser→Infinite table for an already renamed source table. */
export function convertSipserToInfinite(
  renamed: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { rewritten, targets } = rewriteForInfinite(renamed, dialect);
  return [
    ...wallSetup(simulationLabel(dialect.startState, dialect), dialect),
    ...rewritten,
    ...[...targets].flatMap((state) => checkLeftWallCluster(state, dialect)),
  ];
}
