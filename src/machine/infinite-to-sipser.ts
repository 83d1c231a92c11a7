/**
 * Doubly-infinite → bounded (Sipser) conversion.
 *
 * The generated machine keeps the simulated region between a fixed left
 * marker and a right marker. Whenever the embedded machine steps onto either
 * marker the region is grown by one cell: rightward by relocating the right
 * marker, leftward by shifting the whole content one cell right.
 * @module
 */

import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { TransitionRecord } from "../types/machine.js";
import { boundaryCheck, carrySweep, returnHead } from "./boundary-primitives.js";
import { ControlPrefix, controlState, SetupState } from "./control-states.js";
import { simulationLabel } from "./state-renamer.js";
import { isTerminalState, nextStateVia, retarget, transition } from "./transition.js";

/**
 * Delimit the input before the embedded machine runs: write the left marker
 * over the first cell, carry the displaced content one cell right, append the
 * right marker, and return to the first real cell in `renamedStart`.
 */
export function infiniteSetup(
  renamedStart: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { startState, leftWall, rightWall, blank } = dialect;
  const { carry0, carry1, writeEndMarker, writeEndMarkerEmpty, returnHead: returning } = SetupState;

  return [
    transition(startState, "0", leftWall, "right", carry0),
    transition(startState, "1", leftWall, "right", carry1),
    ...carrySweep(carry0, carry1),
    transition(carry0, blank, "0", "right", writeEndMarker),
    transition(carry1, blank, "1", "right", writeEndMarker),
    transition(writeEndMarker, blank, rightWall, "left", returning),
    ...returnHead(returning, renamedStart, dialect),
    // Empty input: both markers around a single blank cell.
    transition(startState, blank, leftWall, "right", writeEndMarkerEmpty),
    transition(writeEndMarkerEmpty, blank, rightWall, "left", renamedStart),
  ];
}

/**
 * `check_right_<state>`: on the right marker, blank it, write a new marker one
 * cell further and step back onto the freed cell.
 */
export function checkRightCluster(
  state: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const expand = controlState(ControlPrefix.expandRight, state);
  return [
    ...boundaryCheck(
      {
        checkState: controlState(ControlPrefix.checkRight, state),
        defaultState: state,
        triggerSymbol: dialect.rightWall,
        writeSymbol: dialect.blank,
        direction: "right",
        targetState: expand,
      },
      dialect,
    ),
    transition(expand, dialect.blank, dialect.rightWall, "left", state),
  ];
}

/**
 * `check_left_<state>`: on the left marker, step right and shift the whole
 * region one cell right, then resume `state` on the freed first cell.
 */
export function checkLeftCluster(
  state: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const shiftStart = controlState(ControlPrefix.shiftStart, state);
  return [
    ...boundaryCheck(
      {
        checkState: controlState(ControlPrefix.checkLeft, state),
        defaultState: state,
        triggerSymbol: dialect.leftWall,
        writeSymbol: dialect.leftWall,
        direction: "right",
        targetState: shiftStart,
      },
      dialect,
    ),
    ...shiftChain(state, shiftStart, dialect),
  ];
}

/**
 * Erase the first cell, carry its bit through the region and write the last
 * carried bit where the blank or the old right marker was, then re-mark the
 * right edge and return to the first cell.
 */
export function shiftChain(
  state: string,
  shiftStart: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { blank, rightWall } = dialect;
  const carry0 = controlState(ControlPrefix.shiftCarry0, state);
  const carry1 = controlState(ControlPrefix.shiftCarry1, state);
  const writeEnd = controlState(ControlPrefix.shiftWriteEnd, state);
  const returning = controlState(ControlPrefix.shiftReturn, state);

  return [
    transition(shiftStart, "0", blank, "right", carry0),
    transition(shiftStart, "1", blank, "right", carry1),
    transition(shiftStart, blank, blank, "stay", state),
    ...carrySweep(carry0, carry1),
    transition(carry0, blank, "0", "right", writeEnd),
    transition(carry1, blank, "1", "right", writeEnd),
    transition(carry0, rightWall, "0", "right", writeEnd),
    transition(carry1, rightWall, "1", "right", writeEnd),
    transition(shiftStart, rightWall, blank, "right", writeEnd),
    transition(writeEnd, blank, rightWall, "left", returning),
    ...returnHead(returning, state, dialect),
  ];
}

/**
 * Route every moving source transition through the boundary check for its
 * direction. Returns the rewritten records and every distinct non-terminal
 * target, in first-seen order.
 */
export function rewriteForSipser(
  records: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): { rewritten: TransitionRecord[]; targets: Set<string> } {
  const targets = new Set<string>();
  const rewritten = records.map((r): TransitionRecord => {
    if (!isTerminalState(r.newState, dialect)) targets.add(r.newState);
    if (isTerminalState(r.currentState, dialect)) return r;

    switch (r.direction) {
      case "stay":
        return r;
      case "right":
        return retarget(
          r,
          nextStateVia(r.newState, controlState(ControlPrefix.checkRight, r.newState), dialect),
        );
      case "left":
        return retarget(
          r,
          nextStateVia(r.newState, controlState(ControlPrefix.checkLeft, r.newState), dialect),
        );
    }
  });
  return { rewritten, targets };
}

/**
 * Full Infinite→Sipser table for an already renamed source table:
 * setup, rewritten source records, then a right and a left cluster per target.
 */
export function convertInfiniteToSipser(
  renamed: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { rewritten, targets } = rewriteForSipser(renamed, dialect);
  const clusters = [...targets].flatMap((state) => [
    ...checkRightCluster(state, dialect),
    ...checkLeftCluster(state, dialect),
  ]);
  return [
    ...infiniteSetup(simulationLabel(dialect.startState, dialect), dialect),
    ...rewritten,
    ...clusters,
  ];
}
