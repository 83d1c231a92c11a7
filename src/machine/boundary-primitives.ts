/**
 * Control-state generators shared by both conversion pipelines.
 *
 * Each generator returns a fresh list of records wired between the labels it
 * is given; callers pick the labels so that clusters chain together.
 * @module
 */

import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { Direction, TransitionRecord } from "../types/machine.js";
import { transition } from "./transition.js";

/**
 * Rightward bit-carry over `0`/`1` cells.
 *
 * `noCarry` holds a pending `0`, `carry` holds a pending `1`. Each cell is
 * overwritten with the pending bit and its old value becomes the next pending
 * bit, so a run of content moves one cell right as the head sweeps over it.
 */
export function carrySweep(noCarry: string, carry: string): TransitionRecord[] {
  return [
    transition(noCarry, "0", "0", "right", noCarry),
    transition(noCarry, "1", "0", "right", carry),
    transition(carry, "0", "1", "right", noCarry),
    transition(carry, "1", "1", "right", carry),
  ];
}

/** Scan left to the left marker, then step onto the first real cell in `target`. */
export function returnHead(
  returning: string,
  target: string,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { wildcard, leftWall } = dialect;
  return [
    transition(returning, wildcard, wildcard, "left", returning),
    transition(returning, leftWall, leftWall, "right", target),
  ];
}

export interface BoundaryCheck {
  checkState: string;
  /** Entered, without moving, for every symbol but the trigger. */
  defaultState: string;
  triggerSymbol: string;
  writeSymbol: string;
  direction: Direction;
  /** Entered after handling the trigger symbol. */
  targetState: string;
}

/**
 * "Is this the wall?" test: special-case the trigger symbol, defer to
 * `defaultState` for anything else.
 */
export function boundaryCheck(
  check: BoundaryCheck,
  dialect: Dialect = DEFAULT_DIALECT,
): TransitionRecord[] {
  const { wildcard } = dialect;
  return [
    transition(check.checkState, wildcard, wildcard, "stay", check.defaultState),
    transition(
      check.checkState,
      check.triggerSymbol,
      check.writeSymbol,
      check.direction,
      check.targetState,
    ),
  ];
}
