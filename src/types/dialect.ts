import type { Direction, MachineType } from "./machine.js";

/**
 * Reserved tokens of the transition-table text format.
 *
 * Every symbol is a single character. `startState` is the label both the
 * input and the generated table begin in.
 */
export interface Dialect {
  leftWall: string;
  rightWall: string;
  blank: string;
  /** Output-only "unchanged" marker; also matches any symbol when read by a simulator. */
  wildcard: string;
  commentDelimiter: string;
  directions: Record<Direction, string>;
  headers: Record<MachineType, string>;
  /** Labels starting with this are terminal. */
  haltPrefix: string;
  /** Namespace prepended to every non-terminal source label. */
  simPrefix: string;
  startState: string;
}

/** Cell values the carry and shift sweeps move. Fixed: no dialect symbol may reuse them. */
export const CONTENT_BITS: readonly string[] = ["0", "1"];

export const DEFAULT_DIALECT: Dialect = {
  leftWall: "#",
  rightWall: "$",
  blank: "_",
  wildcard: "*",
  commentDelimiter: ";",
  directions: { left: "l", right: "r", stay: "*" },
  headers: { infinite: ";I", sipser: ";S" },
  haltPrefix: "halt",
  simPrefix: "sim_",
  startState: "0",
};
