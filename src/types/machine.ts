/**
 * Transition-table model shared by the parser, the conversion pipelines
 * and the serializer.
 * @module
 */

/** Head movement of a single transition. */
export type Direction = "left" | "right" | "stay";

/**
 * Tape-boundary convention of a machine.
 *
 * - `infinite`: doubly-infinite tape, no markers
 * - `sipser`: singly-infinite tape with a left marker at the origin
 */
export type MachineType = "infinite" | "sipser";

/** One rule of a transition table. Never mutated once created. */
export interface TransitionRecord {
  readonly currentState: string;
  readonly currentSymbol: string;
  readonly newSymbol: string;
  readonly direction: Direction;
  readonly newState: string;
}

/** The model a table of the given type is converted into. */
export function targetModelOf(machineType: MachineType): MachineType {
  return machineType === "infinite" ? "sipser" : "infinite";
}
