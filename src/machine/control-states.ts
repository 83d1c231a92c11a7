/**
 * Labels of engine-synthesized control states.
 *
 * Per-target control states are a role prefix concatenated with the target
 * label. Uniqueness relies on no source label (after renaming) starting with
 * one of these prefixes or equalling one of the fixed setup labels; see
 * `findReservedLabelCollisions` for the opt-in check.
 * @module
 */

export const ControlPrefix = {
  checkRight: "check_right_",
  expandRight: "expand_right_",
  checkLeft: "check_left_",
  shiftStart: "shift_start_",
  shiftCarry0: "shift_carry_0_",
  shiftCarry1: "shift_carry_1_",
  shiftWriteEnd: "shift_write_end_",
  shiftReturn: "shift_return_",
  checkLeftWall: "check_left_wall_",
} as const;

export type ControlPrefix = (typeof ControlPrefix)[keyof typeof ControlPrefix];

/** Fixed labels used only by the setup clusters. */
export const SetupState = {
  carry0: "q_carry_0",
  carry1: "q_carry_1",
  writeEndMarker: "q_write_end_marker",
  writeEndMarkerEmpty: "q_write_end_marker_empty",
  returnHead: "q_return_head",
  writeWall: "q_write_wall",
} as const;

export function controlState(prefix: ControlPrefix, state: string): string {
  return `${prefix}${state}`;
}
