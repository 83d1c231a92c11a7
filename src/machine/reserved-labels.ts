import { DEFAULT_DIALECT, type Dialect } from "../types/dialect.js";
import type { TransitionRecord } from "../types/machine.js";
import { ControlPrefix, SetupState } from "./control-states.js";
import { isTerminalState } from "./transition.js";

export interface LabelCollision {
  /** Label as it appears in the renamed table. */
  label: string;
  /** Reserved prefix or fixed label it clashes with. */
  reserved: string;
}

/**
 * Report renamed source labels that an engine control state could also
 * produce. Under the default dialect the simulation namespace rules this out;
 * a custom `simPrefix` can reintroduce it.
 */
export function findReservedLabelCollisions(
  renamed: readonly TransitionRecord[],
  dialect: Dialect = DEFAULT_DIALECT,
): LabelCollision[] {
  const fixed = new Set<string>([...Object.values(SetupState), dialect.startState]);
  const prefixes = Object.values(ControlPrefix);
  const seen = new Set<string>();
  const collisions: LabelCollision[] = [];

  for (const record of renamed) {
    for (const label of [record.currentState, record.newState]) {
      if (seen.has(label)) continue;
      seen.add(label);
      if (isTerminalState(label, dialect)) continue;

      if (fixed.has(label)) {
        collisions.push({ label, reserved: label });
        continue;
      }
      const prefix = prefixes.find((p) => label.startsWith(p));
      if (prefix) collisions.push({ label, reserved: prefix });
    }
  }
  return collisions;
}
