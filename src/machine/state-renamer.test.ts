import { describe, expect, it } from "vitest";
import { DEFAULT_DIALECT } from "../types/dialect.js";
import { renameStates, simulationLabel } from "./state-renamer.js";
import { transition } from "./transition.js";

describe("simulationLabel", () => {
  it("prefixes non-terminal labels only", () => {
    expect(simulationLabel("0")).toBe("sim_0");
    expect(simulationLabel("carry")).toBe("sim_carry");
    expect(simulationLabel("halt")).toBe("halt");
    expect(simulationLabel("halt_accept")).toBe("halt_accept");
  });
});

describe("renameStates", () => {
  it("renames current and target labels, leaving symbols and direction", () => {
    const source = [
      transition("0", "a", "b", "right", "1"),
      transition("1", "_", "_", "stay", "halt_reject"),
      transition("halt_x", "a", "a", "left", "2"),
    ];

    expect(renameStates(source)).toEqual([
      transition("sim_0", "a", "b", "right", "sim_1"),
      transition("sim_1", "_", "_", "stay", "halt_reject"),
      transition("halt_x", "a", "a", "left", "sim_2"),
    ]);
  });

  it("does not modify the input records", () => {
    const source = [transition("0", "a", "b", "right", "1")];
    renameStates(source);
    expect(source[0].currentState).toBe("0");
  });

  it("uses the dialect's namespace", () => {
    const dialect = { ...DEFAULT_DIALECT, simPrefix: "inner." };
    expect(renameStates([transition("0", "a", "b", "right", "1")], dialect)).toEqual([
      transition("inner.0", "a", "b", "right", "inner.1"),
    ]);
  });
});
