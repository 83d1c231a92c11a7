import fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { Direction, TransitionRecord } from "../types/machine.js";
import { convertSource } from "./converter.js";
import { checkLeftCluster } from "./infinite-to-sipser.js";
import { parseLine } from "./line-parser.js";
import { formatTransition } from "./serializer.js";
import { simulationLabel } from "./state-renamer.js";
import { expandWildcards, transition } from "./transition.js";

const DIRECTION_TOKENS: Record<Direction, string> = { left: "l", right: "r", stay: "*" };

const arbDirection = fc.constantFrom<Direction>("left", "right", "stay");

const arbRecord: fc.Arbitrary<TransitionRecord> = fc
  .tuple(
    fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/),
    fc.constantFrom("0", "1", "_", "a", "x", "#", "$"),
    fc.constantFrom("0", "1", "_", "a", "x", "#", "$"),
    arbDirection,
    fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/),
  )
  .map(([state, symbol, newSymbol, direction, newState]) =>
    transition(state, symbol, newSymbol, direction, newState),
  );

// Source tables over 0/1/blank, mixing plain and terminal labels.
const arbTableState = fc.constantFrom("0", "1", "loop", "scan", "halt", "halt_accept");
const arbTapeSymbol = fc.constantFrom("0", "1", "_");
const arbTable = fc.array(
  fc
    .tuple(arbTableState, arbTapeSymbol, arbTapeSymbol, arbDirection, arbTableState)
    .map(([state, symbol, newSymbol, direction, newState]) =>
      transition(state, symbol, newSymbol, direction, newState),
    ),
  { maxLength: 12 },
);
const arbHeader = fc.constantFrom(";I", ";S");

function sourceText(header: string, records: readonly TransitionRecord[]): string {
  const lines = records.map((r) =>
    [r.currentState, r.currentSymbol, r.newSymbol, DIRECTION_TOKENS[r.direction], r.newState].join(
      " ",
    ),
  );
  return [header, ...lines].join("\n");
}

function isHalt(state: string): boolean {
  return state.startsWith("halt");
}

describe("serializer property tests", () => {
  it("formatting then parsing with wildcard expansion reproduces the record", () => {
    fc.assert(
      fc.property(arbRecord, (record) => {
        const parsed = parseLine(formatTransition(record));
        expect(parsed).not.toBeNull();
        if (!parsed) return;
        expect(expandWildcards(parsed)).toEqual(record);
      }),
    );
  });
});

describe("converter property tests", () => {
  it("identical input always yields identical output", () => {
    fc.assert(
      fc.property(arbHeader, arbTable, (header, records) => {
        const text = sourceText(header, records);
        expect(convertSource(text).output).toBe(convertSource(text).output);
      }),
    );
  });

  it("transitions into terminal states survive unchanged and unrenamed", () => {
    fc.assert(
      fc.property(arbHeader, arbTable, (header, records) => {
        const output = convertSource(sourceText(header, records)).records;
        for (const r of records.filter((rec) => isHalt(rec.newState))) {
          const expected = transition(
            simulationLabel(r.currentState),
            r.currentSymbol,
            r.newSymbol,
            r.direction,
            r.newState,
          );
          expect(output).toContainEqual(expected);
        }
      }),
    );
  });

  it("every non-terminal right target gets a two-rule check_right cluster", () => {
    fc.assert(
      fc.property(arbTable, (records) => {
        const output = convertSource(sourceText(";I", records)).records;
        const targets = records
          .filter((r) => r.direction === "right" && !isHalt(r.newState))
          .map((r) => simulationLabel(r.newState));
        for (const target of targets) {
          const check = `check_right_${target}`;
          expect(output.filter((r) => r.currentState === check)).toEqual([
            transition(check, "*", "*", "stay", target),
            transition(check, "$", "_", "right", `expand_right_${target}`),
          ]);
        }
      }),
    );
  });

  it("every non-terminal left target gets the full check_left and shift cluster", () => {
    fc.assert(
      fc.property(arbTable, (records) => {
        const output = convertSource(sourceText(";I", records)).records;
        const targets = records
          .filter((r) => r.direction === "left" && !isHalt(r.newState))
          .map((r) => simulationLabel(r.newState));
        for (const target of targets) {
          const cluster = checkLeftCluster(target);
          const labels = new Set(cluster.map((r) => r.currentState));
          expect(output.filter((r) => labels.has(r.currentState))).toEqual(cluster);
          expect([...labels].every((label) => label.endsWith(target))).toBe(true);
        }
      }),
    );
  });

  it("every non-terminal left target in a Sipser table gets a two-rule wall check", () => {
    fc.assert(
      fc.property(arbTable, (records) => {
        const output = convertSource(sourceText(";S", records)).records;
        const targets = records
          .filter((r) => r.direction === "left" && !isHalt(r.newState))
          .map((r) => simulationLabel(r.newState));
        for (const target of targets) {
          const check = `check_left_wall_${target}`;
          expect(output.filter((r) => r.currentState === check)).toEqual([
            transition(check, "*", "*", "stay", target),
            transition(check, "#", "#", "stay", "halt"),
          ]);
        }
      }),
    );
  });
});
