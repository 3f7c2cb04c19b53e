/**
 * Text rendering of a classification result
 */

import { describeType } from "./types/describe.js";
import type { AllocationState } from "./state/allocation-state.js";
import {
  ARGUMENT_REGISTER_COUNT,
  registerAbiName,
  type RegisterFile,
} from "./state/registers.js";

const registerLines = (
  state: AllocationState,
  file: RegisterFile,
  label: string
): string[] => {
  const registers =
    file === "integer" ? state.integerRegisters : state.fpRegisters;
  if (registers === undefined) {
    return [];
  }

  const lines: string[] = [];
  for (let i = 0; i < ARGUMENT_REGISTER_COUNT; i++) {
    lines.push(
      `${label}[${registerAbiName(file, i)}]: ${state.nameOf(registers[i])}`
    );
  }
  return lines;
};

/**
 * Argument table sorted by name: `arg00: SInt32`
 */
export const formatArguments = (state: AllocationState): string[] =>
  [...state.arguments]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((slot) => `${slot.name}: ${describeType(slot.classified)}`);

/**
 * Stack objects with their byte offset from the caller's stack pointer
 */
export const formatStack = (state: AllocationState): string[] => {
  const offsets = state.stackOffsetsFromCallerSP();
  return state.stack.map(
    (obj, index) => `${state.nameOf(obj)} (oldsp+${offsets[index] ?? 0})`
  );
};

export const formatState = (state: AllocationState): string => {
  const out: string[] = [];

  const args = formatArguments(state);
  if (args.length > 0) {
    out.push("Args:", ...args, "");
  }

  out.push("GPRs:", ...registerLines(state, "integer", "GPR"));

  if (state.fpRegisters !== undefined) {
    out.push("", "FPRs:", ...registerLines(state, "fp", "FPR"));
  }

  out.push("", "Stack:", ...formatStack(state));
  return out.join("\n");
};
