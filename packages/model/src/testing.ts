/**
 * Shared helpers for classification tests
 */

import { formatAbiError, type AbiError } from "./types/errors.js";
import type { Result } from "./types/result.js";
import { createMachine, type RiscvMachine } from "./machine.js";
import type { AllocationState } from "./state/allocation-state.js";

export const expectOk = <T>(result: Result<T, AbiError>): T => {
  if (!result.ok) {
    throw new Error(`Expected success, got ${formatAbiError(result.error)}`);
  }
  return result.value;
};

export const expectError = <T>(result: Result<T, AbiError>): AbiError => {
  if (result.ok) {
    throw new Error("Expected an error result");
  }
  return result.error;
};

export const machine = (xlen: number, flen?: number): RiscvMachine =>
  expectOk(createMachine({ xlen, flen }));

export const gprNames = (state: AllocationState): string[] =>
  state.integerRegisters.map((reg) => state.nameOf(reg));

export const fprNames = (state: AllocationState): string[] =>
  (state.fpRegisters ?? []).map((reg) => state.nameOf(reg));

export const stackNames = (state: AllocationState): string[] =>
  state.stack.map((obj) => state.nameOf(obj));
