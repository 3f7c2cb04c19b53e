/**
 * Return value classification
 *
 * A value is returned the way a named argument of the same type is passed.
 * When that means by reference, the pointer is the hidden first argument of
 * the enclosing call, so no return register is reported.
 */

import type { ArgumentEntry } from "../types/descriptors.js";
import type { AbiError } from "../types/errors.js";
import { map, type Result } from "../types/result.js";
import type { RiscvMachine } from "../machine.js";
import { AllocationState } from "../state/allocation-state.js";
import { classifyArgument } from "./call.js";
import { normalizeReturn } from "./normalize.js";

export const classifyReturn = (
  machine: RiscvMachine,
  ret: ArgumentEntry | undefined
): Result<AllocationState, AbiError> =>
  map(normalizeReturn(ret), (call) => {
    const state = new AllocationState(machine, call.table);
    for (const arg of call.args) {
      classifyArgument(state, machine, arg);
    }

    const [first] = state.integerRegisters;
    if (first !== undefined && state.table.referencedBy(first)) {
      state.clearIntegerRegister(0);
    }
    return state;
  });

/**
 * Whether a classified call passes a hidden pointer for its return value
 */
export const hasHiddenReturnPointer = (state: AllocationState): boolean => {
  const [first] = state.integerRegisters;
  return (
    first !== undefined && state.table.referencedBy(first)?.isReturn === true
  );
};
