/**
 * Call classification - assigns every argument to registers or the stack
 */

import type { AbiType, ArgumentEntry } from "../types/descriptors.js";
import { slice } from "../types/constructors.js";
import type { AbiError } from "../types/errors.js";
import { map, type Result } from "../types/result.js";
import type { RiscvMachine } from "../machine.js";
import { AllocationState } from "../state/allocation-state.js";
import type { ArgumentSlot } from "../state/argument-table.js";
import {
  flattenForFpRules,
  isFpStructReturn,
  matchFpPair,
  type FpField,
} from "./fp-struct.js";
import { normalizeCall, type NormalizedCall } from "./normalize.js";

const fieldSlice = (owner: AbiType, field: FpField): AbiType =>
  slice(owner, field.offset, field.offset + field.type.size - 1);

/**
 * FP register rules for a named argument. Returns false when the argument
 * must fall back to the integer rules.
 */
const tryFpRegisters = (
  state: AllocationState,
  machine: RiscvMachine,
  ty: AbiType
): boolean => {
  const { flen } = machine;
  if (flen === undefined) {
    return false;
  }

  const flat = flattenForFpRules(machine, ty);

  if (flat.kind === "float") {
    if (flat.size <= flen && state.fpRegistersLeft >= 1) {
      state.assignToFPRegister(ty);
      return true;
    }
    return false;
  }

  if (flat.kind !== "struct" || flat.size > 2 * flen) {
    return false;
  }

  const pair = matchFpPair(machine, flat);
  if (!pair) {
    return false;
  }

  const first = fieldSlice(ty, pair.first);
  const second = fieldSlice(ty, pair.second);

  switch (pair.pattern) {
    case "float-float":
      if (state.fpRegistersLeft >= 2) {
        state.assignToFPRegister(first);
        state.assignToFPRegister(second);
        return true;
      }
      return false;
    case "float-int":
      if (state.fpRegistersLeft >= 1 && state.integerRegistersLeft >= 1) {
        state.assignToFPRegister(first);
        state.assignToIntegerRegister(second);
        return true;
      }
      return false;
    case "int-float":
      if (state.integerRegistersLeft >= 1 && state.fpRegistersLeft >= 1) {
        state.assignToIntegerRegister(first);
        state.assignToFPRegister(second);
        return true;
      }
      return false;
  }
};

/**
 * Integer calling convention
 */
const assignInteger = (
  state: AllocationState,
  ty: AbiType,
  variadic: boolean
): void => {
  const { xlen } = state;

  if (ty.size <= xlen) {
    state.assignToIntegerRegisterOrStack(ty);
    return;
  }

  if (ty.size <= 2 * xlen) {
    // 2*XLEN-aligned variadics go in an aligned (even-odd) register pair
    if (
      variadic &&
      ty.alignment === 2 * xlen &&
      state.integerRegistersLeft % 2 === 1
    ) {
      state.skipIntegerRegister();
    }

    if (state.integerRegistersLeft > 0) {
      state.assignToIntegerRegisterOrStack(slice(ty, 0, xlen - 1));
      state.assignToIntegerRegisterOrStack(slice(ty, xlen, 2 * xlen - 1));
    } else {
      state.assignToStack(ty);
    }
    return;
  }

  state.passByReference(ty);
};

export const classifyArgument = (
  state: AllocationState,
  machine: RiscvMachine,
  arg: ArgumentSlot
): void => {
  const ty = arg.classified;
  if (!arg.variadic && tryFpRegisters(state, machine, ty)) {
    return;
  }
  assignInteger(state, ty, arg.variadic);
};

/**
 * Reserve the hidden pointer argument for a return value that does not fit
 * in the return registers
 */
const classifyReturnType = (
  state: AllocationState,
  machine: RiscvMachine,
  ret: AbiType
): void => {
  const { xlen, flen } = machine;

  if (flen !== undefined && ret.kind === "struct" && ret.size <= 2 * flen) {
    if (!isFpStructReturn(machine, ret)) {
      state.passByReference(ret);
    }
    return;
  }

  if (ret.size > 2 * xlen) {
    state.passByReference(ret);
  }
};

export const runClassification = (
  machine: RiscvMachine,
  call: NormalizedCall
): AllocationState => {
  const state = new AllocationState(machine, call.table);

  if (call.ret) {
    classifyReturnType(state, machine, call.ret.classified);
  }

  for (const arg of call.args) {
    classifyArgument(state, machine, arg);
  }

  return state;
};

/**
 * Classify a call: which registers and stack slots each argument occupies.
 *
 * A trailing `varArgs(...)` entry marks the variadic arguments.
 */
export const classifyCall = (
  machine: RiscvMachine,
  args: readonly ArgumentEntry[],
  ret?: ArgumentEntry
): Result<AllocationState, AbiError> =>
  map(normalizeCall(machine, args, ret), (call) =>
    runClassification(machine, call)
  );
