/**
 * Machine configuration - selects one calling-convention variant
 */

import { createAbiError, type AbiError } from "./types/errors.js";
import { error, ok, type Result } from "./types/result.js";

export type RegisterWidth = 32 | 64 | 128;

export type MachineOptions = {
  /** Integer register width (default 64) */
  readonly xlen?: number;
  /** Floating-point register width; omit for the soft-float convention */
  readonly flen?: number;
};

export type RiscvMachine = {
  readonly xlen: RegisterWidth;
  readonly flen?: RegisterWidth;
};

export const DEFAULT_XLEN: RegisterWidth = 64;

const toRegisterWidth = (value: number): RegisterWidth | undefined => {
  switch (value) {
    case 32:
    case 64:
    case 128:
      return value;
    default:
      return undefined;
  }
};

/**
 * Validate register widths and build a machine description
 */
export const createMachine = (
  options: MachineOptions = {}
): Result<RiscvMachine, AbiError> => {
  const xlen = toRegisterWidth(options.xlen ?? DEFAULT_XLEN);
  if (xlen === undefined) {
    return error(
      createAbiError(
        "RVC1001",
        `Unsupported XLEN ${String(options.xlen)}`,
        "XLEN must be 32, 64 or 128"
      )
    );
  }

  if (options.flen === undefined) {
    return ok({ xlen });
  }

  const flen = toRegisterWidth(options.flen);
  if (flen === undefined) {
    return error(
      createAbiError(
        "RVC1002",
        `Unsupported FLEN ${options.flen}`,
        "FLEN must be 32, 64 or 128, or omitted when there are no FP argument registers"
      )
    );
  }

  return ok({ xlen, flen });
};

export const describeMachine = (machine: RiscvMachine): string =>
  machine.flen === undefined
    ? `RV${machine.xlen} (XLEN=${machine.xlen}, no FP argument registers)`
    : `RV${machine.xlen} (XLEN=${machine.xlen}, FLEN=${machine.flen})`;
