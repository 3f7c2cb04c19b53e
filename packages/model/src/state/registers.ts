/**
 * Argument register file layout
 */

/** Argument registers per file (a0-a7, fa0-fa7) */
export const ARGUMENT_REGISTER_COUNT = 8;

/** Architectural number of a0 / fa0 */
const FIRST_ARGUMENT_REGISTER = 10;

export type RegisterFile = "integer" | "fp";

/**
 * ABI name of an argument register (`a3`, `fa0`)
 */
export const registerAbiName = (file: RegisterFile, index: number): string =>
  file === "integer" ? `a${index}` : `fa${index}`;

/**
 * Architectural name of an argument register (`x13`, `f10`)
 */
export const registerArchName = (file: RegisterFile, index: number): string =>
  `${file === "integer" ? "x" : "f"}${FIRST_ARGUMENT_REGISTER + index}`;
