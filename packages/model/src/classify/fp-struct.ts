/**
 * Hardware floating-point struct rules
 *
 * A struct whose flattened form is a single float, or exactly two fields of
 * shape float+float, float+int or int+float, may be passed in FP registers
 * (or an FP/integer register pair) instead of following the integer rules.
 */

import type {
  AbiType,
  FloatType,
  IntType,
  StructType,
} from "../types/descriptors.js";
import { struct } from "../types/constructors.js";
import { flatten, memberOffsets } from "../types/layout.js";
import type { RiscvMachine } from "../machine.js";

export type FpPairPattern = "float-float" | "float-int" | "int-float";

export type FpField = {
  readonly type: FloatType | IntType;
  /** Bit offset of the field within the struct */
  readonly offset: number;
};

export type FpPair = {
  readonly pattern: FpPairPattern;
  readonly first: FpField;
  readonly second: FpField;
};

/**
 * Rebuild a struct from its flattened leaves, re-padding between them
 */
export const flattenStruct = (ty: StructType): StructType =>
  struct(...flatten(ty));

/**
 * Flattened view of an argument for the FP rules: a struct small enough to
 * be eligible becomes its flattened struct, or its only leaf
 */
export const flattenForFpRules = (
  machine: RiscvMachine,
  ty: AbiType
): AbiType => {
  if (machine.flen === undefined || ty.kind !== "struct") {
    return ty;
  }
  if (ty.size > Math.max(2 * machine.flen, 2 * machine.xlen)) {
    return ty;
  }

  const flat = flattenStruct(ty);
  const [only] = flat.members;
  return flat.members.length === 1 && only !== undefined ? only : flat;
};

const patternOf = (
  machine: RiscvMachine,
  first: AbiType,
  second: AbiType
): FpPairPattern | undefined => {
  const { xlen, flen } = machine;
  if (flen === undefined) {
    return undefined;
  }

  if (first.kind === "float" && second.kind === "float") {
    return first.size <= flen && second.size <= flen ? "float-float" : undefined;
  }
  if (first.kind === "float" && second.kind === "int") {
    return first.size <= flen && second.size <= xlen ? "float-int" : undefined;
  }
  if (first.kind === "int" && second.kind === "float") {
    return first.size <= xlen && second.size <= flen ? "int-float" : undefined;
  }
  return undefined;
};

const asField = (
  ty: AbiType | undefined,
  offset: number | undefined
): FpField | undefined =>
  ty !== undefined &&
  offset !== undefined &&
  (ty.kind === "float" || ty.kind === "int")
    ? { type: ty, offset }
    : undefined;

/**
 * Match an already flattened struct against the two-field patterns.
 * Padding does not count as a field.
 */
export const matchFpPair = (
  machine: RiscvMachine,
  flat: StructType
): FpPair | undefined => {
  const offsets = memberOffsets(flat);
  const fields = flat.members
    .map((type, index) => ({ type, offset: offsets[index] }))
    .filter((field) => field.type.kind !== "padding");

  if (fields.length !== 2) {
    return undefined;
  }
  const [a, b] = fields;
  const first = asField(a?.type, a?.offset);
  const second = asField(b?.type, b?.offset);
  if (!first || !second) {
    return undefined;
  }

  const pattern = patternOf(machine, first.type, second.type);
  return pattern ? { pattern, first, second } : undefined;
};

/**
 * Whether a struct return value comes back in registers under the FP rules
 * (rather than through a caller-allocated buffer)
 */
export const isFpStructReturn = (
  machine: RiscvMachine,
  ty: StructType
): boolean => matchFpPair(machine, flattenStruct(ty)) !== undefined;
