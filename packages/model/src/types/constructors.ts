/**
 * Type descriptor constructors
 *
 * Every call returns a fresh object. The named presets (`Int32()`,
 * `Double()`, ...) are factories rather than shared constants because the
 * same instance may not appear twice in one call.
 */

import type {
  AbiType,
  ArgumentEntry,
  ArrayType,
  FloatType,
  IntType,
  PaddingType,
  PointerType,
  SliceType,
  StructType,
  UnionType,
  VarArgs,
} from "./descriptors.js";
import { AbiConstructionError, createAbiError } from "./errors.js";
import { alignTo, padMembers } from "./layout.js";

const INT_SIZES: readonly number[] = [8, 16, 32, 64, 128];
const FLOAT_SIZES: readonly number[] = [32, 64, 128];
const POINTER_SIZES: readonly number[] = [32, 64, 128];

/**
 * Alignment of a struct with no members (one byte)
 */
export const EMPTY_STRUCT_ALIGNMENT = 8;

const invalid = (message: string): AbiConstructionError =>
  new AbiConstructionError(createAbiError("RVC2004", message));

const requireSize = (
  what: string,
  size: number,
  allowed: readonly number[]
): void => {
  if (!allowed.includes(size)) {
    throw invalid(
      `${what} size must be one of ${allowed.join(", ")} bits, got ${size}`
    );
  }
};

export const int = (size: number, signed = true): IntType => {
  requireSize("Integer", size, INT_SIZES);
  return { kind: "int", size, alignment: size, signed };
};

export const sint = (size: number): IntType => int(size, true);

export const uint = (size: number): IntType => int(size, false);

export const float = (size: number): FloatType => {
  requireSize("Floating-point", size, FLOAT_SIZES);
  return { kind: "float", size, alignment: size };
};

export const pointer = (size: number): PointerType => {
  requireSize("Pointer", size, POINTER_SIZES);
  return { kind: "pointer", size, alignment: size };
};

export const padding = (size: number): PaddingType => {
  if (!Number.isInteger(size) || size <= 0) {
    throw invalid(`Padding size must be a positive number of bits, got ${size}`);
  }
  return { kind: "padding", size, alignment: 1 };
};

export const struct = (...members: AbiType[]): StructType => {
  if (members.length === 0) {
    return {
      kind: "struct",
      members: [],
      size: 0,
      alignment: EMPTY_STRUCT_ALIGNMENT,
    };
  }

  const padded = padMembers(members);
  const alignment = Math.max(...members.map((m) => m.alignment));
  const unpaddedSize = padded.reduce((total, m) => total + m.size, 0);

  return {
    kind: "struct",
    members: padded,
    size: alignTo(unpaddedSize, alignment),
    alignment,
  };
};

export const union = (...members: AbiType[]): UnionType => {
  if (members.length === 0) {
    throw invalid("Union must have at least one member");
  }

  const alignment = Math.max(...members.map((m) => m.alignment));
  const largest = Math.max(...members.map((m) => m.size));

  return {
    kind: "union",
    members,
    size: alignTo(largest, alignment),
    alignment,
  };
};

export const array = (element: AbiType, count: number): ArrayType => {
  if (!Number.isInteger(count) || count <= 0) {
    throw invalid(`Array element count must be a positive integer, got ${count}`);
  }
  return {
    kind: "array",
    element,
    count,
    size: element.size * count,
    alignment: element.alignment,
  };
};

export const slice = (owner: AbiType, low: number, high: number): SliceType => {
  if (low < 0 || high < low) {
    throw invalid(`Invalid slice bounds [${low}:${high}]`);
  }
  const size = high - low + 1;
  return { kind: "slice", owner, low, high, size, alignment: size };
};

export const varArgs = (...args: ArgumentEntry[]): VarArgs => ({
  kind: "varargs",
  args,
});

// Named presets

export const Int8 = (): IntType => sint(8);
export const Int16 = (): IntType => sint(16);
export const Int32 = (): IntType => sint(32);
export const Int64 = (): IntType => sint(64);
export const Int128 = (): IntType => sint(128);

export const SInt8 = Int8;
export const SInt16 = Int16;
export const SInt32 = Int32;
export const SInt64 = Int64;
export const SInt128 = Int128;

export const UInt8 = (): IntType => uint(8);
export const UInt16 = (): IntType => uint(16);
export const UInt32 = (): IntType => uint(32);
export const UInt64 = (): IntType => uint(64);
export const UInt128 = (): IntType => uint(128);

export const Char = UInt8;

export const Float = (): FloatType => float(32);
export const Double = (): FloatType => float(64);
export const LongDouble = (): FloatType => float(128);

export const FP32 = Float;
export const FP64 = Double;
export const FP128 = LongDouble;

export const Ptr32 = (): PointerType => pointer(32);
export const Ptr64 = (): PointerType => pointer(64);
