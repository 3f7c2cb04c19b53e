/**
 * Type descriptors (AbiType and its variants)
 *
 * All sizes and alignments are in bits. Descriptors are immutable; every
 * argument of a call must be a distinct object, so identity (not structure)
 * is what tells two `SInt32` arguments apart.
 */

export type AbiType =
  | IntType
  | FloatType
  | PointerType
  | PaddingType
  | StructType
  | UnionType
  | ArrayType
  | SliceType;

export type IntType = {
  readonly kind: "int";
  readonly size: number;
  readonly alignment: number;
  readonly signed: boolean;
};

export type FloatType = {
  readonly kind: "float";
  readonly size: number;
  readonly alignment: number;
};

export type PointerType = {
  readonly kind: "pointer";
  readonly size: number;
  readonly alignment: number;
};

/**
 * Synthetic filler inserted by struct layout. Never an argument on its own.
 */
export type PaddingType = {
  readonly kind: "padding";
  readonly size: number;
  readonly alignment: 1;
};

/**
 * Struct with padding already materialized in `members`.
 *
 * A struct with no members has size 0 and is dropped from argument lists.
 */
export type StructType = {
  readonly kind: "struct";
  readonly members: readonly AbiType[];
  readonly size: number;
  readonly alignment: number;
};

export type UnionType = {
  readonly kind: "union";
  readonly members: readonly AbiType[];
  readonly size: number;
  readonly alignment: number;
};

export type ArrayType = {
  readonly kind: "array";
  readonly element: AbiType;
  readonly count: number;
  readonly size: number;
  readonly alignment: number;
};

/**
 * View of bits `low..high` (inclusive) of `owner`'s storage.
 *
 * Used for the halves of a value split across two locations and for the
 * fields of a struct passed in a register pair.
 */
export type SliceType = {
  readonly kind: "slice";
  readonly owner: AbiType;
  readonly low: number;
  readonly high: number;
  readonly size: number;
  readonly alignment: number;
};

/**
 * Marks the trailing arguments of a call as variadic.
 *
 * `args` is typed loosely enough to hold a nested marker so that misuse can
 * be reported instead of being unrepresentable only at compile time.
 */
export type VarArgs = {
  readonly kind: "varargs";
  readonly args: readonly ArgumentEntry[];
};

export type ArgumentEntry = AbiType | VarArgs;

export type AggregateType = StructType | ArrayType;

export const isVarArgs = (entry: ArgumentEntry): entry is VarArgs =>
  entry.kind === "varargs";
