/**
 * Layout helpers - alignment rounding, struct padding, flattening
 */

import type {
  AbiType,
  AggregateType,
  PaddingType,
  StructType,
} from "./descriptors.js";

/**
 * Round `value` up to the next multiple of `alignment`
 */
export const alignTo = (value: number, alignment: number): number => {
  const remainder = value % alignment;
  return remainder === 0 ? value : value + (alignment - remainder);
};

const createPadding = (size: number): PaddingType => ({
  kind: "padding",
  size,
  alignment: 1,
});

/**
 * Insert padding so that every member starts at a multiple of its alignment.
 * Trailing padding is not materialized; it only shows in the struct size.
 */
export const padMembers = (
  members: readonly AbiType[]
): readonly AbiType[] => {
  const padded: AbiType[] = [];
  let offset = 0;

  for (const member of members) {
    const aligned = alignTo(offset, member.alignment);
    if (aligned !== offset) {
      padded.push(createPadding(aligned - offset));
      offset = aligned;
    }
    padded.push(member);
    offset += member.size;
  }

  return padded;
};

/**
 * Bit offset of each member of a struct (padding members included)
 */
export const memberOffsets = (struct: StructType): readonly number[] => {
  const offsets: number[] = [];
  let offset = 0;
  for (const member of struct.members) {
    offsets.push(offset);
    offset += member.size;
  }
  return offsets;
};

/**
 * Expand a struct or array to its ordered non-aggregate leaves.
 *
 * Padding members are kept; unions are leaves.
 */
export const flatten = (ty: AggregateType): readonly AbiType[] => {
  switch (ty.kind) {
    case "struct":
      return ty.members.flatMap((member) => flattenMember(member));
    case "array": {
      const leaves = flattenMember(ty.element);
      const repeated: AbiType[] = [];
      for (let i = 0; i < ty.count; i++) {
        repeated.push(...leaves);
      }
      return repeated;
    }
  }
};

const flattenMember = (member: AbiType): readonly AbiType[] =>
  member.kind === "struct" || member.kind === "array"
    ? flatten(member)
    : [member];
