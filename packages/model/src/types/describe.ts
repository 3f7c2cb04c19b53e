/**
 * Canonical text form of type descriptors, used when no argument name applies
 */

import type { ArgumentEntry } from "./descriptors.js";

const describeList = (entries: readonly ArgumentEntry[]): string =>
  `[${entries.map(describeType).join(", ")}]`;

export const describeType = (entry: ArgumentEntry): string => {
  switch (entry.kind) {
    case "int":
      return `${entry.signed ? "S" : "U"}Int${entry.size}`;
    case "float":
      return `FP${entry.size}`;
    case "pointer":
      return `Ptr${entry.size}`;
    case "padding":
      return `Pad${entry.size}`;
    case "struct":
      return `Struct(${describeList(entry.members)}, s${entry.size}, a${entry.alignment})`;
    case "union":
      return `Union(${describeList(entry.members)}, s${entry.size}, a${entry.alignment})`;
    case "array":
      return `Array(${describeType(entry.element)}*${entry.count}, s${entry.size}, a${entry.alignment})`;
    case "slice":
      return `${describeType(entry.owner)}[${entry.low}:${entry.high}]`;
    case "varargs":
      return `VarArgs(${describeList(entry.args)})`;
  }
};
