/**
 * RISC-V calling-convention model - argument and return value classification
 */

export * from "./types/result.js";
export {
  type AbiErrorKind,
  type AbiErrorCode,
  type AbiError,
  createAbiError,
  formatAbiError,
  AbiConstructionError,
} from "./types/errors.js";
export * from "./types/descriptors.js";
export * from "./types/constructors.js";
export { alignTo, flatten, memberOffsets } from "./types/layout.js";
export { describeType } from "./types/describe.js";

export * from "./machine.js";

export {
  ArgumentTable,
  RETURN_NAME,
  type ArgumentSlot,
} from "./state/argument-table.js";
export {
  AllocationState,
  type RegisterContents,
} from "./state/allocation-state.js";
export {
  ARGUMENT_REGISTER_COUNT,
  registerAbiName,
  registerArchName,
  type RegisterFile,
} from "./state/registers.js";

export { classifyCall } from "./classify/call.js";
export { classifyReturn, hasHiddenReturnPointer } from "./classify/return.js";
export {
  flattenForFpRules,
  matchFpPair,
  type FpPair,
  type FpPairPattern,
} from "./classify/fp-struct.js";
export { promoteVariadic } from "./classify/normalize.js";

export { formatState, formatArguments, formatStack } from "./render.js";
