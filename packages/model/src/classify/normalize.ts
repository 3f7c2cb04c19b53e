/**
 * Argument list normalization and validation
 *
 * Runs before any register is touched: unwraps the trailing VarArgs marker,
 * rejects misuse, drops empty arguments, promotes small variadic scalars and
 * names every remaining argument.
 */

import type { AbiType, ArgumentEntry } from "../types/descriptors.js";
import { isVarArgs } from "../types/descriptors.js";
import { describeType } from "../types/describe.js";
import { createAbiError, type AbiError } from "../types/errors.js";
import { error, ok, type Result } from "../types/result.js";
import type { RiscvMachine } from "../machine.js";
import { ArgumentTable, type ArgumentSlot } from "../state/argument-table.js";

export type NormalizedCall = {
  readonly table: ArgumentTable;
  /** Non-empty arguments in call order */
  readonly args: readonly ArgumentSlot[];
  readonly ret: ArgumentSlot | undefined;
};

type SplitArguments = {
  readonly fixed: readonly ArgumentEntry[];
  readonly variadic: readonly ArgumentEntry[];
};

const splitVarArgs = (entries: readonly ArgumentEntry[]): SplitArguments => {
  const last = entries[entries.length - 1];
  if (last !== undefined && isVarArgs(last)) {
    return { fixed: entries.slice(0, -1), variadic: last.args };
  }
  return { fixed: entries, variadic: [] };
};

const findDuplicate = (
  entries: readonly ArgumentEntry[]
): ArgumentEntry | undefined => {
  const seen = new Set<ArgumentEntry>();
  for (const entry of entries) {
    if (seen.has(entry)) {
      return entry;
    }
    seen.add(entry);
  }
  return undefined;
};

const checkUnique = (
  args: readonly ArgumentEntry[],
  ret: ArgumentEntry | undefined
): AbiError | undefined => {
  const duplicate = findDuplicate(ret === undefined ? args : [...args, ret]);
  return duplicate === undefined
    ? undefined
    : createAbiError(
        "RVC2001",
        `Arguments must be unique instances: ${describeType(duplicate)} is used more than once`,
        "Construct a new descriptor for every argument and for the return type"
      );
};

const checkVarArgs = (
  args: readonly ArgumentEntry[],
  ret: ArgumentEntry | undefined
): AbiError | undefined => {
  if (ret !== undefined && isVarArgs(ret)) {
    return createAbiError("RVC2002", "Return type cannot be VarArgs");
  }
  if (args.some(isVarArgs)) {
    return createAbiError(
      "RVC2002",
      "VarArgs must be the last element of the argument list",
      "Only one VarArgs marker is allowed and it cannot be nested"
    );
  }
  return undefined;
};

const byValueArray = (what: string, ty: AbiType): AbiError =>
  createAbiError(
    "RVC2003",
    `Arrays cannot be ${what} by value: ${describeType(ty)}`,
    "Wrap the array in a struct"
  );

/**
 * Widen a variadic scalar to the slot width it is passed in
 */
export const promoteVariadic = (
  machine: RiscvMachine,
  ty: AbiType
): AbiType => {
  if (ty.kind === "int" && ty.size < machine.xlen) {
    return { ...ty, size: machine.xlen, alignment: machine.xlen };
  }
  if (
    ty.kind === "float" &&
    machine.flen !== undefined &&
    ty.size < machine.flen
  ) {
    return { ...ty, size: machine.flen, alignment: machine.flen };
  }
  return ty;
};

/**
 * Narrow a validated entry list (no VarArgs left) to descriptors
 */
const descriptorsOf = (entries: readonly ArgumentEntry[]): AbiType[] =>
  entries.flatMap<AbiType>((entry) => (isVarArgs(entry) ? [] : [entry]));

/**
 * Zero-size arguments occupy no register or stack slot
 */
const nonEmpty = (types: readonly AbiType[]): AbiType[] =>
  types.filter((ty) => ty.size > 0);

/**
 * Validate and normalize the arguments and return type of a call
 */
export const normalizeCall = (
  machine: RiscvMachine,
  entries: readonly ArgumentEntry[],
  ret?: ArgumentEntry
): Result<NormalizedCall, AbiError> => {
  const { fixed, variadic } = splitVarArgs(entries);
  const all = [...fixed, ...variadic];

  const validationError = checkVarArgs(all, ret) ?? checkUnique(all, ret);
  if (validationError) {
    return error(validationError);
  }

  const fixedArgs = nonEmpty(descriptorsOf(fixed));
  const variadicArgs = nonEmpty(descriptorsOf(variadic));
  const returnType =
    ret === undefined || isVarArgs(ret) || ret.size === 0 ? undefined : ret;

  if (returnType?.kind === "array") {
    return error(byValueArray("returned", returnType));
  }
  const array = [...fixedArgs, ...variadicArgs].find(
    (ty) => ty.kind === "array"
  );
  if (array) {
    return error(byValueArray("passed", array));
  }

  const table = new ArgumentTable();
  const args: ArgumentSlot[] = [];

  for (const declared of fixedArgs) {
    args.push(table.add({ declared, classified: declared, variadic: false }));
  }
  for (const declared of variadicArgs) {
    args.push(
      table.add({
        declared,
        classified: promoteVariadic(machine, declared),
        variadic: true,
      })
    );
  }

  const retSlot =
    returnType === undefined
      ? undefined
      : table.add({
          declared: returnType,
          classified: returnType,
          variadic: false,
          isReturn: true,
        });

  return ok({ table, args, ret: retSlot });
};

/**
 * Normalize a return type so it can be classified like a lone named argument
 */
export const normalizeReturn = (
  ret: ArgumentEntry | undefined
): Result<NormalizedCall, AbiError> => {
  if (ret === undefined) {
    return ok({ table: new ArgumentTable(), args: [], ret: undefined });
  }
  if (isVarArgs(ret)) {
    return error(createAbiError("RVC2002", "Return type cannot be VarArgs"));
  }
  const table = new ArgumentTable();
  if (ret.size === 0) {
    return ok({ table, args: [], ret: undefined });
  }
  if (ret.kind === "array") {
    return error(byValueArray("returned", ret));
  }

  const slot = table.add({
    declared: ret,
    classified: ret,
    variadic: false,
    isReturn: true,
  });
  return ok({ table, args: [slot], ret: slot });
};
