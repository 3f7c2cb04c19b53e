/**
 * Call description files
 *
 * {
 *   "args": ["i32", "double", { "struct": ["i8", { "array": "f32", "count": 1 }] }],
 *   "varargs": ["i64"],
 *   "ret": { "struct": ["f64", "f32"] }
 * }
 *
 * Every occurrence of a type becomes a fresh descriptor.
 */

import { readFileSync, existsSync } from "node:fs";
import {
  array,
  createAbiError,
  error,
  float,
  ok,
  pointer,
  sequence,
  sint,
  struct,
  uint,
  union,
  varArgs,
  type AbiError,
  type AbiType,
  type ArgumentEntry,
  type Result,
} from "@rvcc/model";

export type CallDescription = {
  readonly args: readonly ArgumentEntry[];
  readonly ret?: AbiType;
};

const SCALARS = new Map<string, (xlen: number) => AbiType>([
  ["i8", () => sint(8)],
  ["i16", () => sint(16)],
  ["i32", () => sint(32)],
  ["i64", () => sint(64)],
  ["i128", () => sint(128)],
  ["u8", () => uint(8)],
  ["u16", () => uint(16)],
  ["u32", () => uint(32)],
  ["u64", () => uint(64)],
  ["u128", () => uint(128)],
  ["char", () => uint(8)],
  ["f32", () => float(32)],
  ["f64", () => float(64)],
  ["f128", () => float(128)],
  ["float", () => float(32)],
  ["double", () => float(64)],
  ["ptr", (xlen) => pointer(xlen)],
  ["ptr32", () => pointer(32)],
  ["ptr64", () => pointer(64)],
]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = <T>(path: string, message: string): Result<T, AbiError> =>
  error(createAbiError("RVC3004", `${path}: ${message}`));

const parseTypeList = (
  value: unknown,
  xlen: number,
  path: string
): Result<readonly AbiType[], AbiError> => {
  if (!Array.isArray(value)) {
    return invalid(path, "expected an array of types");
  }
  const items: readonly unknown[] = value;
  return sequence(
    items.map((item, index) => parseTypeExpression(item, xlen, `${path}[${index}]`))
  );
};

/**
 * Parse one type expression: a scalar name or a struct/union/array object
 */
export const parseTypeExpression = (
  value: unknown,
  xlen: number,
  path = "type"
): Result<AbiType, AbiError> => {
  if (typeof value === "string") {
    const scalar = SCALARS.get(value);
    return scalar
      ? ok(scalar(xlen))
      : invalid(path, `unknown scalar type '${value}'`);
  }

  if (!isRecord(value)) {
    return invalid(path, "expected a scalar name or an object");
  }

  if ("struct" in value) {
    const members = parseTypeList(value.struct, xlen, `${path}.struct`);
    return members.ok ? ok(struct(...members.value)) : members;
  }

  if ("union" in value) {
    const members = parseTypeList(value.union, xlen, `${path}.union`);
    if (!members.ok) {
      return members;
    }
    return members.value.length === 0
      ? invalid(`${path}.union`, "a union needs at least one member")
      : ok(union(...members.value));
  }

  if ("array" in value) {
    const { count } = value;
    if (typeof count !== "number" || !Number.isInteger(count) || count <= 0) {
      return invalid(`${path}.count`, "expected a positive integer");
    }
    const element = parseTypeExpression(value.array, xlen, `${path}.array`);
    return element.ok ? ok(array(element.value, count)) : element;
  }

  return invalid(path, "expected one of 'struct', 'union' or 'array'");
};

/**
 * Validate a parsed call description
 */
export const parseCallDescription = (
  value: unknown,
  xlen: number
): Result<CallDescription, AbiError> => {
  if (!isRecord(value)) {
    return invalid("call", "must be a JSON object");
  }

  const args = parseTypeList(value.args ?? [], xlen, "args");
  if (!args.ok) {
    return args;
  }

  const variadic =
    value.varargs === undefined
      ? undefined
      : parseTypeList(value.varargs, xlen, "varargs");
  if (variadic !== undefined && !variadic.ok) {
    return variadic;
  }

  const ret =
    value.ret === undefined || value.ret === null
      ? undefined
      : parseTypeExpression(value.ret, xlen, "ret");
  if (ret !== undefined && !ret.ok) {
    return ret;
  }

  const entries: ArgumentEntry[] = [...args.value];
  if (variadic !== undefined) {
    entries.push(varArgs(...variadic.value));
  }

  return ok({ args: entries, ret: ret?.value });
};

/**
 * Read and parse a call description file
 */
export const loadCallDescription = (
  filePath: string,
  xlen: number
): Result<CallDescription, AbiError> => {
  if (!existsSync(filePath)) {
    return invalid(filePath, "file not found");
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return parseCallDescription(parsed, xlen);
  } catch (err) {
    return invalid(
      filePath,
      `invalid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};
