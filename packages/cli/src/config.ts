/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  createAbiError,
  createMachine,
  error,
  ok,
  type AbiError,
  type Result,
} from "@rvcc/model";
import type { CliOptions, ResolvedConfig, RvccConfig } from "./types.js";

export const CONFIG_FILE_NAME = "rvcc.json";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalidConfig = (message: string): Result<RvccConfig, AbiError> =>
  error(createAbiError("RVC3003", `${CONFIG_FILE_NAME}: ${message}`));

/**
 * Validate the parsed contents of rvcc.json
 */
export const validateConfig = (value: unknown): Result<RvccConfig, AbiError> => {
  if (!isRecord(value)) {
    return invalidConfig("must contain a JSON object");
  }

  const { xlen, flen } = value;

  if (xlen !== undefined && typeof xlen !== "number") {
    return invalidConfig("'xlen' must be a number");
  }
  if (flen !== undefined && flen !== null && typeof flen !== "number") {
    return invalidConfig("'flen' must be a number or null");
  }

  return ok({ xlen, flen });
};

/**
 * Load rvcc.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<RvccConfig, AbiError> => {
  if (!existsSync(configPath)) {
    return error(
      createAbiError("RVC3001", `Config file not found: ${configPath}`)
    );
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (err) {
    return error(
      createAbiError(
        "RVC3002",
        `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }
};

/**
 * Find rvcc.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const parseWidthFlag = (
  flag: string,
  value: string
): Result<number, AbiError> => {
  const width = Number(value);
  return value.trim() !== "" && Number.isInteger(width)
    ? ok(width)
    : error(
        createAbiError("RVC3003", `${flag} expects a bit width, got '${value}'`)
      );
};

/**
 * Resolve the FP width: the CLI flag wins, `none` disables FP registers
 */
const resolveFlen = (
  config: RvccConfig,
  cliOptions: CliOptions
): Result<number | undefined, AbiError> => {
  if (cliOptions.flen === undefined) {
    return ok(config.flen ?? undefined);
  }
  if (cliOptions.flen === "none") {
    return ok(undefined);
  }
  return parseWidthFlag("--flen", cliOptions.flen);
};

/**
 * Resolve final configuration from file + CLI args
 */
export const resolveConfig = (
  config: RvccConfig,
  cliOptions: CliOptions,
  configPath?: string
): Result<ResolvedConfig, AbiError> => {
  const xlen =
    cliOptions.xlen === undefined
      ? ok<number | undefined, AbiError>(config.xlen)
      : parseWidthFlag("--xlen", cliOptions.xlen);
  if (!xlen.ok) {
    return xlen;
  }

  const flen = resolveFlen(config, cliOptions);
  if (!flen.ok) {
    return flen;
  }

  const machine = createMachine({ xlen: xlen.value, flen: flen.value });
  if (!machine.ok) {
    return machine;
  }

  return ok({
    machine: machine.value,
    configPath,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  });
};
