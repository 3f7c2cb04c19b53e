/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import {
  AbiConstructionError,
  error,
  formatAbiError,
  ok,
  type AbiError,
  type Result,
} from "@rvcc/model";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { classifyCommand } from "../commands/classify.js";
import type { RvccConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Descriptor construction reports misuse by throwing
 */
const runGuarded = <T>(
  fn: () => Result<T, AbiError>
): Result<T, AbiError> => {
  try {
    return fn();
  } catch (err) {
    if (err instanceof AbiConstructionError) {
      return error(err.abiError);
    }
    throw err;
  }
};

const reportError = (err: AbiError): void => {
  console.error(`Error: ${formatAbiError(err)}`);
};

/**
 * Load the explicit --config file, or rvcc.json from the nearest ancestor
 * directory. No config file at all means defaults.
 */
const loadProjectConfig = (
  explicitPath: string | undefined,
  cwd: string
): Result<{ config: RvccConfig; configPath?: string }, AbiError> => {
  const configPath =
    explicitPath !== undefined ? resolve(cwd, explicitPath) : findConfig(cwd);
  if (configPath === null) {
    return ok({ config: {} });
  }

  const loaded = loadConfig(configPath);
  return loaded.ok
    ? ok({ config: loaded.value, configPath })
    : loaded;
};

/**
 * Main CLI entry point
 */
export const runCli = (args: readonly string[], cwd = process.cwd()): number => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`rvcc v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "call" && parsed.command !== "ret") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'rvcc --help' for usage information");
    return 2;
  }

  if (!parsed.file) {
    console.error("Error: Call description file required");
    console.error(`Usage: rvcc ${parsed.command} <file> [options]`);
    return 2;
  }

  const loaded = loadProjectConfig(parsed.options.config, cwd);
  if (!loaded.ok) {
    reportError(loaded.error);
    return 1;
  }

  const config = resolveConfig(
    loaded.value.config,
    parsed.options,
    loaded.value.configPath
  );
  if (!config.ok) {
    reportError(config.error);
    return 1;
  }

  const filePath = resolve(cwd, parsed.file);
  const result = runGuarded(() =>
    classifyCommand(
      parsed.command === "ret" ? "ret" : "call",
      filePath,
      config.value
    )
  );
  if (!result.ok) {
    reportError(result.error);
    return 1;
  }

  if (!config.value.quiet) {
    console.log(result.value);
  }
  return 0;
};
