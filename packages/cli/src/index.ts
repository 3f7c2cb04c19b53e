#!/usr/bin/env node
/**
 * rvcc - Command-line interface for the RISC-V calling-convention model
 */

import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}

export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
export * from "./call-description.js";
export { classifyCommand, type ClassifyMode } from "./commands/classify.js";
