/**
 * Type definitions for CLI
 */

import type { RiscvMachine } from "@rvcc/model";

/**
 * Machine configuration file (rvcc.json)
 */
export type RvccConfig = {
  readonly xlen?: number;
  /** `null` selects a machine without FP argument registers */
  readonly flen?: number | null;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  xlen?: string;
  flen?: string;
};

export type ParsedArgs = {
  readonly command: string;
  readonly file?: string;
  readonly options: CliOptions;
};

/**
 * Resolved configuration with all defaults applied
 */
export type ResolvedConfig = {
  readonly machine: RiscvMachine;
  readonly configPath?: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
