/**
 * rvcc call / rvcc ret - Classify a call description and print the placement
 */

import {
  classifyCall,
  classifyReturn,
  describeMachine,
  flatMap,
  formatState,
  hasHiddenReturnPointer,
  map,
  type AbiError,
  type Result,
} from "@rvcc/model";
import { loadCallDescription } from "../call-description.js";
import type { ResolvedConfig } from "../types.js";

export type ClassifyMode = "call" | "ret";

/**
 * Classify the call described in `filePath` for the configured machine.
 *
 * `ret` mode only looks at the description's return type.
 */
export const classifyCommand = (
  mode: ClassifyMode,
  filePath: string,
  config: ResolvedConfig
): Result<string, AbiError> => {
  const { machine, verbose } = config;

  if (verbose) {
    console.log(`Machine: ${describeMachine(machine)}`);
    if (config.configPath) {
      console.log(`Config: ${config.configPath}`);
    }
    console.log(`Reading call description: ${filePath}`);
  }

  return flatMap(loadCallDescription(filePath, machine.xlen), (description) => {
    const classified =
      mode === "call"
        ? classifyCall(machine, description.args, description.ret)
        : classifyReturn(machine, description.ret);

    return map(classified, (state) => {
      if (verbose && mode === "call" && hasHiddenReturnPointer(state)) {
        console.log("Return value is passed by reference in a0");
      }
      return formatState(state);
    });
  });
};
