/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

export const CALL_DESCRIPTION_EXAMPLE = {
  args: ["i32", "double", { struct: ["i8", "f32"] }],
  varargs: ["i64", { struct: [{ array: "u8", count: 3 }] }],
  ret: { union: ["i64", "f64"] },
};

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
rvcc - RISC-V calling convention explorer v${VERSION}

USAGE:
  rvcc <command> <file> [options]

COMMANDS:
  call <file>               Show where each argument of a call is placed
  ret <file>                Show where a return value is placed

OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: rvcc.json)
  -x, --xlen <bits>         Integer register width: 32, 64 or 128
  -f, --flen <bits|none>    FP register width: 32, 64, 128 or none

CALL DESCRIPTION:
${JSON.stringify(CALL_DESCRIPTION_EXAMPLE, null, 2).replace(/^/gm, "  ")}

  Scalars: i8 i16 i32 i64 i128 u8 u16 u32 u64 u128 char
           f32 f64 f128 float double ptr ptr32 ptr64

EXAMPLES:
  rvcc call printf.json --xlen 32
  rvcc call sum.json --xlen 64 --flen 64
  rvcc ret point.json -f none
`);
};
