/**
 * Tests for the call / ret commands
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RiscvMachine } from "@rvcc/model";
import type { ResolvedConfig } from "../types.js";
import { CALL_DESCRIPTION_EXAMPLE } from "../cli/help.js";
import { classifyCommand } from "./classify.js";

const config = (machine: RiscvMachine): ResolvedConfig => ({
  machine,
  verbose: false,
  quiet: false,
});

const withDescription = (
  description: unknown,
  fn: (file: string) => void
): void => {
  const dir = mkdtempSync(join(tmpdir(), "rvcc-classify-"));
  try {
    const file = join(dir, "call.json");
    writeFileSync(file, JSON.stringify(description));
    fn(file);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const registers = (
  label: string,
  prefix: string,
  names: readonly string[]
): string[] =>
  Array.from(
    { length: 8 },
    (_, i) => `${label}[${prefix}${i}]: ${names[i] ?? "?"}`
  );

describe("classifyCommand", () => {
  it("should render the placement of a call", () => {
    withDescription({ args: ["i32", "double"], ret: "i32" }, (file) => {
      const result = classifyCommand(
        "call",
        file,
        config({ xlen: 64, flen: 64 })
      );
      expect(result).to.deep.equal({
        ok: true,
        value: [
          "Args:",
          "arg00: SInt32",
          "arg01: FP64",
          "ret: SInt32",
          "",
          "GPRs:",
          ...registers("GPR", "a", ["arg00"]),
          "",
          "FPRs:",
          ...registers("FPR", "fa", ["arg01"]),
          "",
          "Stack:",
        ].join("\n"),
      });
    });
  });

  it("should show a hidden return pointer ahead of the arguments", () => {
    withDescription(
      { args: ["i32"], ret: { struct: ["i64", "i64"] } },
      (file) => {
        const result = classifyCommand("call", file, config({ xlen: 32 }));
        expect(result.ok && result.value.split("\n")).to.deep.equal([
          "Args:",
          "arg00: SInt32",
          "ret: Struct([SInt64, SInt64], s128, a64)",
          "",
          "GPRs:",
          ...registers("GPR", "a", ["&ret", "arg00"]),
          "",
          "Stack:",
        ]);
      }
    );
  });

  it("should classify only the return type in ret mode", () => {
    withDescription({ args: ["i32", "i32"], ret: "i64" }, (file) => {
      const result = classifyCommand("ret", file, config({ xlen: 64 }));
      expect(result.ok && result.value.split("\n")).to.deep.equal([
        "Args:",
        "ret: SInt64",
        "",
        "GPRs:",
        ...registers("GPR", "a", ["ret"]),
        "",
        "Stack:",
      ]);
    });
  });

  it("should promote variadic arguments", () => {
    withDescription({ args: ["ptr"], varargs: ["i8"] }, (file) => {
      const result = classifyCommand("call", file, config({ xlen: 32 }));
      expect(result.ok && result.value.split("\n").slice(0, 3)).to.deep.equal(
        ["Args:", "arg00: Ptr32", "varg00: SInt32"]
      );
    });
  });

  it("should classify the call description shown in the help text", () => {
    withDescription(CALL_DESCRIPTION_EXAMPLE, (file) => {
      const result = classifyCommand(
        "call",
        file,
        config({ xlen: 64, flen: 64 })
      );
      expect(result.ok && result.value.split("\n").slice(0, 7)).to.deep.equal([
        "Args:",
        "arg00: SInt32",
        "arg01: FP64",
        "arg02: Struct([SInt8, Pad24, FP32], s64, a32)",
        "ret: Union([SInt64, FP64], s64, a64)",
        "varg00: SInt64",
        "varg01: Struct([Array(UInt8*3, s24, a8)], s24, a8)",
      ]);
    });
  });

  it("should report description errors", () => {
    withDescription({ args: ["i32", "bool"] }, (file) => {
      const result = classifyCommand("call", file, config({ xlen: 64 }));
      expect(result.ok ? "" : result.error.code).to.equal("RVC3004");
      expect(result.ok ? "" : result.error.message).to.equal(
        "args[1]: unknown scalar type 'bool'"
      );
    });
  });

  it("should report unsupported arguments", () => {
    withDescription({ args: [{ array: "i32", count: 2 }] }, (file) => {
      const result = classifyCommand("call", file, config({ xlen: 64 }));
      expect(result.ok ? "" : result.error.code).to.equal("RVC2003");
    });
  });
});
