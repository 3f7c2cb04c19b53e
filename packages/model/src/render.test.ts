import { describe, it } from "mocha";
import { expect } from "chai";
import {
  Double,
  Float,
  Int128,
  Int32,
  Int64,
  Int8,
  array,
  struct,
  varArgs,
} from "./types/constructors.js";
import { classifyCall } from "./classify/call.js";
import { classifyReturn } from "./classify/return.js";
import { formatArguments, formatStack, formatState } from "./render.js";
import { expectOk, machine } from "./testing.js";

const emptyRegisters = (label: string, prefix: string): string[] =>
  Array.from({ length: 8 }, (_, i) => `${label}[${prefix}${i}]: ?`);

describe("formatState", () => {
  it("should render a mixed integer/FP call", () => {
    const state = expectOk(
      classifyCall(machine(32, 64), [
        Int32(),
        Double(),
        struct(Int8(), array(Float(), 1)),
        struct(array(Int8(), 20)),
        Int64(),
        Int64(),
        Int64(),
      ])
    );

    expect(formatState(state)).to.equal(
      [
        "Args:",
        "arg00: SInt32",
        "arg01: FP64",
        "arg02: Struct([SInt8, Pad24, Array(FP32*1, s32, a32)], s64, a32)",
        "arg03: Struct([Array(SInt8*20, s160, a8)], s160, a8)",
        "arg04: SInt64",
        "arg05: SInt64",
        "arg06: SInt64",
        "",
        "GPRs:",
        "GPR[a0]: arg00",
        "GPR[a1]: arg02[0:7]",
        "GPR[a2]: &arg03",
        "GPR[a3]: arg04[0:31]",
        "GPR[a4]: arg04[32:63]",
        "GPR[a5]: arg05[0:31]",
        "GPR[a6]: arg05[32:63]",
        "GPR[a7]: arg06[0:31]",
        "",
        "FPRs:",
        "FPR[fa0]: arg01",
        "FPR[fa1]: arg02[32:63]",
        "FPR[fa2]: ?",
        "FPR[fa3]: ?",
        "FPR[fa4]: ?",
        "FPR[fa5]: ?",
        "FPR[fa6]: ?",
        "FPR[fa7]: ?",
        "",
        "Stack:",
        "arg06[32:63] (oldsp+0)",
      ].join("\n")
    );
  });

  it("should omit the argument and FPR sections when empty", () => {
    const state = expectOk(classifyCall(machine(32), []));
    expect(formatState(state)).to.equal(
      ["GPRs:", ...emptyRegisters("GPR", "a"), "", "Stack:"].join("\n")
    );
  });

  it("should list arguments sorted by name", () => {
    const state = expectOk(
      classifyCall(machine(64), [Int32(), varArgs(Int8())], Int128())
    );
    expect(formatArguments(state)).to.deep.equal([
      "arg00: SInt32",
      "ret: SInt128",
      "varg00: SInt64",
    ]);

    const returnOnly = expectOk(classifyReturn(machine(64), Int32()));
    expect(formatArguments(returnOnly)).to.deep.equal(["ret: SInt32"]);
  });

  it("should show stack offsets in bytes", () => {
    const args = [
      ...Array.from({ length: 8 }, () => Int32()),
      Int8(),
      Int64(),
    ];
    const state = expectOk(classifyCall(machine(64), args));
    expect(formatStack(state)).to.deep.equal([
      "arg08 (oldsp+0)",
      "arg09 (oldsp+8)",
    ]);
  });
});
