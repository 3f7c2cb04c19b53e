import { describe, it } from "mocha";
import { expect } from "chai";
import {
  Double,
  Int128,
  Int16,
  Int32,
  Int64,
  Int8,
  slice,
} from "../types/constructors.js";
import { ArgumentTable } from "./argument-table.js";
import { AllocationState } from "./allocation-state.js";
import { registerAbiName, registerArchName } from "./registers.js";
import { expectError, expectOk, gprNames, machine, stackNames } from "../testing.js";

describe("AllocationState", () => {
  describe("integer registers", () => {
    it("should fill registers low index first, then the stack", () => {
      const state = new AllocationState(machine(32));
      const types = Array.from({ length: 10 }, () => Int32());
      types.forEach((ty) => state.assignToIntegerRegisterOrStack(ty));

      expect(state.integerRegisters.slice(0, 8)).to.deep.equal(
        types.slice(0, 8)
      );
      expect(state.integerRegisters[0]).to.equal(types[0]);
      expect(state.stack).to.have.length(2);
      expect(state.stack[0]).to.equal(types[8]);
      expect(state.integerRegistersLeft).to.equal(0);
    });

    it("should reserve a register on skip", () => {
      const state = new AllocationState(machine(32));
      state.skipIntegerRegister();
      const ty = Int32();
      state.assignToIntegerRegister(ty);
      expect(state.integerRegisters[0]).to.be.undefined;
      expect(state.integerRegisters[1]).to.equal(ty);
      expect(state.integerRegistersLeft).to.equal(6);
    });

    it("should treat an oversized object as an internal error", () => {
      const state = new AllocationState(machine(32));
      expect(() => state.assignToIntegerRegisterOrStack(Int64())).to.throw(
        /^ICE: /
      );
      expect(() => state.assignToIntegerRegister(Int64())).to.throw(/^ICE: /);
    });

    it("should treat exhaustion on a direct assignment as an internal error", () => {
      const state = new AllocationState(machine(64));
      for (let i = 0; i < 8; i++) {
        state.assignToIntegerRegister(Int8());
      }
      expect(() => state.assignToIntegerRegister(Int8())).to.throw(
        "ICE: all integer argument registers already assigned"
      );
      expect(() => state.skipIntegerRegister()).to.throw(/^ICE: /);
    });
  });

  describe("FP registers", () => {
    it("should be absent without FLEN", () => {
      const state = new AllocationState(machine(32));
      expect(state.fpRegisters).to.be.undefined;
      expect(state.fpRegistersLeft).to.equal(0);
      expect(() => state.assignToFPRegister(Double())).to.throw(
        "ICE: machine has no FP argument registers"
      );
    });

    it("should fill FP registers in order", () => {
      const state = new AllocationState(machine(32, 64));
      const a = Double();
      const b = Double();
      state.assignToFPRegister(a);
      state.assignToFPRegister(b);
      expect(state.fpRegisters?.[0]).to.equal(a);
      expect(state.fpRegisters?.[1]).to.equal(b);
      expect(state.fpRegistersLeft).to.equal(6);
    });

    it("should reject objects wider than FLEN", () => {
      const state = new AllocationState(machine(64, 32));
      expect(() => state.assignToFPRegister(Double())).to.throw(/^ICE: /);
    });
  });

  describe("stack", () => {
    it("should refuse objects larger than 2*XLEN", () => {
      const state = new AllocationState(machine(32));
      expect(() => state.assignToStack(Int128())).to.throw(
        "ICE: objects larger than 2*XLEN must be passed by reference"
      );
    });

    it("should compute offsets from the caller's stack pointer", () => {
      const state = new AllocationState(machine(32));
      state.assignToStack(Int8());
      state.assignToStack(Double());
      state.assignToStack(Int16());
      state.assignToStack(Int32());

      // 0; 8 -> 32 -> 64 bits; 128 -> 128; 144 -> 160 bits
      expect(state.stackOffsetsFromCallerSP()).to.deep.equal([0, 8, 16, 20]);
      expect(expectOk(state.stackOffsetFromCallerSP(1))).to.equal(8);
      expect(expectOk(state.stackOffsetFromCallerSP(3))).to.equal(20);
    });

    it("should report an invalid stack index as a usage error", () => {
      const state = new AllocationState(machine(64));
      state.assignToStack(Int8());
      const err = expectError(state.stackOffsetFromCallerSP(1));
      expect(err.code).to.equal("RVC2005");
      expect(err.kind).to.equal("usage");
      expect(expectError(state.stackOffsetFromCallerSP(-1)).code).to.equal(
        "RVC2005"
      );
    });
  });

  describe("naming", () => {
    it("should name references and slices after their owner", () => {
      const table = new ArgumentTable();
      const big = Int128();
      const pair = Int64();
      table.add({ declared: big, classified: big, variadic: false });
      table.add({ declared: pair, classified: pair, variadic: true });

      const state = new AllocationState(machine(32), table);
      state.passByReference(big);
      state.assignToIntegerRegisterOrStack(slice(pair, 0, 31));
      state.assignToIntegerRegisterOrStack(slice(pair, 32, 63));

      expect(gprNames(state).slice(0, 4)).to.deep.equal([
        "&arg00",
        "varg00[0:31]",
        "varg00[32:63]",
        "?",
      ]);
      expect(stackNames(state)).to.deep.equal([]);
    });

    it("should fall back to the descriptor text for unnamed objects", () => {
      const state = new AllocationState(machine(64));
      state.assignToIntegerRegisterOrStack(Int32());
      expect(gprNames(state)[0]).to.equal("SInt32");
    });

    it("should keep structurally equal arguments distinct", () => {
      const table = new ArgumentTable();
      const a = Int32();
      const b = Int32();
      table.add({ declared: a, classified: a, variadic: false });
      table.add({ declared: b, classified: b, variadic: false });
      expect(table.nameOf(a)).to.equal("arg00");
      expect(table.nameOf(b)).to.equal("arg01");
    });
  });

  it("should name argument registers", () => {
    expect(registerAbiName("integer", 3)).to.equal("a3");
    expect(registerAbiName("fp", 0)).to.equal("fa0");
    expect(registerArchName("integer", 3)).to.equal("x13");
    expect(registerArchName("fp", 7)).to.equal("f17");
  });
});
