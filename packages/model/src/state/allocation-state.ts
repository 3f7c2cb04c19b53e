/**
 * Allocation state - register files and stack of one classification
 *
 * Created fresh for every call and mutated by a single classification pass.
 * Consumers only read it through the accessors.
 */

import type { AbiType, PointerType } from "../types/descriptors.js";
import { createAbiError, internalError, type AbiError } from "../types/errors.js";
import { alignTo } from "../types/layout.js";
import { error, ok, type Result } from "../types/result.js";
import type { RegisterWidth, RiscvMachine } from "../machine.js";
import { ArgumentTable, type ArgumentSlot } from "./argument-table.js";
import { ARGUMENT_REGISTER_COUNT } from "./registers.js";

export type RegisterContents = AbiType | undefined;

export class AllocationState {
  readonly xlen: RegisterWidth;
  readonly flen: RegisterWidth | undefined;
  readonly table: ArgumentTable;

  private readonly gprs: RegisterContents[];
  private readonly fprs: RegisterContents[] | undefined;
  private readonly stackObjects: AbiType[] = [];
  private gprsLeft = ARGUMENT_REGISTER_COUNT;
  private fprsLeft: number;

  constructor(machine: RiscvMachine, table: ArgumentTable = new ArgumentTable()) {
    this.xlen = machine.xlen;
    this.flen = machine.flen;
    this.table = table;
    this.gprs = new Array<RegisterContents>(ARGUMENT_REGISTER_COUNT).fill(
      undefined
    );
    this.fprs =
      machine.flen === undefined
        ? undefined
        : new Array<RegisterContents>(ARGUMENT_REGISTER_COUNT).fill(undefined);
    this.fprsLeft = machine.flen === undefined ? 0 : ARGUMENT_REGISTER_COUNT;
  }

  // Read-only view

  get integerRegisters(): readonly RegisterContents[] {
    return this.gprs;
  }

  /** `undefined` when the machine has no FP argument registers */
  get fpRegisters(): readonly RegisterContents[] | undefined {
    return this.fprs;
  }

  get integerRegistersLeft(): number {
    return this.gprsLeft;
  }

  get fpRegistersLeft(): number {
    return this.fprsLeft;
  }

  get stack(): readonly AbiType[] {
    return this.stackObjects;
  }

  get arguments(): readonly ArgumentSlot[] {
    return this.table.all;
  }

  nameOf(ty: RegisterContents): string {
    return ty === undefined ? "?" : this.table.nameOf(ty);
  }

  // Placement

  private nextGpr(): number {
    return ARGUMENT_REGISTER_COUNT - this.gprsLeft;
  }

  private nextFpr(): number {
    return ARGUMENT_REGISTER_COUNT - this.fprsLeft;
  }

  skipIntegerRegister(): void {
    if (this.gprsLeft === 0) {
      throw internalError("all integer argument registers already assigned");
    }
    this.gprsLeft--;
  }

  assignToIntegerRegisterOrStack(ty: AbiType): void {
    if (ty.size > this.xlen) {
      throw internalError(`object of ${ty.size} bits is larger than XLEN`);
    }
    if (this.gprsLeft >= 1) {
      this.assignToIntegerRegister(ty);
    } else {
      this.assignToStack(ty);
    }
  }

  assignToIntegerRegister(ty: AbiType): void {
    if (ty.size > this.xlen) {
      throw internalError(`object of ${ty.size} bits is larger than XLEN`);
    }
    if (this.gprsLeft <= 0) {
      throw internalError("all integer argument registers already assigned");
    }
    this.gprs[this.nextGpr()] = ty;
    this.gprsLeft--;
  }

  assignToFPRegister(ty: AbiType): void {
    if (this.fprs === undefined || this.flen === undefined) {
      throw internalError("machine has no FP argument registers");
    }
    if (ty.size > this.flen) {
      throw internalError(`object of ${ty.size} bits is larger than FLEN`);
    }
    if (this.fprsLeft <= 0) {
      throw internalError("all FP argument registers already assigned");
    }
    this.fprs[this.nextFpr()] = ty;
    this.fprsLeft--;
  }

  assignToStack(ty: AbiType): void {
    if (ty.size > 2 * this.xlen) {
      throw internalError(
        "objects larger than 2*XLEN must be passed by reference"
      );
    }
    this.stackObjects.push(ty);
  }

  /**
   * Pass `owner` indirectly: an XLEN pointer takes its place
   */
  passByReference(owner: AbiType): PointerType {
    const ptr: PointerType = {
      kind: "pointer",
      size: this.xlen,
      alignment: this.xlen,
    };
    this.assignToIntegerRegisterOrStack(ptr);
    this.table.addReference(ptr, owner);
    return ptr;
  }

  /**
   * Forget the contents of an integer register without returning it to the
   * pool. Used when a return value's hidden pointer belongs to the caller's
   * own argument list rather than to this register file.
   */
  clearIntegerRegister(index: number): void {
    if (index < 0 || index >= ARGUMENT_REGISTER_COUNT) {
      throw internalError(`invalid integer register index ${index}`);
    }
    this.gprs[index] = undefined;
  }

  // Stack layout

  /**
   * Byte offset of every stack object from the stack pointer at call entry.
   * Each object starts at least XLEN-aligned and at its own alignment.
   */
  stackOffsetsFromCallerSP(): readonly number[] {
    const offsets: number[] = [];
    let offset = 0;

    this.stackObjects.forEach((obj, index) => {
      if (index > 0) {
        const previous = this.stackObjects[index - 1];
        if (previous !== undefined) {
          offset += previous.size;
        }
        offset = alignTo(offset, this.xlen);
        offset = alignTo(offset, obj.alignment);
      }
      offsets.push(offset / 8);
    });

    return offsets;
  }

  /**
   * Byte offset of a single stack object from the stack pointer at call entry
   */
  stackOffsetFromCallerSP(index: number): Result<number, AbiError> {
    const target = this.stackObjects[index];
    if (!Number.isInteger(index) || target === undefined) {
      return error(
        createAbiError(
          "RVC2005",
          `Invalid stack object index ${index}`,
          `The stack holds ${this.stackObjects.length} object(s)`
        )
      );
    }

    let offset = 0;
    for (const obj of this.stackObjects.slice(0, index)) {
      offset = alignTo(offset, Math.max(this.xlen, obj.alignment));
      offset += obj.size;
    }
    offset = alignTo(offset, Math.max(this.xlen, target.alignment));
    return ok(offset / 8);
  }
}
