/**
 * Argument table - names arguments by descriptor identity
 *
 * Each argument of a call gets a slot at call entry. Descriptors are looked
 * up by object identity, so two structurally equal `SInt32` arguments keep
 * distinct names. Promoted variadic copies share the slot of the caller's
 * original descriptor.
 */

import type { AbiType, PointerType } from "../types/descriptors.js";
import { describeType } from "../types/describe.js";

export type ArgumentSlot = {
  readonly index: number;
  readonly name: string;
  /** Descriptor as supplied by the caller */
  readonly declared: AbiType;
  /** Descriptor that is classified (a promoted copy for small variadics) */
  readonly classified: AbiType;
  readonly variadic: boolean;
  readonly isReturn: boolean;
};

export type ArgumentSlotInit = {
  readonly declared: AbiType;
  readonly classified: AbiType;
  readonly variadic: boolean;
  readonly isReturn?: boolean;
};

export const RETURN_NAME = "ret";

const padIndex = (index: number): string => String(index).padStart(2, "0");

export class ArgumentTable {
  private readonly slots: ArgumentSlot[] = [];
  private readonly slotByType = new Map<AbiType, number>();
  private readonly referenceTargets = new Map<PointerType, number>();
  private fixedCount = 0;
  private variadicCount = 0;

  /**
   * Register an argument (or the return value) and assign its display name
   */
  add(init: ArgumentSlotInit): ArgumentSlot {
    const name = init.isReturn
      ? RETURN_NAME
      : init.variadic
        ? `varg${padIndex(this.variadicCount++)}`
        : `arg${padIndex(this.fixedCount++)}`;

    const slot: ArgumentSlot = {
      index: this.slots.length,
      name,
      declared: init.declared,
      classified: init.classified,
      variadic: init.variadic,
      isReturn: init.isReturn ?? false,
    };

    this.slots.push(slot);
    this.slotByType.set(init.declared, slot.index);
    this.slotByType.set(init.classified, slot.index);
    return slot;
  }

  /**
   * Record that `ptr` is passed in place of `owner`
   */
  addReference(ptr: PointerType, owner: AbiType): void {
    const index = this.slotByType.get(owner);
    if (index !== undefined) {
      this.referenceTargets.set(ptr, index);
    }
  }

  get all(): readonly ArgumentSlot[] {
    return this.slots;
  }

  slotOf(ty: AbiType): ArgumentSlot | undefined {
    const index = this.slotByType.get(ty);
    return index === undefined ? undefined : this.slots[index];
  }

  referencedBy(ty: AbiType): ArgumentSlot | undefined {
    if (ty.kind !== "pointer") {
      return undefined;
    }
    const index = this.referenceTargets.get(ty);
    return index === undefined ? undefined : this.slots[index];
  }

  /**
   * Display name: the slot name, `&name` for a by-reference pointer,
   * `name[lo:hi]` for a slice, or the descriptor text when unnamed
   */
  nameOf(ty: AbiType): string {
    if (ty.kind === "slice") {
      const owner = this.slotOf(ty.owner);
      return owner
        ? `${owner.name}[${ty.low}:${ty.high}]`
        : describeType(ty);
    }

    const reference = this.referencedBy(ty);
    if (reference) {
      return `&${reference.name}`;
    }

    return this.slotOf(ty)?.name ?? describeType(ty);
  }
}
