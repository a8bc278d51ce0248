import type { InstructionDescriptor } from './instruction-descriptor';
import { checkProgramInvariant } from './program-errors';

import { NONE, Optional } from 'rig-core-utils';

/** Target of a load/store instruction: which memory it touches and where. */
export type MemoryAccess = { readonly memoryKind: string; readonly address: number };

/** Mnemonic plus operand values. Enough to render the instruction again given the catalog. */
export type PortableInstruction = readonly [mnemonic: string, operands: readonly number[]];

/**
 * One instruction of the generated program.
 *
 * Register operands are stored as register numbers (x3 is 3). Immediates are stored as their
 * unsigned bit pattern, so an 8-bit signed immediate of -1 is 0xff.
 */
export default class PlacedInstruction {
  readonly operands: readonly number[];

  constructor(
    readonly descriptor: InstructionDescriptor,
    operands: readonly number[],
    readonly memoryAccess: Optional<MemoryAccess> = NONE
  ) {
    checkProgramInvariant(
      operands.length === descriptor.operands.length,
      () =>
        `${descriptor.mnemonic} takes ${descriptor.operands.length} operand(s), got ${operands.length}.`
    );
    operands.forEach((value, index) =>
      checkProgramInvariant(
        Number.isSafeInteger(value) && value >= 0,
        () => `Operand ${index} of ${descriptor.mnemonic} must be an unsigned integer, got ${value}.`
      )
    );
    checkProgramInvariant(
      memoryAccess.__type__ === descriptor.loadStore.__type__,
      () =>
        descriptor.loadStore.__type__ === 'SOME'
          ? `${descriptor.mnemonic} is a load/store instruction and needs a memory access.`
          : `${descriptor.mnemonic} is not a load/store instruction but has a memory access.`
    );
    this.operands = Object.freeze([...operands]);
  }

  get mnemonic(): string {
    return this.descriptor.mnemonic;
  }

  toPortable(): PortableInstruction {
    return [this.descriptor.mnemonic, [...this.operands]];
  }
}
