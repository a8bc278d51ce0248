import type PlacedInstruction from './placed-instruction';
import { checkProgramInvariant } from './program-errors';

/** A committed run of instructions. Occupies [address, address + 4 * instructions.length). */
export type Section = {
  readonly address: number;
  readonly instructions: readonly PlacedInstruction[];
};

/** A section that instructions are still being appended to. */
export class OpenSection {
  private readonly appendedInstructions: PlacedInstruction[];

  private capacityLeft: number;

  constructor(remainingCapacity: number, initialInstructions: readonly PlacedInstruction[] = []) {
    checkProgramInvariant(
      Number.isInteger(remainingCapacity) && remainingCapacity > 0,
      () => `An open section needs room for at least one instruction, got ${remainingCapacity}.`
    );
    this.capacityLeft = remainingCapacity;
    this.appendedInstructions = [...initialInstructions];
  }

  /** How many more instructions fit before the next section or the end of memory. */
  get remainingCapacity(): number {
    return this.capacityLeft;
  }

  get instructions(): readonly PlacedInstruction[] {
    return this.appendedInstructions;
  }

  addInstructions(instructions: readonly PlacedInstruction[]): void {
    checkProgramInvariant(
      instructions.length <= this.capacityLeft,
      () =>
        `Cannot append ${instructions.length} instruction(s) to a section with room for ${this.capacityLeft}.`
    );
    this.appendedInstructions.push(...instructions);
    this.capacityLeft -= instructions.length;
  }

  close(address: number): Section {
    return { address, instructions: Object.freeze([...this.appendedInstructions]) };
  }
}
