import type PlacedInstruction from './placed-instruction';
import { checkProgramInvariant, hex } from './program-errors';
import {
  BranchTargetBounds,
  OccupiedRange,
  pickBranchTargets as pickBranchTargetsInLayout,
} from './program-gaps';
import { AssemblySink, sectionsToAssembly, writeSectionsAssembly } from './program-printer';
import { OpenSection, Section } from './program-section';
import type { ProgramSnapshot } from './program-snapshot';

import {
  checkNotNull,
  isAligned,
  mapOptional,
  NONE,
  Optional,
  RandomSource,
  SeededRandomSource,
  SOME,
  SortedNumberMap,
} from 'rig-core-utils';

type CurrentSection = { readonly address: number; readonly section: OpenSection };

/** Where a section opened at some address would start, and how much room it would have. */
type SectionOpening = {
  readonly address: number;
  readonly capacity: number;
  /** Set when the section just below ends exactly at the requested address. */
  readonly mergedInstructions: Optional<readonly PlacedInstruction[]>;
};

/**
 * The random program being generated, as a layout of sections in instruction memory.
 *
 * Each instruction is 4 bytes, so a section of N instructions at address A occupies
 * [A, A + 4N). At most one section is open for appending at any time.
 */
export default class Program {
  private readonly sections: SortedNumberMap<readonly PlacedInstruction[]> = new SortedNumberMap();

  private currentSection: Optional<CurrentSection> = NONE;

  private readonly random: RandomSource;

  /**
   * @param imemSize size of instruction memory in bytes.
   * @param randomOrSeed the random source used for branch targets, or a seed for one.
   */
  constructor(readonly imemSize: number, randomOrSeed: RandomSource | number) {
    checkProgramInvariant(
      Number.isInteger(imemSize) && imemSize > 0 && isAligned(imemSize, 4),
      () => `Instruction memory size must be a positive multiple of 4, got ${imemSize}.`
    );
    this.random =
      typeof randomOrSeed === 'number' ? new SeededRandomSource(randomOrSeed) : randomOrSeed;
  }

  /** Starts a new section at `address`, closing any open one first. */
  openSection(address: number): void {
    this.closeSection();
    this.startSection(this.planSectionOpening(address));
  }

  closeSection(): void {
    if (this.currentSection.__type__ === 'NONE') {
      return;
    }
    const { address, section } = this.currentSection.value;
    // Capacity tracking keeps the section clear of its neighbors. This only catches a
    // duplicated base address.
    checkProgramInvariant(
      !this.sections.has(address),
      () => `A section is already registered at ${hex(address)}.`
    );
    this.sections.set(address, section.close(address).instructions);
    this.currentSection = NONE;
  }

  getCurrentSection(): Optional<OpenSection> {
    return mapOptional(this.currentSection, ({ section }) => section);
  }

  /** Appends `instructions` starting at `address`. Callers must check the space first. */
  addInstructions(address: number, instructions: readonly PlacedInstruction[]): void {
    this.closeSection();
    const opening = this.planSectionOpening(address);
    checkProgramInvariant(
      instructions.length <= opening.capacity,
      () =>
        `Cannot add ${instructions.length} instruction(s) at ${hex(address)}: ` +
        `only ${opening.capacity} fit.`
    );
    this.startSection(opening).addInstructions(instructions);
  }

  /** @returns how many instructions fit starting at `address`. */
  getInstructionSpaceAt(address: number): number {
    let space = this.imemSize - address;
    if (space <= 0) {
      return 0;
    }
    for (const range of this.getOccupiedRanges()) {
      if (address < range.address + 4 * range.length) {
        space = Math.min(space, range.address - address);
        if (space <= 0) {
          return 0;
        }
      }
    }
    return Math.max(0, Math.floor(space / 4));
  }

  /**
   * Picks `count` random branch targets with room for `minLength` instructions each.
   *
   * The layout is not changed, so the guarantee only holds until the next mutation.
   */
  pickBranchTargets(
    minLength: number,
    count: number,
    bounds: BranchTargetBounds = {}
  ): Optional<readonly number[]> {
    return pickBranchTargetsInLayout(
      this.random,
      { imemSize: this.imemSize, occupiedRanges: this.getOccupiedRanges() },
      minLength,
      count,
      bounds
    );
  }

  pickBranchTarget(minLength: number, bounds: BranchTargetBounds = {}): Optional<number> {
    return mapOptional(this.pickBranchTargets(minLength, 1, bounds), (targets) =>
      checkNotNull(targets[0])
    );
  }

  /** Committed sections and the open one, in address order. */
  getOccupiedRanges(): readonly OccupiedRange[] {
    const ranges: OccupiedRange[] = this.sections
      .entries()
      .map(([address, instructions]) => ({ address, length: instructions.length }));
    if (this.currentSection.__type__ === 'SOME') {
      const { address, section } = this.currentSection.value;
      ranges.push({ address, length: section.instructions.length });
      ranges.sort((a, b) => a.address - b.address);
    }
    return ranges;
  }

  /** Closes any open section and returns every section in address order. */
  finalizeSections(): readonly Section[] {
    this.closeSection();
    return this.sections.entries().map(([address, instructions]) => ({ address, instructions }));
  }

  dumpAssembly(sink: AssemblySink): void {
    writeSectionsAssembly(this.finalizeSections(), sink);
  }

  toAssembly(): string {
    return sectionsToAssembly(this.finalizeSections());
  }

  toSnapshot(): ProgramSnapshot {
    return {
      imemSize: this.imemSize,
      sections: this.finalizeSections().map(({ address, instructions }) => ({
        address,
        instructions: instructions.map((instruction) => instruction.toPortable()),
      })),
    };
  }

  private planSectionOpening(address: number): SectionOpening {
    checkProgramInvariant(
      Number.isInteger(address) && isAligned(address, 4),
      () => `Section address ${address} is not 4-byte aligned.`
    );
    checkProgramInvariant(
      address >= 0 && address <= this.imemSize,
      () => `Section address ${hex(address)} is outside instruction memory of ${this.imemSize} bytes.`
    );

    const nextAbove = this.sections.ceilingKey(address) ?? this.imemSize;
    checkProgramInvariant(
      address < nextAbove,
      () => `Cannot open a section at ${hex(address)}: no room before ${hex(nextAbove)}.`
    );
    const capacity = (nextAbove - address) / 4;

    const previousAddress = this.sections.lowerKey(address);
    if (previousAddress != null) {
      const previousInstructions = checkNotNull(this.sections.get(previousAddress));
      const previousEnd = previousAddress + 4 * previousInstructions.length;
      checkProgramInvariant(
        previousEnd <= address,
        () =>
          `Cannot open a section at ${hex(address)}: ` +
          `it is inside the section [${hex(previousAddress)}, ${hex(previousEnd)}).`
      );
      // Butting up against the previous section: continue it instead of starting a new one.
      if (previousEnd === address) {
        return {
          address: previousAddress,
          capacity,
          mergedInstructions: SOME(previousInstructions),
        };
      }
    }
    return { address, capacity, mergedInstructions: NONE };
  }

  private startSection({ address, capacity, mergedInstructions }: SectionOpening): OpenSection {
    let section: OpenSection;
    if (mergedInstructions.__type__ === 'SOME') {
      this.sections.delete(address);
      section = new OpenSection(capacity, mergedInstructions.value);
    } else {
      section = new OpenSection(capacity);
    }
    this.currentSection = SOME({ address, section });
    return section;
  }
}
