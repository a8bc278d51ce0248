import type { InstructionDescriptor } from './instruction-descriptor';
import type { PortableInstruction } from './placed-instruction';
import { RenderableInstruction, RenderableSection, sectionsToAssembly } from './program-printer';

import { isAligned } from 'rig-core-utils';

export type SectionSnapshot = {
  readonly address: number;
  readonly instructions: readonly PortableInstruction[];
};

/** A generated program in a form that can be written as JSON and rendered in another process. */
export type ProgramSnapshot = {
  readonly imemSize: number;
  readonly sections: readonly SectionSnapshot[];
};

export type SnapshotRenderingResult =
  | { readonly __type__: 'OK'; readonly assembly: string }
  | { readonly __type__: 'UNKNOWN_MNEMONIC'; readonly mnemonic: string }
  | {
      readonly __type__: 'OPERAND_COUNT_MISMATCH';
      readonly mnemonic: string;
      readonly expected: number;
      readonly actual: number;
    };

const isUnsignedInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;

const parsePortableInstruction = (json: unknown): PortableInstruction | null => {
  if (!Array.isArray(json) || json.length !== 2) {
    return null;
  }
  const mnemonic: unknown = json[0];
  const operands: unknown = json[1];
  if (typeof mnemonic !== 'string' || !Array.isArray(operands)) {
    return null;
  }
  const sanitizedOperands: number[] = [];
  for (let i = 0; i < operands.length; i += 1) {
    const operand: unknown = operands[i];
    if (!isUnsignedInteger(operand)) {
      return null;
    }
    sanitizedOperands.push(operand);
  }
  return [mnemonic, sanitizedOperands];
};

const parseSectionSnapshot = (json: unknown): SectionSnapshot | null => {
  if (typeof json !== 'object' || json === null) {
    return null;
  }
  const address = 'address' in json ? json.address : undefined;
  const instructions = 'instructions' in json ? json.instructions : undefined;
  if (!isUnsignedInteger(address) || !isAligned(address, 4) || !Array.isArray(instructions)) {
    return null;
  }
  const sanitizedInstructions: PortableInstruction[] = [];
  for (let i = 0; i < instructions.length; i += 1) {
    const instruction = parsePortableInstruction(instructions[i]);
    if (instruction == null) {
      return null;
    }
    sanitizedInstructions.push(instruction);
  }
  return { address, instructions: sanitizedInstructions };
};

/**
 * Parses the JSON form of a {@link ProgramSnapshot}.
 *
 * @returns the snapshot with sections sorted by address, or null if the text is not a well-formed
 * snapshot or its sections overlap, share a base address or leave instruction memory.
 */
export const parseProgramSnapshot = (snapshotString: string): ProgramSnapshot | null => {
  try {
    const json: unknown = JSON.parse(snapshotString);
    if (typeof json !== 'object' || json === null) {
      return null;
    }
    const imemSize = 'imemSize' in json ? json.imemSize : undefined;
    const sections = 'sections' in json ? json.sections : undefined;
    if (
      !isUnsignedInteger(imemSize) ||
      imemSize === 0 ||
      !isAligned(imemSize, 4) ||
      !Array.isArray(sections)
    ) {
      return null;
    }
    const sanitizedSections: SectionSnapshot[] = [];
    for (let i = 0; i < sections.length; i += 1) {
      const section = parseSectionSnapshot(sections[i]);
      if (section == null) {
        return null;
      }
      sanitizedSections.push(section);
    }
    sanitizedSections.sort((a, b) => a.address - b.address);
    let previousAddress = -1;
    let previousEnd = 0;
    for (const { address, instructions } of sanitizedSections) {
      // An empty section ends where it starts, so a repeated base slips past the end check.
      if (address >= imemSize || address < previousEnd || address === previousAddress) {
        return null;
      }
      previousAddress = address;
      previousEnd = address + 4 * instructions.length;
    }
    if (previousEnd > imemSize) {
      return null;
    }
    return { imemSize, sections: sanitizedSections };
  } catch {
    return null;
  }
};

/** Renders a snapshot exactly as the live program would have been dumped. */
export const snapshotToAssembly = (
  { sections }: ProgramSnapshot,
  catalog: ReadonlyMap<string, InstructionDescriptor>
): SnapshotRenderingResult => {
  const renderableSections: RenderableSection[] = [];
  for (const { address, instructions } of sections) {
    const renderableInstructions: RenderableInstruction[] = [];
    for (const [mnemonic, operands] of instructions) {
      const descriptor = catalog.get(mnemonic);
      if (descriptor == null) {
        return { __type__: 'UNKNOWN_MNEMONIC', mnemonic };
      }
      if (descriptor.operands.length !== operands.length) {
        return {
          __type__: 'OPERAND_COUNT_MISMATCH',
          mnemonic,
          expected: descriptor.operands.length,
          actual: operands.length,
        };
      }
      renderableInstructions.push({ descriptor, operands });
    }
    renderableSections.push({ address, instructions: renderableInstructions });
  }
  return { __type__: 'OK', assembly: sectionsToAssembly(renderableSections) };
};
