import type { InstructionDescriptor } from './instruction-descriptor';

import { zip } from 'rig-core-utils';

/** Anything that accepts text, such as `process.stdout` or a file stream. */
export interface AssemblySink {
  write(text: string): unknown;
}

export type RenderableInstruction = {
  readonly descriptor: InstructionDescriptor;
  readonly operands: readonly number[];
};

export type RenderableSection = {
  readonly address: number;
  readonly instructions: readonly RenderableInstruction[];
};

export const MNEMONIC_COLUMN_WIDTH = 14;

export const instructionToAssembly = ({ descriptor, operands }: RenderableInstruction): string => {
  const values = new Map(
    zip(descriptor.operands, operands).map(([{ name }, value]) => [name, value] as const)
  );
  let renderedOperands = descriptor.renderOperands(values);
  let mnemonic = descriptor.mnemonic;
  if (descriptor.gluedOperands && renderedOperands.length > 0) {
    mnemonic += renderedOperands.charAt(0);
    renderedOperands = renderedOperands.substring(1);
  }
  return `${mnemonic.padEnd(MNEMONIC_COLUMN_WIDTH)}${renderedOperands}`;
};

export const writeSectionsAssembly = (
  sections: readonly RenderableSection[],
  sink: AssemblySink
): void => {
  sections.forEach(({ address, instructions }, index) => {
    sink.write(
      `${index > 0 ? '\n' : ''}/* Section ${index} (${instructions.length} instructions) */\n`
    );
    sink.write(`.offset 0x${address.toString(16)}\n`);
    instructions.forEach((instruction) => sink.write(`${instructionToAssembly(instruction)}\n`));
  });
};

export const sectionsToAssembly = (sections: readonly RenderableSection[]): string => {
  const chunks: string[] = [];
  writeSectionsAssembly(sections, { write: (text) => chunks.push(text) });
  return chunks.join('');
};
